import { describe, it, expect } from "vitest";
import { BskyClient, BskyClientError, loginWithRetry } from "../../src/bsky/index.js";
import { createTestLogger } from "../helpers/fixtures.js";

interface RecordedRequest {
  method: string;
  url: URL;
  auth: string | null;
  body: unknown;
}

type Reply = { status: number; body?: unknown } | Error;

const SESSION = { did: "did:plc:bot", handle: "bot.test", accessJwt: "test-access-token" };

function fakeFetch(replies: Reply[]) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const raw = init?.body;
    requests.push({
      method: init?.method ?? "GET",
      url: new URL(String(input)),
      auth: new Headers(init?.headers).get("Authorization"),
      body: typeof raw === "string" ? JSON.parse(raw) : undefined,
    });
    const next = replies.shift() ?? { status: 200, body: {} };
    if (next instanceof Error) throw next;
    return new Response(next.body === undefined ? "" : JSON.stringify(next.body), { status: next.status });
  };
  return { fetchImpl, requests };
}

function client(replies: Reply[], onLog?: (msg: string, meta?: Record<string, unknown>) => void) {
  const fake = fakeFetch(replies);
  const c = new BskyClient({ serviceUrl: "https://pds.test/", fetchImpl: fake.fetchImpl, initialBackoffMs: 0, onLog });
  return { c, requests: fake.requests };
}

const post = (rkey: string) => ({
  uri: `at://did:plc:alice/app.bsky.feed.post/${rkey}`,
  cid: `cid-${rkey}`,
  author: { did: "did:plc:alice", handle: "alice.test" },
  record: { text: "hi" },
  indexedAt: "2026-03-01T11:00:00.000Z",
});

describe("BskyClient", () => {
  it("logs in without auth and authenticates later calls", async () => {
    const { c, requests } = client([{ status: 200, body: SESSION }, { status: 200, body: { did: "did:plc:alice" } }]);

    await c.login("bot.test", "test-password");
    expect(c.did).toBe("did:plc:bot");
    expect(await c.resolveHandle("alice.test")).toBe("did:plc:alice");

    expect(requests[0].method).toBe("POST");
    expect(requests[0].url.href).toBe("https://pds.test/xrpc/com.atproto.server.createSession");
    expect(requests[0].auth).toBeNull();
    expect(requests[0].body).toEqual({ identifier: "bot.test", password: "test-password" });
    expect(requests[1].url.searchParams.get("handle")).toBe("alice.test");
    expect(requests[1].auth).toBe("Bearer test-access-token");
  });

  it("refuses record calls before login", () => {
    const { c } = client([]);
    expect(() => c.did).toThrow("Not logged in");
  });

  it("retries server errors and rate limits with backoff", async () => {
    const logged: string[] = [];
    const { c, requests } = client(
      [{ status: 503 }, { status: 429 }, { status: 200, body: { did: "did:plc:alice" } }],
      (msg) => logged.push(msg)
    );
    expect(await c.resolveHandle("alice.test")).toBe("did:plc:alice");
    expect(requests).toHaveLength(3);
    expect(logged).toEqual(["retrying request", "retrying request"]);
  });

  it("gives up after three attempts", async () => {
    const { c, requests } = client([
      { status: 500, body: { error: "InternalServerError", message: "try later" } },
      { status: 500, body: { error: "InternalServerError", message: "try later" } },
      { status: 500, body: { error: "InternalServerError", message: "try later" } },
    ]);
    await expect(c.resolveHandle("alice.test")).rejects.toMatchObject({
      message: "try later",
      hint: "InternalServerError",
      statusCode: 500,
    });
    expect(requests).toHaveLength(3);
  });

  it("does not retry client errors", async () => {
    const { c, requests } = client([{ status: 401, body: { error: "AuthenticationRequired", message: "Invalid identifier or password" } }]);
    const err = await c.login("bot.test", "wrong").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BskyClientError);
    expect(err).toMatchObject({ message: "Invalid identifier or password", statusCode: 401 });
    expect(requests).toHaveLength(1);
  });

  it("retries network failures", async () => {
    const { c, requests } = client([new TypeError("fetch failed"), { status: 200, body: { did: "did:plc:alice" } }]);
    expect(await c.resolveHandle("alice.test")).toBe("did:plc:alice");
    expect(requests).toHaveLength(2);

    const down = client([new TypeError("fetch failed"), new TypeError("fetch failed"), new TypeError("fetch failed")]);
    await expect(down.c.resolveHandle("alice.test")).rejects.toThrow("fetch failed");
  });

  it("rejects responses that do not match the expected shape", async () => {
    const { c } = client([{ status: 200, body: { handle: "bot.test" } }]);
    await expect(c.login("bot.test", "test-password")).rejects.toThrow(
      "Unexpected response shape from com.atproto.server.createSession"
    );
  });

  it("drops malformed feed entries and reports them", async () => {
    const logged: Array<Record<string, unknown> | undefined> = [];
    const { c, requests } = client(
      [{ status: 200, body: { feed: [{ post: post("a"), reason: { $type: "app.bsky.feed.defs#reasonRepost" } }, "junk"] } }],
      (_msg, meta) => logged.push(meta)
    );
    const entries = await c.getFeed("at://did:plc:curator/app.bsky.feed.generator/photos", 30);

    expect(entries).toHaveLength(1);
    expect(entries[0].reasonType).toBe("app.bsky.feed.defs#reasonRepost");
    expect(requests[0].url.searchParams.get("feed")).toBe("at://did:plc:curator/app.bsky.feed.generator/photos");
    expect(requests[0].url.searchParams.get("limit")).toBe("30");
    expect(logged).toEqual([{ nsid: "app.bsky.feed.getFeed", dropped: 1 }]);
  });

  it("searches and reads list feeds with their own parameters", async () => {
    const { c, requests } = client([
      { status: 200, body: { posts: [post("a")] } },
      { status: 200, body: { feed: [] } },
    ]);
    expect(await c.searchPosts("#photo", 25)).toHaveLength(1);
    expect(await c.getListFeed("at://did:plc:curator/app.bsky.graph.list/friends", 10)).toEqual([]);

    expect(requests[0].url.pathname).toBe("/xrpc/app.bsky.feed.searchPosts");
    expect(requests[0].url.searchParams.get("q")).toBe("#photo");
    expect(requests[1].url.searchParams.get("list")).toBe("at://did:plc:curator/app.bsky.graph.list/friends");
  });

  it("fetches posts in batches of 25", async () => {
    const uris = Array.from({ length: 30 }, (_, i) => `at://did:plc:alice/app.bsky.feed.post/${i}`);
    const { c, requests } = client([
      { status: 200, body: { posts: [post("0")] } },
      { status: 200, body: { posts: [post("29")] } },
    ]);
    const posts = await c.getPosts(uris);

    expect(posts.map((p) => p.cid)).toEqual(["cid-0", "cid-29"]);
    expect(requests.map((r) => r.url.searchParams.getAll("uris").length)).toEqual([25, 5]);
  });

  it("creates repost and like records for the logged-in account", async () => {
    const { c, requests } = client([
      { status: 200, body: SESSION },
      { status: 200, body: { uri: "at://did:plc:bot/app.bsky.feed.repost/r1", cid: "cid-r1" } },
      { status: 200, body: { uri: "at://did:plc:bot/app.bsky.feed.like/l1" } },
    ]);
    await c.login("bot.test", "test-password");
    const subject = { uri: "at://did:plc:alice/app.bsky.feed.post/a", cid: "cid-a" };

    expect(await c.repost(subject)).toBe("at://did:plc:bot/app.bsky.feed.repost/r1");
    expect(await c.like(subject)).toBe("at://did:plc:bot/app.bsky.feed.like/l1");
    expect(requests[1].body).toMatchObject({
      repo: "did:plc:bot",
      collection: "app.bsky.feed.repost",
      record: { $type: "app.bsky.feed.repost", subject },
    });
    expect(requests[2].body).toMatchObject({ collection: "app.bsky.feed.like" });
  });

  it("deletes a repost by its record key", async () => {
    const { c, requests } = client([{ status: 200, body: SESSION }, { status: 200 }]);
    await c.login("bot.test", "test-password");
    await c.deleteRepost("at://did:plc:bot/app.bsky.feed.repost/r1");

    expect(requests[1].url.pathname).toBe("/xrpc/com.atproto.repo.deleteRecord");
    expect(requests[1].body).toEqual({ repo: "did:plc:bot", collection: "app.bsky.feed.repost", rkey: "r1" });
    await expect(c.deleteRepost("not-a-record")).rejects.toThrow("Invalid repost record URI: not-a-record");
    expect(requests).toHaveLength(2);
  });

  it("does not retry record creation", async () => {
    const { c, requests } = client([
      { status: 200, body: SESSION },
      new TypeError("fetch failed"),
      { status: 502, body: { error: "UpstreamFailure", message: "bad gateway" } },
      { status: 200, body: { uri: "at://did:plc:bot/app.bsky.feed.repost/r1" } },
    ]);
    await c.login("bot.test", "test-password");
    const subject = { uri: "at://did:plc:alice/app.bsky.feed.post/a", cid: "cid-a" };

    await expect(c.repost(subject)).rejects.toThrow("fetch failed");
    await expect(c.like(subject)).rejects.toMatchObject({ message: "bad gateway", statusCode: 502 });
    expect(requests.map((r) => r.url.pathname)).toEqual([
      "/xrpc/com.atproto.server.createSession",
      "/xrpc/com.atproto.repo.createRecord",
      "/xrpc/com.atproto.repo.createRecord",
    ]);
  });

  it("still retries record deletion", async () => {
    const { c, requests } = client([{ status: 200, body: SESSION }, { status: 503 }, { status: 200 }]);
    await c.login("bot.test", "test-password");
    await c.deleteRepost("at://did:plc:bot/app.bsky.feed.repost/r1");
    expect(requests).toHaveLength(3);
  });

  it("sends one createSession per login attempt", async () => {
    const rateLimited: Reply[] = Array.from({ length: 10 }, () => ({
      status: 429,
      body: { error: "RateLimitExceeded", message: "Rate Limit Exceeded" },
    }));
    const { c, requests } = client(rateLimited);
    const result = await loginWithRetry(
      c,
      { identifier: "bot.test", password: "test-password", maxAttempts: 2, retryDelayMs: 0, sleep: async () => {} },
      createTestLogger().logger
    );

    expect(result).toEqual({ ok: false, error: "Rate Limit Exceeded", attempts: 2 });
    expect(requests).toHaveLength(2);
  });
});
