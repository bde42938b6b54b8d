import { describe, it, expect } from "vitest";
import { IdentifierNormalizer } from "../../src/bsky/index.js";
import { FakeApi } from "../helpers/fake-api.js";
import { createTestLogger } from "../helpers/fixtures.js";

describe("IdentifierNormalizer", () => {
  it("passes AT-URIs through untouched", async () => {
    const api = new FakeApi();
    const normalizer = new IdentifierNormalizer(api, createTestLogger().logger);
    const uri = "at://did:plc:abc/app.bsky.feed.generator/photos";
    expect(await normalizer.normalize(`  ${uri} `, "feed")).toEqual({ ok: true, uri });
    expect(api.calls).toEqual([]);
  });

  it("resolves a handle once and reuses the result", async () => {
    const api = new FakeApi();
    api.handles.set("alice.test", "did:plc:alice");
    const normalizer = new IdentifierNormalizer(api, createTestLogger().logger);

    expect(await normalizer.normalize("https://bsky.app/profile/alice.test/feed/photos", "feed")).toEqual({
      ok: true,
      uri: "at://did:plc:alice/app.bsky.feed.generator/photos",
    });
    expect(await normalizer.normalize("https://bsky.app/profile/Alice.test/lists/friends", "lists")).toEqual({
      ok: true,
      uri: "at://did:plc:alice/app.bsky.graph.list/friends",
    });
    expect(api.calls).toEqual(["resolveHandle alice.test"]);
  });

  it("does not look up DIDs", async () => {
    const api = new FakeApi();
    const normalizer = new IdentifierNormalizer(api, createTestLogger().logger);
    expect(await normalizer.normalize("https://bsky.app/profile/did:plc:abc/post/3kx", "post")).toEqual({
      ok: true,
      uri: "at://did:plc:abc/app.bsky.feed.post/3kx",
    });
    expect(api.calls).toEqual([]);
  });

  it("treats a failed lookup as unresolved", async () => {
    const { logger, lines } = createTestLogger();
    const normalizer = new IdentifierNormalizer(
      {
        resolveHandle: async () => {
          throw new Error("HandleNotFound");
        },
      },
      logger
    );
    expect(await normalizer.normalize("https://bsky.app/profile/ghost.test/post/1", "post")).toEqual({
      ok: false,
      reason: "unresolved",
    });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[warn] handle resolution failed {"handle":"ghost.test","error":"HandleNotFound"}');
  });

  it("skips and logs unusable references in a batch", async () => {
    const api = new FakeApi();
    api.handles.set("alice.test", "did:plc:alice");
    const { logger, lines } = createTestLogger();
    const normalizer = new IdentifierNormalizer(api, logger);

    const uris = await normalizer.normalizeAll(
      ["https://bsky.app/profile/alice.test/feed/a", "photos", "https://bsky.app/profile/nobody.test/feed/b", ""],
      "feed"
    );

    expect(uris).toEqual(["at://did:plc:alice/app.bsky.feed.generator/a"]);
    expect(lines.map((l) => l.slice(l.indexOf("[")))).toEqual([
      '[warn] unrecognized feed reference, skipping {"value":"photos"}',
      '[warn] unresolved feed reference, skipping {"value":"https://bsky.app/profile/nobody.test/feed/b"}',
      '[warn] unrecognized feed reference, skipping {"value":""}',
    ]);
  });
});
