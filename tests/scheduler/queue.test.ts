import { describe, it, expect } from "vitest";
import { buildQueue, injectPinned, type Candidate, type QueueEntry } from "../../src/scheduler/index.js";
import { makeItem } from "../helpers/fixtures.js";

function candidate(rkey: string, minutesAgo: number, authorDid = "did:plc:alice"): Candidate {
  return { ...makeItem(rkey, minutesAgo, { authorDid }), uri: `at://${authorDid}/app.bsky.feed.post/${rkey}`, cid: `cid-${rkey}`, timestamp: minutesAgo };
}

const cids = (queue: QueueEntry[]) => queue.map((e) => (e.kind === "pinned" ? `pinned:${e.item.cid}` : e.item.cid));

describe("buildQueue", () => {
  it("caps items per author and skips to the next author", () => {
    const candidates = [
      candidate("a1", 1, "did:plc:a"),
      candidate("a2", 2, "did:plc:a"),
      candidate("a3", 3, "did:plc:a"),
      candidate("b1", 4, "did:plc:b"),
    ];
    const result = buildQueue(candidates, { totalCap: 10, perAuthorCap: 2, reservePinnedSlot: false });
    expect(cids(result.queue)).toEqual(["cid-a1", "cid-a2", "cid-b1"]);
    expect(result.skippedByAuthorCap).toBe(1);
    expect(result.authorCounts.get("did:plc:a")).toBe(2);
    expect(result.authorCounts.get("did:plc:b")).toBe(1);
  });

  it("stops at the total cap", () => {
    const candidates = ["1", "2", "3", "4"].map((k, i) => candidate(k, i, `did:plc:${k}`));
    const result = buildQueue(candidates, { totalCap: 3, perAuthorCap: 3, reservePinnedSlot: false });
    expect(cids(result.queue)).toEqual(["cid-1", "cid-2", "cid-3"]);
  });

  it("reserves one slot when a pinned post is configured", () => {
    const candidates = ["1", "2", "3", "4"].map((k, i) => candidate(k, i, `did:plc:${k}`));
    const result = buildQueue(candidates, { totalCap: 3, perAuthorCap: 3, reservePinnedSlot: true });
    expect(result.queue).toHaveLength(2);
  });

  it("floors the organic budget at zero", () => {
    const result = buildQueue([candidate("1", 1)], { totalCap: 0, perAuthorCap: 3, reservePinnedSlot: true });
    expect(result.queue).toEqual([]);
  });

  it("does not count items without an author DID", () => {
    const candidates = [candidate("x", 1, ""), candidate("y", 2, ""), candidate("z", 3, "")];
    const result = buildQueue(candidates, { totalCap: 10, perAuthorCap: 1, reservePinnedSlot: false });
    expect(result.queue).toHaveLength(3);
  });
});

describe("injectPinned", () => {
  const pinned = { ...makeItem("pin", 500), uri: "at://did:plc:p/app.bsky.feed.post/pin", cid: "cid-pin" };
  const organic = (n: number): QueueEntry[] =>
    Array.from({ length: n }, (_, i): QueueEntry => ({ kind: "organic", item: candidate(String(i), i, `did:plc:${i}`) }));

  it("puts the pinned post third when there are at least two organic items", () => {
    expect(cids(injectPinned(organic(4), pinned, 10))).toEqual(["cid-0", "cid-1", "pinned:cid-pin", "cid-2", "cid-3"]);
    expect(cids(injectPinned(organic(2), pinned, 10))).toEqual(["cid-0", "cid-1", "pinned:cid-pin"]);
  });

  it("appends it when the queue is shorter", () => {
    expect(cids(injectPinned(organic(1), pinned, 10))).toEqual(["cid-0", "pinned:cid-pin"]);
    expect(cids(injectPinned([], pinned, 10))).toEqual(["pinned:cid-pin"]);
  });

  it("truncates back to the total cap", () => {
    expect(cids(injectPinned(organic(3), pinned, 3))).toEqual(["cid-0", "cid-1", "pinned:cid-pin"]);
    expect(injectPinned([], pinned, 0)).toEqual([]);
  });
});
