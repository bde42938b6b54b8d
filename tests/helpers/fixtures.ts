import type { ContentItem, FeedEntry } from "../../src/types/index.js";
import { createLogger, type Logger } from "../../src/logger.js";

export const NOW = Date.parse("2026-03-01T12:00:00.000Z");
export const MINUTE = 60_000;

export function postUri(did: string, rkey: string): string {
  return `at://${did}/app.bsky.feed.post/${rkey}`;
}

/** A media post by alice, `minutesAgo` before NOW, that passes every filter. */
export function makeItem(rkey: string, minutesAgo: number, overrides: Partial<ContentItem> = {}): ContentItem {
  const authorDid = overrides.authorDid ?? "did:plc:alice";
  return {
    uri: postUri(authorDid, rkey),
    cid: `cid-${rkey}`,
    authorDid,
    authorHandle: "alice.test",
    timestamp: NOW - minutesAgo * MINUTE,
    text: "sunset #photo",
    tags: [],
    embed: { kind: "images", count: 1 },
    isReply: false,
    ...overrides,
  };
}

export function feedEntry(item: ContentItem, reasonType?: string): FeedEntry {
  return reasonType ? { item, reasonType } : { item };
}

export const REASON_REPOST = "app.bsky.feed.defs#reasonRepost";

export function createTestLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: createLogger("debug", (line) => lines.push(line)), lines };
}
