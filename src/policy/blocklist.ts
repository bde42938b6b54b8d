import type { ContentItem } from "../types/index.js";
import { profileActor } from "../bsky/uri.js";

/**
 * Normalized author keys: DIDs or handles, lower-cased. Entries may be given as
 * did:plc:..., handle.bsky.social, or https://bsky.app/profile/<actor>.
 */
export function normalizeBlockedUsers(values: string[]): Set<string> {
  const out = new Set<string>();
  for (const v of values) {
    const t = v.trim();
    if (!t) continue;
    const actor = profileActor(t);
    out.add((actor ?? t).toLowerCase());
  }
  return out;
}

/** Read-only for the lifetime of a run. */
export class Blocklist {
  private readonly keys: ReadonlySet<string>;

  constructor(entries: string[] = []) {
    this.keys = normalizeBlockedUsers(entries);
  }

  get size(): number {
    return this.keys.size;
  }

  has(key: string): boolean {
    return this.keys.has(key.toLowerCase());
  }

  /** True when the author's DID or handle is listed. */
  blocks(item: Pick<ContentItem, "authorDid" | "authorHandle">): boolean {
    if (this.keys.size === 0) return false;
    return (item.authorDid !== "" && this.has(item.authorDid)) || (item.authorHandle !== "" && this.has(item.authorHandle));
  }
}
