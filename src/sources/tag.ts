import type { SourcedItem } from "../types/index.js";
import { SourceAdapter } from "./base.js";

/** "photo" and "#photo" both search for "#photo"; blank tags give "". */
export function buildTagQuery(tag: string): string {
  const q = tag.trim();
  if (!q) return "";
  return q.startsWith("#") ? q : `#${q}`;
}

/** Hashtag search (app.bsky.feed.searchPosts). Search hits carry no reason, so no provenance. */
export class TagSearchSource extends SourceAdapter {
  readonly kind = "tag";
  readonly carriesProvenance = false;
  readonly detectsReshares = false;

  protected async fetch(): Promise<SourcedItem[]> {
    const q = buildTagQuery(this.ref);
    if (!q) return [];
    const posts = await this.api.searchPosts(q, this.limit);
    return posts.map((item) => ({ item, source: this.ref }));
  }
}
