import type { BskyApi } from "../types/index.js";
import type { RepostConfig } from "../config/repost-config.js";
import type { SourceAdapter } from "./base.js";
import { FeedSource } from "./feed.js";
import { ListSource } from "./list.js";
import { TagSearchSource } from "./tag.js";

export { SourceAdapter, FeedViewSource, type SourceFetchResult } from "./base.js";
export { FeedSource } from "./feed.js";
export { ListSource } from "./list.js";
export { TagSearchSource, buildTagQuery } from "./tag.js";
export { PostSource } from "./post.js";

/**
 * Adapters in source-priority order: feeds, then lists, then hashtags.
 * Feed and list refs must already be canonical AT-URIs.
 */
export function createSources(
  api: BskyApi,
  refs: { feeds: string[]; lists: string[]; hashtags: string[] },
  config: Pick<RepostConfig, "fetchLimitPerFeed" | "fetchLimitPerList" | "searchLimitPerTag">
): SourceAdapter[] {
  return [
    ...refs.feeds.map((uri) => new FeedSource(api, uri, config.fetchLimitPerFeed)),
    ...refs.lists.map((uri) => new ListSource(api, uri, config.fetchLimitPerList)),
    ...refs.hashtags.map((tag) => new TagSearchSource(api, tag, config.searchLimitPerTag)),
  ];
}
