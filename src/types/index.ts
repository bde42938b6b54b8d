/**
 * Shared types for the Bluesky repost bot.
 */

export {
  SessionSchema,
  PostViewSchema,
  FeedViewPostSchema,
  type Session,
  type PostView,
  type FeedViewPost,
} from "./bsky.js";

export interface EnvConfig {
  BSKY_USERNAME: string;
  BSKY_PASSWORD: string;
  BSKY_SERVICE_URL?: string;
  /** Path of the read-only config document. Default config.json. */
  CONFIG_PATH: string;
  /** Path of the run-state document. Default state.json. */
  STATE_PATH: string;
  LOG_LEVEL: "debug" | "info" | "warn" | "error";
  /** Bounded login retry loop: attempts and fixed delay between them. */
  LOGIN_MAX_ATTEMPTS: number;
  LOGIN_RETRY_DELAY_SECONDS: number;
  DRY_RUN?: boolean;
  KILL_SWITCH?: boolean;
}

/** Media part of a quote-with-media embed. */
export type MediaDescriptor =
  | { kind: "images"; count: number }
  | { kind: "video" }
  | { kind: "other"; type: string };

export type EmbedDescriptor =
  | { kind: "none" }
  | { kind: "images"; count: number }
  | { kind: "video" }
  | { kind: "external" }
  | { kind: "quote" }
  | { kind: "quote-with-media"; media: MediaDescriptor }
  | { kind: "unknown"; type: string };

/** One post considered for reposting. uri/cid may be missing on malformed views. */
export interface ContentItem {
  uri?: string;
  cid?: string;
  authorDid: string;
  authorHandle: string;
  /** Epoch ms from indexedAt, else record.createdAt; undefined when neither parses. */
  timestamp?: number;
  text: string;
  /** Rich-text tag facets, as written (no leading #). */
  tags: string[];
  embed: EmbedDescriptor;
  isReply: boolean;
}

export type ActionableItem = ContentItem & { uri: string; cid: string };

export function isActionable(item: ContentItem): item is ActionableItem {
  return Boolean(item.uri) && Boolean(item.cid);
}

export type SourceKind = "feed" | "list" | "tag" | "post";

/** Only feed and list entries carry provenance. */
export interface ProvenanceContext {
  origin: "feed" | "list";
  /** Undefined when the adapter cannot tell reshares apart. */
  reshared?: boolean;
}

export interface SourcedItem {
  item: ContentItem;
  provenance?: ProvenanceContext;
  /** Which configured source produced the item (for logs). */
  source: string;
}

/** Feed or list entry as returned by the client: the post plus the reason $type, if any. */
export interface FeedEntry {
  item: ContentItem;
  reasonType?: string;
}

export interface StrongRef {
  uri: string;
  cid: string;
}

/** Network seam used by every component; BskyClient is the real implementation. */
export interface BskyApi {
  resolveHandle(handle: string): Promise<string>;
  getFeed(feedUri: string, limit: number): Promise<FeedEntry[]>;
  getListFeed(listUri: string, limit: number): Promise<FeedEntry[]>;
  searchPosts(query: string, limit: number): Promise<ContentItem[]>;
  getPosts(uris: string[]): Promise<ContentItem[]>;
  /** Returns the AT-URI of the created repost record. */
  repost(subject: StrongRef): Promise<string>;
  like(subject: StrongRef): Promise<string>;
  deleteRepost(recordUri: string): Promise<void>;
}
