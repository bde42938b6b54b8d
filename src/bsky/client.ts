import type { z } from "zod";
import type { BskyApi, ContentItem, FeedEntry, StrongRef } from "../types/index.js";
import {
  CreateRecordSchema,
  EmptyResponseSchema,
  FeedPageSchema,
  PostsPageSchema,
  ResolveHandleSchema,
  SessionSchema,
  XrpcErrorSchema,
  type Session,
} from "../types/bsky.js";
import { COLLECTIONS, rkeyOf } from "./uri.js";
import { parseFeedEntry, parsePostView } from "./normalize.js";

const DEFAULT_SERVICE_URL = "https://bsky.social";
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
/** getPosts accepts at most 25 URIs per call. */
const GET_POSTS_BATCH = 25;

export class BskyClientError extends Error {
  constructor(
    message: string,
    public readonly hint?: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "BskyClientError";
  }
}

function isRetryable(statusCode: number): boolean {
  return statusCode >= 500 || statusCode === 429;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type Params = Record<string, string | number | string[]>;

function toQuery(params: Params): string {
  const q = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (Array.isArray(value)) {
      for (const v of value) q.append(key, v);
    } else {
      q.append(key, String(value));
    }
  }
  const s = q.toString();
  return s ? `?${s}` : "";
}

export interface BskyClientConfig {
  serviceUrl?: string;
  /** Overridable for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
  /** Base delay between retries; doubles after each failed attempt. */
  initialBackoffMs?: number;
  onLog?: (msg: string, meta?: Record<string, unknown>) => void;
}

/** Minimal XRPC client for the calls the repost bot needs. */
export class BskyClient implements BskyApi {
  private readonly serviceUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly initialBackoffMs: number;
  private readonly onLog?: (msg: string, meta?: Record<string, unknown>) => void;
  private session: Session | null = null;

  constructor(config: BskyClientConfig = {}) {
    this.serviceUrl = (config.serviceUrl ?? DEFAULT_SERVICE_URL).replace(/\/$/, "");
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.initialBackoffMs = config.initialBackoffMs ?? INITIAL_BACKOFF_MS;
    this.onLog = config.onLog;
  }

  /** DID of the logged-in account; throws before login. */
  get did(): string {
    if (!this.session) throw new BskyClientError("Not logged in", "Call login() first");
    return this.session.did;
  }

  get handle(): string | undefined {
    return this.session?.handle;
  }

  private async request<S extends z.ZodTypeAny>(
    method: "GET" | "POST",
    nsid: string,
    schema: S,
    options: { params?: Params; body?: unknown; auth?: boolean; retry?: boolean } = {}
  ): Promise<z.output<S>> {
    const url = `${this.serviceUrl}/xrpc/${nsid}${toQuery(options.params ?? {})}`;
    const headers: Record<string, string> = {};
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    if (options.auth !== false && this.session) headers.Authorization = `Bearer ${this.session.accessJwt}`;

    let lastError: BskyClientError | null = null;
    let backoff = this.initialBackoffMs;
    // Calls with side effects (createSession, createRecord) go out once.
    const maxAttempts = options.retry === false ? 1 : MAX_RETRIES;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const res = await this.fetchImpl(url, {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        });
        const text = await res.text();
        let body: unknown = {};
        if (text) {
          try {
            body = JSON.parse(text);
          } catch {
            body = {};
          }
        }

        if (!res.ok) {
          const parsedErr = XrpcErrorSchema.safeParse(body);
          const err: { error?: string; message?: string } = parsedErr.success ? parsedErr.data : {};
          lastError = new BskyClientError(err.message ?? err.error ?? res.statusText, err.error, res.status);
          if (isRetryable(res.status) && attempt < maxAttempts - 1) {
            this.onLog?.("retrying request", { nsid, status: res.status, backoffMs: backoff });
            await sleep(backoff);
            backoff *= 2;
            continue;
          }
          throw lastError;
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new BskyClientError(`Unexpected response shape from ${nsid}`, parsed.error.message, res.status);
        }
        return parsed.data;
      } catch (e) {
        if (e instanceof BskyClientError) throw e;
        lastError = new BskyClientError(e instanceof Error ? e.message : String(e));
        if (attempt < maxAttempts - 1) {
          this.onLog?.("retrying request", { nsid, error: lastError.message, backoffMs: backoff });
          await sleep(backoff);
          backoff *= 2;
        } else {
          throw lastError;
        }
      }
    }

    throw lastError ?? new BskyClientError("Request failed after retries");
  }

  /** POST com.atproto.server.createSession; single attempt, loginWithRetry owns the retry loop. */
  async login(identifier: string, password: string): Promise<Session> {
    const session = await this.request("POST", "com.atproto.server.createSession", SessionSchema, {
      body: { identifier, password },
      auth: false,
      retry: false,
    });
    this.session = session;
    return session;
  }

  /** GET com.atproto.identity.resolveHandle */
  async resolveHandle(handle: string): Promise<string> {
    const res = await this.request("GET", "com.atproto.identity.resolveHandle", ResolveHandleSchema, {
      params: { handle },
    });
    return res.did;
  }

  private toEntries(feed: unknown[], nsid: string): FeedEntry[] {
    const entries: FeedEntry[] = [];
    let dropped = 0;
    for (const raw of feed) {
      const entry = parseFeedEntry(raw);
      if (entry) entries.push(entry);
      else dropped++;
    }
    if (dropped > 0) this.onLog?.("dropped malformed feed entries", { nsid, dropped });
    return entries;
  }

  private toItems(posts: unknown[], nsid: string): ContentItem[] {
    const items: ContentItem[] = [];
    let dropped = 0;
    for (const raw of posts) {
      const item = parsePostView(raw);
      if (item) items.push(item);
      else dropped++;
    }
    if (dropped > 0) this.onLog?.("dropped malformed posts", { nsid, dropped });
    return items;
  }

  /** GET app.bsky.feed.getFeed (custom feed generator) */
  async getFeed(feedUri: string, limit: number): Promise<FeedEntry[]> {
    const nsid = "app.bsky.feed.getFeed";
    const page = await this.request("GET", nsid, FeedPageSchema, { params: { feed: feedUri, limit } });
    return this.toEntries(page.feed, nsid);
  }

  /** GET app.bsky.feed.getListFeed (posts by list members) */
  async getListFeed(listUri: string, limit: number): Promise<FeedEntry[]> {
    const nsid = "app.bsky.feed.getListFeed";
    const page = await this.request("GET", nsid, FeedPageSchema, { params: { list: listUri, limit } });
    return this.toEntries(page.feed, nsid);
  }

  /** GET app.bsky.feed.searchPosts */
  async searchPosts(query: string, limit: number): Promise<ContentItem[]> {
    const nsid = "app.bsky.feed.searchPosts";
    const page = await this.request("GET", nsid, PostsPageSchema, { params: { q: query, limit } });
    return this.toItems(page.posts, nsid);
  }

  /** GET app.bsky.feed.getPosts, batched. Unknown URIs are simply absent from the result. */
  async getPosts(uris: string[]): Promise<ContentItem[]> {
    const nsid = "app.bsky.feed.getPosts";
    const out: ContentItem[] = [];
    for (let i = 0; i < uris.length; i += GET_POSTS_BATCH) {
      const page = await this.request("GET", nsid, PostsPageSchema, {
        params: { uris: uris.slice(i, i + GET_POSTS_BATCH) },
      });
      out.push(...this.toItems(page.posts, nsid));
    }
    return out;
  }

  private async createRecord(collection: string, subject: StrongRef): Promise<string> {
    const res = await this.request("POST", "com.atproto.repo.createRecord", CreateRecordSchema, {
      body: {
        repo: this.did,
        collection,
        record: {
          $type: collection,
          subject: { uri: subject.uri, cid: subject.cid },
          createdAt: new Date().toISOString(),
        },
      },
      retry: false,
    });
    return res.uri;
  }

  /** Creates an app.bsky.feed.repost record; returns its AT-URI. */
  async repost(subject: StrongRef): Promise<string> {
    return this.createRecord(COLLECTIONS.repost, subject);
  }

  /** Creates an app.bsky.feed.like record; returns its AT-URI. */
  async like(subject: StrongRef): Promise<string> {
    return this.createRecord(COLLECTIONS.like, subject);
  }

  /** Deletes one of our repost records by its AT-URI. */
  async deleteRepost(recordUri: string): Promise<void> {
    const rkey = rkeyOf(recordUri);
    if (!rkey) throw new BskyClientError(`Invalid repost record URI: ${recordUri}`);
    await this.request("POST", "com.atproto.repo.deleteRecord", EmptyResponseSchema, {
      body: { repo: this.did, collection: COLLECTIONS.repost, rkey },
    });
  }
}
