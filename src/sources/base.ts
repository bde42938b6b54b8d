/**
 * Source adapters: one per source kind, all sharing fetch(limit) -> items.
 * Variants differ in fetch parameters and in whether they attach provenance
 * context (and can tell reshares apart).
 */
import type { BskyApi, FeedEntry, ProvenanceContext, SourceKind, SourcedItem } from "../types/index.js";
import { errorMessage, type Logger } from "../logger.js";

const REASON_REPOST = "app.bsky.feed.defs#reasonRepost";

export interface SourceFetchResult {
  source: string;
  kind: SourceKind;
  ok: boolean;
  items: SourcedItem[];
  durationMs: number;
  error?: string;
}

export abstract class SourceAdapter {
  abstract readonly kind: SourceKind;
  /** Feed and list entries carry provenance; search hits and single fetches do not. */
  abstract readonly carriesProvenance: boolean;
  /** Whether the source marks reshares at all; provenance.reshared stays undefined otherwise. */
  abstract readonly detectsReshares: boolean;

  constructor(
    protected readonly api: BskyApi,
    /** Canonical identifier or query this adapter reads from. */
    readonly ref: string,
    protected readonly limit: number
  ) {}

  protected abstract fetch(): Promise<SourcedItem[]>;

  /** Never throws: a failing source logs a warning and yields zero items. */
  async safeFetch(logger: Logger): Promise<SourceFetchResult> {
    const startTime = Date.now();
    try {
      const items = await this.fetch();
      const durationMs = Date.now() - startTime;
      logger.debug("source fetched", { kind: this.kind, source: this.ref, items: items.length, durationMs });
      return { source: this.ref, kind: this.kind, ok: true, items, durationMs };
    } catch (err) {
      const error = errorMessage(err);
      logger.warn(`${this.kind} fetch failed`, { source: this.ref, error });
      return { source: this.ref, kind: this.kind, ok: false, items: [], durationMs: Date.now() - startTime, error };
    }
  }
}

/** Shared by feed and list adapters: both return feedViewPost entries with an optional reason. */
export abstract class FeedViewSource extends SourceAdapter {
  abstract readonly kind: "feed" | "list";
  readonly carriesProvenance = true;

  protected toSourced(entries: FeedEntry[]): SourcedItem[] {
    return entries.map((entry) => {
      const provenance: ProvenanceContext = { origin: this.kind };
      if (this.detectsReshares) provenance.reshared = (entry.reasonType ?? "").includes(REASON_REPOST);
      return { item: entry.item, provenance, source: this.ref };
    });
  }
}
