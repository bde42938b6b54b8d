/**
 * Pinned post lifecycle for one run:
 *
 *   idle -> retracting -> fetching -> validating -> ready | skipped
 *
 * The previous run's pinned repost is removed first so the new repost is
 * always the most recent one. A failed retraction only logs: the stale record
 * stays in state and is retried next run.
 */
import { isActionable, type ActionableItem, type BskyApi } from "../types/index.js";
import type { IdentifierNormalizer } from "../bsky/identity.js";
import type { ContentPolicy, RejectReason } from "../policy/filter.js";
import type { RunStateStore } from "../memory/store.js";
import { PostSource } from "../sources/post.js";
import { errorMessage, type Logger } from "../logger.js";

export type PinnedState = "idle" | "retracting" | "fetching" | "validating" | "ready" | "skipped";

export type PinnedSkipReason =
  | "not-configured"
  | "unrecognized"
  | "unresolved"
  | "fetch-failed"
  | "not-found"
  | "malformed"
  | RejectReason;

export type PinnedOutcome =
  | { state: "ready"; uri: string; item: ActionableItem }
  | { state: "skipped"; reason: PinnedSkipReason; uri?: string };

export type RetractOutcome = "none" | "retracted" | "failed" | "dry-run";

export interface PinnedCyclerDeps {
  api: BskyApi;
  normalizer: IdentifierNormalizer;
  policy: ContentPolicy;
  store: RunStateStore;
  logger: Logger;
  dryRun?: boolean;
}

export class PinnedCycler {
  private readonly deps: PinnedCyclerDeps;
  private current: PinnedState = "idle";
  private retraction: RetractOutcome = "none";

  constructor(deps: PinnedCyclerDeps) {
    this.deps = deps;
  }

  get state(): PinnedState {
    return this.current;
  }

  get retractOutcome(): RetractOutcome {
    return this.retraction;
  }

  /** Removes last run's pinned repost, if state holds one. */
  private async retract(): Promise<RetractOutcome> {
    const { api, store, logger, dryRun } = this.deps;
    this.current = "retracting";
    const handle = store.getPinnedRepostUri();
    if (!handle) return "none";
    if (dryRun) {
      logger.info("dry run: would retract previous pinned repost", { record: handle });
      return "dry-run";
    }
    try {
      await api.deleteRepost(handle);
      store.clearPinnedRepostUri();
      logger.info("previous pinned repost retracted", { record: handle });
      return "retracted";
    } catch (err) {
      logger.warn("pinned retraction failed; continuing", { record: handle, error: errorMessage(err) });
      return "failed";
    }
  }

  private skip(reason: PinnedSkipReason, uri?: string): PinnedOutcome {
    this.current = "skipped";
    return uri === undefined ? { state: "skipped", reason } : { state: "skipped", reason, uri };
  }

  /** Runs the whole cycle for the configured reference ("" when none). */
  async prepare(ref: string): Promise<PinnedOutcome> {
    const { api, normalizer, policy, logger } = this.deps;
    this.retraction = await this.retract();

    if (!ref.trim()) return this.skip("not-configured");

    this.current = "fetching";
    const normalized = await normalizer.normalize(ref, "post");
    if (!normalized.ok) {
      logger.warn(`${normalized.reason} pinned reference, skipping`, { value: ref });
      return this.skip(normalized.reason);
    }
    const uri = normalized.uri;

    const fetched = await new PostSource(api, uri, 1).safeFetch(logger);
    if (!fetched.ok) return this.skip("fetch-failed", uri);
    const found = fetched.items[0];
    if (!found) {
      logger.warn("pinned post not found", { uri });
      return this.skip("not-found", uri);
    }

    this.current = "validating";
    const item = found.item;
    if (!isActionable(item)) {
      logger.warn("pinned post has no uri/cid", { uri });
      return this.skip("malformed", uri);
    }
    if (policy.isBlocked(item)) {
      logger.warn("pinned post author is blocked; skipping", { uri, author: item.authorHandle });
      return this.skip("blocked", uri);
    }
    // No provenance: the reshare and required-tag rules do not apply here.
    const verdict = policy.evaluate({ item });
    if (!verdict.allowed) {
      logger.warn("pinned post rejected by filters; skipping", { uri, reason: verdict.reason });
      return this.skip(verdict.reason, uri);
    }

    this.current = "ready";
    return { state: "ready", uri, item };
  }
}
