/**
 * Merges every source's items into one candidate set keyed by AT-URI and
 * orders it newest first.
 */
import { isActionable, type ActionableItem, type SourcedItem } from "../types/index.js";
import type { ContentPolicy, RejectReason } from "../policy/filter.js";
import { isWithinWindow, type TimeWindow } from "./window.js";

export type Candidate = ActionableItem & { timestamp: number };

export type SkipReason = "malformed" | "out-of-window" | "processed" | "pinned" | RejectReason;

export interface AggregateContext {
  window: TimeWindow;
  isProcessed: (uri: string) => boolean;
  policy: ContentPolicy;
  /** URIs that must never become organic candidates (the pinned post). */
  excludeUris?: ReadonlySet<string>;
}

export interface AggregateResult {
  /** Newest first; equal timestamps keep source order. */
  candidates: Candidate[];
  considered: number;
  skipped: Partial<Record<SkipReason, number>>;
}

export function aggregate(inputs: SourcedItem[], ctx: AggregateContext): AggregateResult {
  const byUri = new Map<string, Candidate>();
  const skipped: Partial<Record<SkipReason, number>> = {};
  const skip = (reason: SkipReason) => {
    skipped[reason] = (skipped[reason] ?? 0) + 1;
  };

  for (const { item, provenance } of inputs) {
    if (!isActionable(item)) {
      skip("malformed");
      continue;
    }
    const timestamp = item.timestamp;
    if (timestamp === undefined || !isWithinWindow(timestamp, ctx.window)) {
      skip("out-of-window");
      continue;
    }
    if (ctx.isProcessed(item.uri)) {
      skip("processed");
      continue;
    }
    if (ctx.excludeUris?.has(item.uri)) {
      skip("pinned");
      continue;
    }
    if (ctx.policy.isBlocked(item)) {
      skip("blocked");
      continue;
    }
    const verdict = ctx.policy.evaluate({ item, provenance });
    if (!verdict.allowed) {
      skip(verdict.reason);
      continue;
    }
    // Same URI from another source: last one wins, the views are identical.
    byUri.set(item.uri, { ...item, timestamp });
  }

  const candidates = [...byUri.values()].sort((a, b) => b.timestamp - a.timestamp);
  return { candidates, considered: inputs.length, skipped };
}
