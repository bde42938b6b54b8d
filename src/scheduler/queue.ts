import type { ActionableItem } from "../types/index.js";
import type { Candidate } from "./aggregate.js";

export type QueueEntry =
  | { kind: "organic"; item: Candidate }
  | { kind: "pinned"; item: ActionableItem };

/** Zero-based queue slot the pinned post goes into. */
export const PINNED_INDEX = 2;

export interface QueueLimits {
  totalCap: number;
  perAuthorCap: number;
  /** Keep one slot free for the pinned post. */
  reservePinnedSlot: boolean;
}

export interface QueueResult {
  queue: QueueEntry[];
  authorCounts: Map<string, number>;
  /** Candidates passed over because their author was at the cap. */
  skippedByAuthorCap: number;
}

/**
 * Walks candidates in priority order, enforcing the per-author cap, until the
 * organic budget is full. Items without an author DID are not counted per author.
 */
export function buildQueue(candidates: Candidate[], limits: QueueLimits): QueueResult {
  const cap = Math.max(0, limits.reservePinnedSlot ? limits.totalCap - 1 : limits.totalCap);
  const authorCounts = new Map<string, number>();
  const queue: QueueEntry[] = [];
  let skippedByAuthorCap = 0;

  for (const item of candidates) {
    if (queue.length >= cap) break;
    const author = item.authorDid;
    const count = author ? authorCounts.get(author) ?? 0 : 0;
    if (author && count >= limits.perAuthorCap) {
      skippedByAuthorCap++;
      continue;
    }
    queue.push({ kind: "organic", item });
    if (author) authorCounts.set(author, count + 1);
  }

  return { queue, authorCounts, skippedByAuthorCap };
}

/** Pinned post at PINNED_INDEX, or last when the queue is shorter; then cut back to totalCap. */
export function injectPinned(queue: QueueEntry[], pinned: ActionableItem, totalCap: number): QueueEntry[] {
  const idx = Math.min(PINNED_INDEX, queue.length);
  const next: QueueEntry[] = [...queue.slice(0, idx), { kind: "pinned", item: pinned }, ...queue.slice(idx)];
  return next.slice(0, Math.max(0, totalCap));
}
