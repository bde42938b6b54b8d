/**
 * Reposts queue entries one at a time with a fixed pause between attempts.
 * A failure is logged and the loop moves on; only successes touch run state.
 */
import type { BskyApi } from "../types/index.js";
import type { RunStateStore } from "../memory/store.js";
import type { QueueEntry } from "./queue.js";
import { errorMessage, type Logger } from "../logger.js";

export interface ExecuteOptions {
  delayMs: number;
  likeOnRepost: boolean;
  dryRun: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface ItemOutcome {
  uri: string;
  kind: QueueEntry["kind"];
  ok: boolean;
  /** AT-URI of the repost record on success. */
  record?: string;
  error?: string;
}

export interface ExecutionReport {
  attempted: number;
  reposted: number;
  failed: number;
  liked: number;
  likeFailed: number;
  pinnedReposted: boolean;
  outcomes: ItemOutcome[];
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function executeQueue(
  queue: QueueEntry[],
  deps: { api: BskyApi; store: RunStateStore; logger: Logger },
  options: ExecuteOptions
): Promise<ExecutionReport> {
  const { api, store, logger } = deps;
  const pause = options.sleep ?? sleep;
  const report: ExecutionReport = {
    attempted: 0,
    reposted: 0,
    failed: 0,
    liked: 0,
    likeFailed: 0,
    pinnedReposted: false,
    outcomes: [],
  };

  for (const [i, entry] of queue.entries()) {
    const { item } = entry;
    const position = String(i + 1).padStart(2, "0");
    const subject = { uri: item.uri, cid: item.cid };

    if (options.dryRun) {
      logger.info(`dry run: ${position} would repost`, { uri: item.uri, by: item.authorHandle, kind: entry.kind });
      report.outcomes.push({ uri: item.uri, kind: entry.kind, ok: true });
      continue;
    }

    report.attempted++;
    try {
      const record = await api.repost(subject);
      report.reposted++;
      report.outcomes.push({ uri: item.uri, kind: entry.kind, ok: true, record });
      logger.info(`${position} reposted`, { uri: item.uri, by: item.authorHandle, kind: entry.kind });

      if (entry.kind === "pinned") {
        store.setPinnedRepostUri(record);
        report.pinnedReposted = true;
      } else {
        store.markProcessed(item.uri);
        if (options.likeOnRepost) {
          try {
            await api.like(subject);
            report.liked++;
          } catch (err) {
            report.likeFailed++;
            logger.warn(`${position} like failed`, { uri: item.uri, error: errorMessage(err) });
          }
        }
      }
    } catch (err) {
      const error = errorMessage(err);
      report.failed++;
      report.outcomes.push({ uri: item.uri, kind: entry.kind, ok: false, error });
      logger.warn(`${position} repost failed`, { uri: item.uri, error });
    }

    if (i < queue.length - 1 && options.delayMs > 0) {
      await pause(options.delayMs);
    }
  }

  return report;
}
