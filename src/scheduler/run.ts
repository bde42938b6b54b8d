import type { BskyApi, SourcedItem } from "../types/index.js";
import type { RepostConfig } from "../config/repost-config.js";
import type { RunStateStore } from "../memory/store.js";
import { IdentifierNormalizer } from "../bsky/identity.js";
import { Blocklist } from "../policy/blocklist.js";
import { ContentPolicy } from "../policy/filter.js";
import { createSources, type SourceFetchResult } from "../sources/index.js";
import { aggregate, type SkipReason } from "./aggregate.js";
import { buildQueue, injectPinned } from "./queue.js";
import { PinnedCycler, type PinnedOutcome, type RetractOutcome } from "./pinned.js";
import { executeQueue, type ExecutionReport } from "./execute.js";
import { computeWindow, describeWindow, type TimeWindow } from "./window.js";
import { errorMessage, withPrefix, type Logger } from "../logger.js";

export interface RunDeps {
  api: BskyApi;
  config: RepostConfig;
  store: RunStateStore;
  logger: Logger;
  dryRun?: boolean;
  /** Clock and pacing, overridable for tests. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunSummary {
  window: TimeWindow;
  sources: Array<Pick<SourceFetchResult, "source" | "kind" | "ok" | "error"> & { items: number }>;
  collected: number;
  candidates: number;
  skipped: Partial<Record<SkipReason | "author-cap", number>>;
  queueSize: number;
  pinned: PinnedOutcome;
  retraction: RetractOutcome;
  execution: ExecutionReport;
  historySize: number;
  persisted: boolean;
}

/**
 * One bounded pass: resolve sources, cycle the pinned post, collect, filter,
 * dedup, queue, repost, and persist state once at the end.
 */
export async function runOnce(deps: RunDeps): Promise<RunSummary> {
  const { api, config, store } = deps;
  const dryRun = deps.dryRun ?? false;
  const now = deps.now ?? Date.now;
  const runLog = withPrefix(deps.logger, "RUN");
  const sourceLog = withPrefix(deps.logger, "SOURCE");

  const window = computeWindow({
    now: now(),
    lastRunTime: store.getLastRunTime(),
    overlapMinutes: config.overlapMinutes,
    fallbackHours: config.fallbackHoursFirstRun,
  });

  const normalizer = new IdentifierNormalizer(api, sourceLog);
  const feeds = await normalizer.normalizeAll(config.feeds, "feed");
  const lists = await normalizer.normalizeAll(config.lists, "lists");
  const blocklist = new Blocklist(config.blockedUsers);
  const policy = new ContentPolicy({ requiredTag: config.requiredTag, blocklist });

  runLog.info("window", { ...describeWindow(window), firstRun: store.getLastRunTime() === undefined });
  runLog.info("sources", {
    feeds: feeds.length,
    lists: lists.length,
    tags: config.hashtags.length,
    blocked: blocklist.size,
    pinned: config.pinnedRef !== "",
  });
  if (config.requiredTag === "" && feeds.length + lists.length > 0) {
    runLog.warn("required_tag is empty; feed and list items are not tag-filtered");
  }

  const cycler = new PinnedCycler({
    api,
    normalizer,
    policy,
    store,
    logger: withPrefix(deps.logger, "PINNED"),
    dryRun,
  });
  const pinned = await cycler.prepare(config.pinnedRef);

  const collected: SourcedItem[] = [];
  const sources: RunSummary["sources"] = [];
  for (const source of createSources(api, { feeds, lists, hashtags: config.hashtags }, config)) {
    const result = await source.safeFetch(sourceLog);
    collected.push(...result.items);
    sources.push({ source: result.source, kind: result.kind, ok: result.ok, error: result.error, items: result.items.length });
  }

  const excludeUris = new Set<string>();
  if (pinned.uri) excludeUris.add(pinned.uri);
  if (pinned.state === "ready") excludeUris.add(pinned.item.uri);

  const aggregated = aggregate(collected, {
    window,
    isProcessed: (uri) => store.hasProcessed(uri),
    policy,
    excludeUris,
  });

  const built = buildQueue(aggregated.candidates, {
    totalCap: config.maxTotalPerRun,
    perAuthorCap: config.maxPerAuthorPerRun,
    reservePinnedSlot: config.pinnedRef !== "",
  });
  const queue = pinned.state === "ready" ? injectPinned(built.queue, pinned.item, config.maxTotalPerRun) : built.queue;

  runLog.info("queue built", {
    collected: collected.length,
    candidates: aggregated.candidates.length,
    queueSize: queue.length,
    maxTotal: config.maxTotalPerRun,
    pinned: pinned.state,
  });

  const execution = await executeQueue(
    queue,
    { api, store, logger: withPrefix(deps.logger, "REPOST") },
    {
      delayMs: config.delaySeconds * 1000,
      likeOnRepost: config.likeOnRepost,
      dryRun,
      sleep: deps.sleep,
    }
  );

  let persisted = false;
  if (dryRun) {
    runLog.info("dry run: state not persisted");
  } else {
    store.setLastRunTime(window.end);
    try {
      await store.save();
      persisted = true;
    } catch (err) {
      runLog.error("state save failed", { path: store.path, error: errorMessage(err) });
    }
  }

  const summary: RunSummary = {
    window,
    sources,
    collected: collected.length,
    candidates: aggregated.candidates.length,
    skipped: { ...aggregated.skipped, "author-cap": built.skippedByAuthorCap },
    queueSize: queue.length,
    pinned,
    retraction: cycler.retractOutcome,
    execution,
    historySize: store.processedCount,
    persisted,
  };

  runLog.info("done", {
    reposted: execution.reposted,
    failed: execution.failed,
    skipped: summary.skipped,
    queueSize: summary.queueSize,
    history: summary.historySize,
  });

  return summary;
}
