export { runOnce, type RunDeps, type RunSummary } from "./run.js";
export { computeWindow, isWithinWindow, describeWindow, type TimeWindow, type WindowOptions } from "./window.js";
export { aggregate, type AggregateContext, type AggregateResult, type Candidate, type SkipReason } from "./aggregate.js";
export { buildQueue, injectPinned, PINNED_INDEX, type QueueEntry, type QueueLimits, type QueueResult } from "./queue.js";
export {
  PinnedCycler,
  type PinnedCyclerDeps,
  type PinnedOutcome,
  type PinnedSkipReason,
  type PinnedState,
  type RetractOutcome,
} from "./pinned.js";
export { executeQueue, sleep, type ExecuteOptions, type ExecutionReport, type ItemOutcome } from "./execute.js";
