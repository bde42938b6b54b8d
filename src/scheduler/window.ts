/**
 * Inclusion window for one run: [lastRun - overlap, now], or
 * [now - fallback, now] when there is no previous run.
 */
export interface TimeWindow {
  /** Epoch ms, inclusive. */
  start: number;
  /** Epoch ms, inclusive. */
  end: number;
}

export interface WindowOptions {
  now: number;
  lastRunTime?: number;
  overlapMinutes: number;
  fallbackHours: number;
}

export function computeWindow({ now, lastRunTime, overlapMinutes, fallbackHours }: WindowOptions): TimeWindow {
  const start = lastRunTime === undefined ? now - fallbackHours * 3_600_000 : lastRunTime - overlapMinutes * 60_000;
  return { start, end: now };
}

/** Items without a timestamp are never in the window. */
export function isWithinWindow(timestamp: number | undefined, window: TimeWindow): boolean {
  if (timestamp === undefined || timestamp <= 0) return false;
  return window.start <= timestamp && timestamp <= window.end;
}

export function describeWindow(window: TimeWindow): { start: string; end: string } {
  return { start: new Date(window.start).toISOString(), end: new Date(window.end).toISOString() };
}
