/**
 * Structured logging for run progress and per-item outcomes.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  meta?: Record<string, unknown>;
}

export type LogFn = (msg: string, meta?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((l) => l === value);
}

export function format(entry: LogEntry): string {
  const meta = entry.meta ? ` ${JSON.stringify(entry.meta)}` : "";
  return `${entry.ts} [${entry.level}] ${entry.msg}${meta}`;
}

export function createLogger(level: LogLevel = "info", write: (line: string) => void = console.log): Logger {
  const levelIndex = LEVELS.indexOf(level);

  const log = (l: LogLevel, msg: string, meta?: Record<string, unknown>) => {
    if (LEVELS.indexOf(l) < levelIndex) return;
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level: l,
      msg,
      meta,
    };
    write(format(entry));
  };

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
}

/** Same logger with every message prefixed, e.g. "[SOURCE] ". */
export function withPrefix(logger: Logger, tag: string): Logger {
  const p = `[${tag}] `;
  return {
    debug: (msg, meta) => logger.debug(p + msg, meta),
    info: (msg, meta) => logger.info(p + msg, meta),
    warn: (msg, meta) => logger.warn(p + msg, meta),
    error: (msg, meta) => logger.error(p + msg, meta),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
