/**
 * Config document (config.json). Keys stay snake_case for file compatibility;
 * each field falls back to its default on its own, so one bad value never
 * discards the rest of the file.
 */
import { readFile } from "fs/promises";
import { z } from "zod";
import { errorMessage, type Logger } from "../logger.js";

/** Keeps only non-empty trimmed strings. */
export function normList(values: unknown[]): string[] {
  const out: string[] = [];
  for (const v of values) {
    if (typeof v !== "string") continue;
    const t = v.trim();
    if (t) out.push(t);
  }
  return out;
}

const stringList = z.array(z.unknown()).transform(normList).catch([]);

const numberField = (defaultVal: number, opts: { int?: boolean; min?: number } = {}) =>
  z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite())
    .transform((n) => (opts.int ? Math.trunc(n) : n))
    .refine((n) => n >= (opts.min ?? 0))
    .catch(defaultVal);

export const ConfigFileSchema = z.object({
  feeds: stringList,
  lists: stringList,
  hashtags: stringList,
  single_post_uri: z.string().trim().catch(""),
  blocked_users: stringList,
  required_tag: z
    .string()
    .trim()
    .transform((t) => t.replace(/^#+/, ""))
    .catch(""),
  like_on_repost: z.boolean().catch(false),
  max_total_per_run: numberField(100, { int: true }),
  max_per_author_per_run: numberField(3, { int: true }),
  delay_seconds: numberField(2),
  fetch_limit_per_feed: numberField(50, { int: true, min: 1 }),
  fetch_limit_per_list: numberField(50, { int: true, min: 1 }),
  search_limit_per_tag: numberField(50, { int: true, min: 1 }),
  overlap_minutes: numberField(15),
  fallback_hours_first_run: numberField(3),
  state_max_uris: numberField(8000, { int: true, min: 1 }),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface RepostConfig {
  feeds: string[];
  lists: string[];
  hashtags: string[];
  /** Raw pinned reference; "" when none is configured. */
  pinnedRef: string;
  blockedUsers: string[];
  /** Tag required on feed/list items, without "#"; "" disables the rule. */
  requiredTag: string;
  likeOnRepost: boolean;
  maxTotalPerRun: number;
  maxPerAuthorPerRun: number;
  delaySeconds: number;
  fetchLimitPerFeed: number;
  fetchLimitPerList: number;
  searchLimitPerTag: number;
  overlapMinutes: number;
  fallbackHoursFirstRun: number;
  stateMaxUris: number;
}

export function toRepostConfig(file: ConfigFile): RepostConfig {
  return {
    feeds: file.feeds,
    lists: file.lists,
    hashtags: file.hashtags,
    pinnedRef: file.single_post_uri,
    blockedUsers: file.blocked_users,
    requiredTag: file.required_tag,
    likeOnRepost: file.like_on_repost,
    maxTotalPerRun: file.max_total_per_run,
    maxPerAuthorPerRun: file.max_per_author_per_run,
    delaySeconds: file.delay_seconds,
    fetchLimitPerFeed: file.fetch_limit_per_feed,
    fetchLimitPerList: file.fetch_limit_per_list,
    searchLimitPerTag: file.search_limit_per_tag,
    overlapMinutes: file.overlap_minutes,
    fallbackHoursFirstRun: file.fallback_hours_first_run,
    stateMaxUris: file.state_max_uris,
  };
}

/** Parse an already-decoded document; anything that is not an object yields all defaults. */
export function parseRepostConfig(data: unknown): RepostConfig {
  const result = ConfigFileSchema.safeParse(data);
  if (result.success) return toRepostConfig(result.data);
  return toRepostConfig(ConfigFileSchema.parse({}));
}

export function defaultRepostConfig(): RepostConfig {
  return parseRepostConfig({});
}

/** Missing, empty or unparsable file falls back to defaults with a warning. */
export async function loadRepostConfig(filePath: string, logger: Logger): Promise<RepostConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      logger.warn("config file not found; using defaults", { path: filePath });
    } else {
      logger.warn("config file unreadable; using defaults", { path: filePath, error: errorMessage(err) });
    }
    return defaultRepostConfig();
  }
  if (!raw.trim()) {
    logger.warn("config file empty; using defaults", { path: filePath });
    return defaultRepostConfig();
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    logger.warn("could not parse config; using defaults", { path: filePath, error: errorMessage(err) });
    return defaultRepostConfig();
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    logger.warn("config is not a JSON object; using defaults", { path: filePath });
    return defaultRepostConfig();
  }
  return parseRepostConfig(data);
}
