import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { errorMessage, type Logger } from "../logger.js";

/**
 * On-disk shape (state.json). Each field falls back on its own so a partly
 * damaged file still keeps what is readable.
 */
export const StateFileSchema = z.object({
  reposted_uris: z
    .array(z.unknown())
    .transform((values) => values.filter((v): v is string => typeof v === "string" && v.trim() !== ""))
    .catch([]),
  single_repost_record_uri: z.string().trim().catch(""),
  last_run_iso: z.string().trim().catch(""),
});
export type StateFile = z.infer<typeof StateFileSchema>;

export interface RunState {
  /** ISO timestamp of the previous completed run. */
  lastRunAt?: string;
  /** Oldest first. Never contains the pinned post. */
  processedUris: string[];
  /** AT-URI of the pinned repost record to retract next run; "" when none. */
  pinnedRepostUri: string;
}

export const DEFAULT_MAX_URIS = 8000;

export interface RunStateStoreConfig {
  filePath: string;
  /** Retention ceiling for processed URIs; oldest are evicted first. */
  maxUris?: number;
  logger?: Logger;
}

export class RunStateStore {
  private lastRunAt: string | undefined;
  /** Set iteration order is insertion order, which makes it the eviction queue. */
  private processed = new Set<string>();
  private pinnedRepostUri = "";
  private readonly filePath: string;
  private readonly maxUris: number;
  private readonly logger?: Logger;

  constructor(config: RunStateStoreConfig) {
    this.filePath = config.filePath;
    this.maxUris = Math.max(1, config.maxUris ?? DEFAULT_MAX_URIS);
    this.logger = config.logger;
  }

  get path(): string {
    return this.filePath;
  }

  /** Missing, empty or corrupt files leave the store at its empty defaults. */
  async load(): Promise<void> {
    this.reset();
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code !== "ENOENT") {
        this.logger?.warn("state file unreadable; starting empty", { path: this.filePath, error: errorMessage(err) });
      }
      return;
    }
    if (!raw.trim()) return;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.logger?.warn("could not parse state; starting empty", { path: this.filePath, error: errorMessage(err) });
      return;
    }
    const parsed = StateFileSchema.safeParse(data);
    if (!parsed.success) {
      this.logger?.warn("state is not a JSON object; starting empty", { path: this.filePath });
      return;
    }
    this.restore(parsed.data);
  }

  /** Atomic replace: write a temp file next to the target, then rename over it. */
  async save(): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmp, JSON.stringify(this.toFile(), null, 2), "utf-8");
    await rename(tmp, this.filePath);
  }

  private reset(): void {
    this.lastRunAt = undefined;
    this.processed = new Set();
    this.pinnedRepostUri = "";
  }

  private restore(file: StateFile): void {
    this.lastRunAt = Number.isNaN(Date.parse(file.last_run_iso)) ? undefined : file.last_run_iso;
    for (const uri of file.reposted_uris) this.processed.add(uri);
    this.evict();
    this.pinnedRepostUri = file.single_repost_record_uri;
  }

  toFile(): StateFile {
    return {
      reposted_uris: [...this.processed],
      single_repost_record_uri: this.pinnedRepostUri,
      last_run_iso: this.lastRunAt ?? "",
    };
  }

  snapshot(): RunState {
    return {
      lastRunAt: this.lastRunAt,
      processedUris: [...this.processed],
      pinnedRepostUri: this.pinnedRepostUri,
    };
  }

  private evict(): void {
    while (this.processed.size > this.maxUris) {
      const oldest = this.processed.values().next();
      if (oldest.done) break;
      this.processed.delete(oldest.value);
    }
  }

  /** Epoch ms of the previous run; undefined on first run. */
  getLastRunTime(): number | undefined {
    return this.lastRunAt === undefined ? undefined : Date.parse(this.lastRunAt);
  }

  setLastRunTime(ms: number): void {
    this.lastRunAt = new Date(ms).toISOString();
  }

  hasProcessed(uri: string): boolean {
    return this.processed.has(uri);
  }

  /** Already-tracked URIs keep their original position in the eviction order. */
  markProcessed(uri: string): void {
    if (this.processed.has(uri)) return;
    this.processed.add(uri);
    this.evict();
  }

  get processedCount(): number {
    return this.processed.size;
  }

  getPinnedRepostUri(): string {
    return this.pinnedRepostUri;
  }

  setPinnedRepostUri(uri: string): void {
    this.pinnedRepostUri = uri;
  }

  clearPinnedRepostUri(): void {
    this.pinnedRepostUri = "";
  }
}
