/**
 * Print a summary of the persisted run state (state.json).
 *
 * Usage: npm run state:show [-- --all]
 */
import "dotenv/config";
import { RunStateStore } from "../memory/index.js";
import { createLogger } from "../logger.js";

async function main(): Promise<void> {
  const filePath = process.env.STATE_PATH || "state.json";
  const store = new RunStateStore({ filePath, logger: createLogger("warn") });
  await store.load();
  const state = store.snapshot();
  const showAll = process.argv.includes("--all");

  console.log("State file:", filePath);
  console.log("Last run:", state.lastRunAt ?? "(never)");
  console.log("Pinned repost record:", state.pinnedRepostUri || "(none)");
  console.log("Tracked URIs:", state.processedUris.length);
  const shown = showAll ? state.processedUris : state.processedUris.slice(-10);
  if (shown.length > 0) {
    console.log(showAll ? "All tracked URIs (oldest first):" : "Most recent 10:");
    for (const uri of shown) console.log("  " + uri);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
