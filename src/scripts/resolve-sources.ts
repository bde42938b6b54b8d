/**
 * Print the canonical AT-URI of every feed, list and pinned reference in the config.
 *
 * Usage: npm run sources:resolve
 */
import "dotenv/config";
import { loadEnv } from "../config/env.js";
import { loadRepostConfig } from "../config/repost-config.js";
import { BskyClient, IdentifierNormalizer, loginWithRetry, type RefSegment } from "../bsky/index.js";
import { createLogger } from "../logger.js";

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const config = await loadRepostConfig(env.CONFIG_PATH, logger);

  const client = new BskyClient({ serviceUrl: env.BSKY_SERVICE_URL });
  const login = await loginWithRetry(
    client,
    {
      identifier: env.BSKY_USERNAME,
      password: env.BSKY_PASSWORD,
      maxAttempts: env.LOGIN_MAX_ATTEMPTS,
      retryDelayMs: env.LOGIN_RETRY_DELAY_SECONDS * 1000,
    },
    logger
  );
  if (!login.ok) {
    console.error("Login failed:", login.error);
    process.exit(1);
  }

  const groups: Array<{ kind: string; refs: string[]; segment: RefSegment }> = [
    { kind: "feed", refs: config.feeds, segment: "feed" },
    { kind: "list", refs: config.lists, segment: "lists" },
    { kind: "pinned", refs: config.pinnedRef ? [config.pinnedRef] : [], segment: "post" },
  ];

  const normalizer = new IdentifierNormalizer(client, logger);
  const rows: Array<{ kind: string; input: string; resolved: string }> = [];
  for (const { kind, refs, segment } of groups) {
    for (const input of refs) {
      const result = await normalizer.normalize(input, segment);
      rows.push({ kind, input, resolved: result.ok ? result.uri : `(${result.reason})` });
    }
  }

  if (rows.length === 0) {
    console.log("No feeds, lists or pinned post configured in " + env.CONFIG_PATH);
    return;
  }
  console.table(rows);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
