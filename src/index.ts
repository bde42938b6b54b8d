#!/usr/bin/env node
/**
 * Bluesky repost bot.
 * One bounded pass per invocation: collect, filter, dedup, repost, persist, exit.
 */
import "dotenv/config";
import { loadEnv } from "./config/env.js";
import { loadRepostConfig } from "./config/repost-config.js";
import { BskyClient, loginWithRetry } from "./bsky/index.js";
import { RunStateStore } from "./memory/index.js";
import { runOnce } from "./scheduler/index.js";
import { createLogger, withPrefix } from "./logger.js";

async function main(): Promise<number> {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const processLog = withPrefix(logger, "PROCESS");

  if (env.KILL_SWITCH) {
    processLog.warn("KILL_SWITCH is enabled. Exiting.");
    return 0;
  }

  const config = await loadRepostConfig(env.CONFIG_PATH, processLog);
  const store = new RunStateStore({
    filePath: env.STATE_PATH,
    maxUris: config.stateMaxUris,
    logger: processLog,
  });
  await store.load();
  processLog.info("state loaded", {
    path: env.STATE_PATH,
    history: store.processedCount,
    lastRunAt: store.snapshot().lastRunAt ?? "(none)",
  });

  const client = new BskyClient({
    serviceUrl: env.BSKY_SERVICE_URL,
    onLog: (msg, meta) => logger.debug("[BSKY] " + msg, meta),
  });
  const login = await loginWithRetry(
    client,
    {
      identifier: env.BSKY_USERNAME,
      password: env.BSKY_PASSWORD,
      maxAttempts: env.LOGIN_MAX_ATTEMPTS,
      retryDelayMs: env.LOGIN_RETRY_DELAY_SECONDS * 1000,
    },
    processLog
  );
  if (!login.ok) {
    processLog.error("login failed", { attempts: login.attempts, error: login.error });
    return 1;
  }
  processLog.info("logged in", { handle: login.session.handle, did: login.session.did });

  const dryRun = env.DRY_RUN ?? false;
  const summary = await runOnce({ api: client, config, store, logger, dryRun });

  return summary.persisted || dryRun ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
