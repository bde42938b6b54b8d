/**
 * Login with a bounded retry loop: fixed attempt count, fixed delay between attempts.
 * Exhausting the attempts is a fatal startup error for the caller.
 */
import type { Session } from "../types/bsky.js";
import { errorMessage, type Logger } from "../logger.js";

export interface LoginOptions {
  identifier: string;
  password: string;
  maxAttempts: number;
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function loginWithRetry(
  client: { login(identifier: string, password: string): Promise<Session> },
  options: LoginOptions,
  logger: Logger
): Promise<{ ok: true; session: Session; attempts: number } | { ok: false; error: string; attempts: number }> {
  const pause = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError = "login failed";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const session = await client.login(options.identifier, options.password);
      return { ok: true, session, attempts: attempt };
    } catch (err) {
      lastError = errorMessage(err);
      logger.warn("login attempt failed", { attempt, maxAttempts, error: lastError });
      if (attempt < maxAttempts) await pause(options.retryDelayMs);
    }
  }
  return { ok: false, error: lastError, attempts: maxAttempts };
}
