import type { EnvConfig } from "../types/index.js";
import { isLogLevel } from "../logger.js";

type Env = Record<string, string | undefined>;

const required = (env: Env, name: string): string => {
  const v = env[name]?.trim();
  if (v === undefined || v === "") {
    throw new Error(`Missing required env: ${name}`);
  }
  return v;
};

const num = (env: Env, name: string, defaultVal: number): number => {
  const v = env[name];
  if (v === undefined || v === "") return defaultVal;
  const n = Number(v);
  if (Number.isNaN(n)) throw new Error(`Invalid number for env ${name}: ${v}`);
  return n;
};

const bool = (env: Env, name: string, defaultVal: boolean): boolean => {
  const v = env[name];
  if (v === undefined || v === "") return defaultVal;
  return v.toLowerCase() === "true" || v === "1";
};

export function loadEnv(env: Env = process.env): EnvConfig {
  const level = (env.LOG_LEVEL ?? "info").toLowerCase();
  const attempts = Math.floor(num(env, "LOGIN_MAX_ATTEMPTS", 3));
  const retryDelay = num(env, "LOGIN_RETRY_DELAY_SECONDS", 10);

  return {
    BSKY_USERNAME: required(env, "BSKY_USERNAME"),
    BSKY_PASSWORD: required(env, "BSKY_PASSWORD"),
    BSKY_SERVICE_URL: env.BSKY_SERVICE_URL || undefined,
    CONFIG_PATH: env.CONFIG_PATH || "config.json",
    STATE_PATH: env.STATE_PATH || "state.json",
    LOG_LEVEL: isLogLevel(level) ? level : "info",
    LOGIN_MAX_ATTEMPTS: attempts < 1 ? 1 : attempts,
    LOGIN_RETRY_DELAY_SECONDS: retryDelay < 0 ? 0 : retryDelay,
    DRY_RUN: bool(env, "DRY_RUN", false),
    KILL_SWITCH: bool(env, "KILL_SWITCH", false),
  };
}
