import { describe, it, expect } from "vitest";
import { loadEnv } from "../../src/config/env.js";

const base = { BSKY_USERNAME: "bot.test", BSKY_PASSWORD: "test-password" };

describe("loadEnv", () => {
  it("applies defaults", () => {
    expect(loadEnv(base)).toEqual({
      BSKY_USERNAME: "bot.test",
      BSKY_PASSWORD: "test-password",
      BSKY_SERVICE_URL: undefined,
      CONFIG_PATH: "config.json",
      STATE_PATH: "state.json",
      LOG_LEVEL: "info",
      LOGIN_MAX_ATTEMPTS: 3,
      LOGIN_RETRY_DELAY_SECONDS: 10,
      DRY_RUN: false,
      KILL_SWITCH: false,
    });
  });

  it("requires credentials", () => {
    expect(() => loadEnv({ BSKY_PASSWORD: "test-password" })).toThrow("Missing required env: BSKY_USERNAME");
    expect(() => loadEnv({ BSKY_USERNAME: "bot.test", BSKY_PASSWORD: "  " })).toThrow(
      "Missing required env: BSKY_PASSWORD"
    );
  });

  it("reads overrides", () => {
    const env = loadEnv({
      ...base,
      BSKY_SERVICE_URL: "https://pds.test",
      STATE_PATH: "/data/state.json",
      LOG_LEVEL: "DEBUG",
      LOGIN_MAX_ATTEMPTS: "0",
      LOGIN_RETRY_DELAY_SECONDS: "2.5",
      DRY_RUN: "TRUE",
      KILL_SWITCH: "1",
    });
    expect(env).toMatchObject({
      BSKY_SERVICE_URL: "https://pds.test",
      STATE_PATH: "/data/state.json",
      LOG_LEVEL: "debug",
      LOGIN_MAX_ATTEMPTS: 1,
      LOGIN_RETRY_DELAY_SECONDS: 2.5,
      DRY_RUN: true,
      KILL_SWITCH: true,
    });
  });

  it("ignores unknown log levels and rejects bad numbers", () => {
    expect(loadEnv({ ...base, LOG_LEVEL: "loud", DRY_RUN: "no" })).toMatchObject({ LOG_LEVEL: "info", DRY_RUN: false });
    expect(() => loadEnv({ ...base, LOGIN_MAX_ATTEMPTS: "many" })).toThrow(
      "Invalid number for env LOGIN_MAX_ATTEMPTS: many"
    );
  });
});
