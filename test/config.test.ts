import { describe, expect, it } from "vitest";
import { configFromEnv, configure, defaults, getConfig, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig().scheduler).toEqual({
      perTaskTimeoutMs: 300_000,
      maxRetries: 2,
      maxTotalIterations: 50,
      maxConcurrency: 3,
      retryBaseDelayMs: 0,
      retryMaxDelayMs: 10_000,
    });
    expect(getConfig().activity.maxEvents).toBe(500);
  });

  it("merges overrides field by field", () => {
    configure({ scheduler: { maxRetries: 5 }, planner: { maxAttempts: 4 } });

    expect(getConfig().scheduler.maxRetries).toBe(5);
    expect(getConfig().scheduler.maxConcurrency).toBe(3);
    expect(getConfig().planner).toEqual({ maxAttempts: 4, baseDelayMs: 500 });
  });

  it("merges over the defaults, not the previous overrides", () => {
    configure({ scheduler: { maxRetries: 5 } });
    configure({ scheduler: { maxConcurrency: 1 } });

    expect(getConfig().scheduler.maxRetries).toBe(2);
    expect(getConfig().scheduler.maxConcurrency).toBe(1);
  });

  it("rejects invalid values", () => {
    expect(() => configure({ scheduler: { maxConcurrency: 0 } })).toThrow(ConfigError);
    expect(() => configure({ scheduler: { maxRetries: -1 } })).toThrow("Invalid configuration: scheduler.maxRetries");
  });

  it("resets to the defaults", () => {
    configure({ activity: { maxEvents: 10 } });
    resetConfig();
    expect(getConfig()).toEqual(defaults);
  });
});

describe("configFromEnv", () => {
  it("reads the supported variables", () => {
    const overrides = configFromEnv({
      TGE_TASK_TIMEOUT_MS: "1000",
      TGE_MAX_RETRIES: "0",
      TGE_MAX_CONCURRENCY: "8",
      TGE_LOG_LEVEL: "debug",
      TGE_DB_PATH: "/tmp/reports.db",
    });

    expect(overrides).toEqual({
      scheduler: {
        perTaskTimeoutMs: 1000,
        maxRetries: 0,
        maxTotalIterations: undefined,
        maxConcurrency: 8,
      },
      logging: { level: "debug" },
      persistence: { dbPath: "/tmp/reports.db" },
    });
  });

  it("leaves the config alone when nothing is set", () => {
    configure(configFromEnv({}));
    expect(getConfig()).toEqual(defaults);
  });

  it("rejects non-integer numbers", () => {
    expect(() => configFromEnv({ TGE_MAX_RETRIES: "two" })).toThrow('TGE_MAX_RETRIES must be an integer, got "two"');
  });

  it("rejects unknown log levels", () => {
    expect(() => configFromEnv({ TGE_LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});
