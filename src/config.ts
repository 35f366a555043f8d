import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigError } from "./errors.js";
import { ConfigOverridesSchema, LogLevelSchema, type ConfigOverrides } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type EngineConfig = {
  scheduler: {
    /** Deadline for a single delegate call. */
    perTaskTimeoutMs: number;
    maxRetries: number;
    /** Hard ceiling on scheduling passes per run. */
    maxTotalIterations: number;
    /** Tasks dispatched per pass. */
    maxConcurrency: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  planner: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  activity: {
    maxEvents: number;
  };
  persistence: {
    dbPath: string;
  };
  logging: {
    level: LogLevel;
  };
};

export type { ConfigOverrides };

const DEFAULTS: EngineConfig = {
  scheduler: {
    perTaskTimeoutMs: 300_000, // 5 minutes
    maxRetries: 2,
    maxTotalIterations: 50,
    maxConcurrency: 3,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 10_000,
  },
  planner: {
    maxAttempts: 2,
    baseDelayMs: 500,
  },
  activity: {
    maxEvents: 500,
  },
  persistence: {
    dbPath: join(homedir(), ".task-graph-engine", "reports.db"),
  },
  logging: {
    level: "info",
  },
};

let current: EngineConfig = structuredClone(DEFAULTS);

function merge(base: EngineConfig, o: ConfigOverrides): EngineConfig {
  const s = o.scheduler ?? {};
  return {
    scheduler: {
      perTaskTimeoutMs: s.perTaskTimeoutMs ?? base.scheduler.perTaskTimeoutMs,
      maxRetries: s.maxRetries ?? base.scheduler.maxRetries,
      maxTotalIterations: s.maxTotalIterations ?? base.scheduler.maxTotalIterations,
      maxConcurrency: s.maxConcurrency ?? base.scheduler.maxConcurrency,
      retryBaseDelayMs: s.retryBaseDelayMs ?? base.scheduler.retryBaseDelayMs,
      retryMaxDelayMs: s.retryMaxDelayMs ?? base.scheduler.retryMaxDelayMs,
    },
    planner: {
      maxAttempts: o.planner?.maxAttempts ?? base.planner.maxAttempts,
      baseDelayMs: o.planner?.baseDelayMs ?? base.planner.baseDelayMs,
    },
    activity: {
      maxEvents: o.activity?.maxEvents ?? base.activity.maxEvents,
    },
    persistence: {
      dbPath: o.persistence?.dbPath ?? base.persistence.dbPath,
    },
    logging: {
      level: o.logging?.level ?? base.logging.level,
    },
  };
}

/** Override config values. Each section is merged over the defaults. */
export function configure(overrides: ConfigOverrides): void {
  const result = ConfigOverridesSchema.safeParse(overrides);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${msg}`);
  }
  current = merge(DEFAULTS, result.data);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));

function intFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

/** Read overrides from `TGE_*` environment variables. Unset variables stay undefined. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {
    scheduler: {
      perTaskTimeoutMs: intFromEnv(env, "TGE_TASK_TIMEOUT_MS"),
      maxRetries: intFromEnv(env, "TGE_MAX_RETRIES"),
      maxTotalIterations: intFromEnv(env, "TGE_MAX_ITERATIONS"),
      maxConcurrency: intFromEnv(env, "TGE_MAX_CONCURRENCY"),
    },
  };

  const level = env.TGE_LOG_LEVEL;
  if (level) {
    const parsed = LogLevelSchema.safeParse(level);
    if (!parsed.success) {
      throw new ConfigError("TGE_LOG_LEVEL must be one of debug, info, warn, error, silent");
    }
    overrides.logging = { level: parsed.data };
  }
  if (env.TGE_DB_PATH) overrides.persistence = { dbPath: env.TGE_DB_PATH };

  return overrides;
}
