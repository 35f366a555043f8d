export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type Data = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, scope: string | undefined, msg: string, data?: Data): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}]${scope ? ` [${scope}]` : ""} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export type Logger = {
  debug(msg: string, data?: Data): void;
  info(msg: string, data?: Data): void;
  warn(msg: string, data?: Data): void;
  error(msg: string, data?: Data): void;
  /** A logger whose lines carry `[scope]` after the level. */
  child(scope: string): Logger;
};

function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", scope, msg, data));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", scope, msg, data));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", scope, msg, data));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", scope, msg, data));
    },
    child(child) {
      return createLogger(scope ? `${scope}:${child}` : child);
    },
  };
}

export const log: Logger = createLogger();
