export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export type Logger = {
  error: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  debug: (message: string, ...details: unknown[]) => void;
};

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[currentLevel];
}

/**
 * Console logger tagged with `[scope]`. The level is read on every call so
 * loggers created at import time follow later `setLogLevel` calls.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    error: (message, ...details) => {
      if (enabled("error")) {
        console.error(prefix, message, ...details);
      }
    },
    warn: (message, ...details) => {
      if (enabled("warn")) {
        console.warn(prefix, message, ...details);
      }
    },
    info: (message, ...details) => {
      if (enabled("info")) {
        console.info(prefix, message, ...details);
      }
    },
    debug: (message, ...details) => {
      if (enabled("debug")) {
        console.debug(prefix, message, ...details);
      }
    }
  };
}
