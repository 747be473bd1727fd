// Face Verification Service - Console logging
// Level-prefixed lines: `[LEVEL] [Component] message`.

import type { LogLevel } from "./types.js";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLevel: LogLevel = "info";

/** Set the minimum level for loggers created by createConsoleLogger. */
export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[globalLevel];
}

export function createConsoleLogger(component: string): Logger {
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(`[DEBUG] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`[INFO] [${component}] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`[WARN] [${component}] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`[ERROR] [${component}] ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
