// Tilt Stabilizer - Logging
// Console logging tagged with level and component: "[WARN] [StabilizationSession] ..."

import type { LogLevel } from "./types.js";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let minimumLevel: LogLevel = "info";

/** Sets the process-wide minimum level for console loggers. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel];
}

export function createConsoleLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`${prefix("DEBUG")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("INFO")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("WARN")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("ERROR")} ${msg}`, ...args);
    },
  };
}
