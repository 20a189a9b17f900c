/**
 * Tagged console logging
 *
 * Every module logs through a logger created with its tag, so messages read
 * `[Tag] message`. A single process-wide level filters them.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

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

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
