export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(order, value);
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[currentLevel];
}

export function debug(...args: unknown[]) {
  if (shouldLog("debug")) console.debug(...args);
}

export function info(...args: unknown[]) {
  if (shouldLog("info")) console.info(...args);
}

export function warn(...args: unknown[]) {
  if (shouldLog("warn")) console.warn(...args);
}

export function error(...args: unknown[]) {
  if (shouldLog("error")) console.error(...args);
}

export const defaultLogger: Logger = { debug, info, warn, error };

/**
 * Prefixes every message with `[scope]`, e.g. `[clipboard] Polling started`.
 */
export function scopedLogger(scope: string, base: Logger = defaultLogger): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => base.debug(prefix, ...args),
    info: (...args) => base.info(prefix, ...args),
    warn: (...args) => base.warn(prefix, ...args),
    error: (...args) => base.error(prefix, ...args),
  };
}
