/**
 * Environment-driven configuration.
 */
import { isLogLevel, type LogLevel } from "./logger";
import type { ClipboardOptions } from "./models/ClipboardOptions";

export const ENV = {
  pollingInterval: "CLIPBRIDGE_POLL_INTERVAL_MS",
  changeDetectionEnabled: "CLIPBRIDGE_CHANGE_DETECTION",
  maxDataSize: "CLIPBRIDGE_MAX_DATA_SIZE",
  trimWhitespace: "CLIPBRIDGE_TRIM_WHITESPACE",
  logLevel: "CLIPBRIDGE_LOG_LEVEL",
} as const;

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new TypeError(`${name} must be a boolean (true/false), got "${raw}"`);
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new TypeError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Reads the options that are set in `env`; unset variables are left out so
 * that {@link resolveOptions} applies its defaults.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClipboardOptions> {
  const options: Partial<ClipboardOptions> = {};
  const interval = env[ENV.pollingInterval];
  if (interval !== undefined) options.pollingInterval = parseNumber(ENV.pollingInterval, interval);
  const detection = env[ENV.changeDetectionEnabled];
  if (detection !== undefined) options.changeDetectionEnabled = parseBoolean(ENV.changeDetectionEnabled, detection);
  const maxSize = env[ENV.maxDataSize];
  if (maxSize !== undefined) options.maxDataSize = parseNumber(ENV.maxDataSize, maxSize);
  const trim = env[ENV.trimWhitespace];
  if (trim !== undefined) options.trimWhitespace = parseBoolean(ENV.trimWhitespace, trim);
  return options;
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env[ENV.logLevel]?.trim().toLowerCase();
  if (!raw) return undefined;
  return isLogLevel(raw) ? raw : undefined;
}
