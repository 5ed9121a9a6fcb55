/**
 * Configuration accepted by a clipboard session.
 */
export interface ClipboardOptions {
  /** Delay between native polls (ms). */
  pollingInterval: number;
  /** When false, starting monitoring is a no-op. */
  changeDetectionEnabled: boolean;
  /** Largest text or image payload in bytes; 0 disables the limit. */
  maxDataSize: number;
  /** Trim both ends of text on set and get. */
  trimWhitespace: boolean;
}

export const DEFAULT_POLLING_INTERVAL_MS = 100;
export const DEFAULT_MAX_DATA_SIZE = 10 * 1024 * 1024; // 10 MiB
/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_POLLING_INTERVAL_MS = 2_147_483_647;

export const DEFAULT_OPTIONS: Readonly<ClipboardOptions> = Object.freeze({
  pollingInterval: DEFAULT_POLLING_INTERVAL_MS,
  changeDetectionEnabled: true,
  maxDataSize: DEFAULT_MAX_DATA_SIZE,
  trimWhitespace: false,
});

export function isValidInterval(ms: unknown): ms is number {
  return typeof ms === "number" && Number.isFinite(ms) && ms > 0 && ms <= MAX_POLLING_INTERVAL_MS;
}

/**
 * Validate a ClipboardOptions object.
 */
export function validateClipboardOptions(options: ClipboardOptions): boolean {
  return (
    isValidInterval(options.pollingInterval) &&
    typeof options.changeDetectionEnabled === "boolean" &&
    Number.isInteger(options.maxDataSize) &&
    options.maxDataSize >= 0 &&
    typeof options.trimWhitespace === "boolean"
  );
}

/**
 * Applies defaults, rejects invalid fields and freezes the result.
 */
export function resolveOptions(partial: Partial<ClipboardOptions> = {}): Readonly<ClipboardOptions> {
  const options: ClipboardOptions = {
    pollingInterval: partial.pollingInterval ?? DEFAULT_OPTIONS.pollingInterval,
    changeDetectionEnabled: partial.changeDetectionEnabled ?? DEFAULT_OPTIONS.changeDetectionEnabled,
    maxDataSize: partial.maxDataSize ?? DEFAULT_OPTIONS.maxDataSize,
    trimWhitespace: partial.trimWhitespace ?? DEFAULT_OPTIONS.trimWhitespace,
  };
  if (!isValidInterval(options.pollingInterval)) {
    throw new RangeError(`pollingInterval must be between 1 and ${MAX_POLLING_INTERVAL_MS} milliseconds, got ${options.pollingInterval}`);
  }
  if (!Number.isInteger(options.maxDataSize) || options.maxDataSize < 0) {
    throw new RangeError(`maxDataSize must be a non-negative integer, got ${options.maxDataSize}`);
  }
  if (!validateClipboardOptions(options)) {
    throw new TypeError("changeDetectionEnabled and trimWhitespace must be booleans");
  }
  return Object.freeze(options);
}
