import {
  DEFAULT_OPTIONS,
  MAX_POLLING_INTERVAL_MS,
  createChangeEvent,
  isValidInterval,
  resolveOptions,
  sameState,
  validateChangeEvent,
  validateClipboardOptions,
} from "../index";

describe("Data-model sanity", () => {
  it("creates a frozen change event", () => {
    const event = createChangeEvent({ hasText: true, hasImage: false, hasOwnership: true }, 1_700_000_000_000);
    expect(event).toEqual({ timestamp: 1_700_000_000_000, hasText: true, hasImage: false, hasOwnership: true });
    expect(Object.isFrozen(event)).toBe(true);
    expect(validateChangeEvent(event)).toBe(true);
  });

  it("compares every observed flag", () => {
    const base = { hasText: true, hasImage: false, hasOwnership: false };
    expect(sameState(base, { ...base })).toBe(true);
    expect(sameState(base, { ...base, hasImage: true })).toBe(false);
    expect(sameState(base, { ...base, hasOwnership: true })).toBe(false);
  });

  it("ships valid defaults", () => {
    expect(DEFAULT_OPTIONS).toEqual({
      pollingInterval: 100,
      changeDetectionEnabled: true,
      maxDataSize: 10 * 1024 * 1024,
      trimWhitespace: false,
    });
    expect(validateClipboardOptions(DEFAULT_OPTIONS)).toBe(true);
  });

  it("resolves partial options over the defaults and freezes them", () => {
    const options = resolveOptions({ pollingInterval: 1000, changeDetectionEnabled: false, maxDataSize: 1024, trimWhitespace: true });
    expect(options).toEqual({ pollingInterval: 1000, changeDetectionEnabled: false, maxDataSize: 1024, trimWhitespace: true });
    expect(Object.isFrozen(options)).toBe(true);
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it("rejects invalid options", () => {
    expect(() => resolveOptions({ pollingInterval: 0 })).toThrow(RangeError);
    expect(() => resolveOptions({ pollingInterval: Number.POSITIVE_INFINITY })).toThrow(RangeError);
    expect(() => resolveOptions({ maxDataSize: -1 })).toThrow(RangeError);
    expect(() => resolveOptions({ maxDataSize: 1.5 })).toThrow(RangeError);
  });

  it("caps the polling interval at the longest timer delay", () => {
    expect(resolveOptions({ pollingInterval: MAX_POLLING_INTERVAL_MS }).pollingInterval).toBe(2_147_483_647);
    expect(() => resolveOptions({ pollingInterval: MAX_POLLING_INTERVAL_MS + 1 })).toThrow(
      "pollingInterval must be between 1 and 2147483647 milliseconds, got 2147483648"
    );
    expect(isValidInterval(3_000_000_000)).toBe(false);
  });
});
