/**
 * Capability surface of the libclipboard native addon.
 *
 * The addon mirrors the C ABI one function per export: an opaque handle,
 * integer statuses (0 = success) and byte buffers. Buffers returned by
 * `clipboard_text` / `clipboard_image` are views over native memory and stay
 * owned by the addon until handed back to the paired `*_free` call.
 */

/** Opaque pointer to a native clipboard instance. */
export type NativeHandle = bigint;

const ALL_ONES_64 = 0xffff_ffff_ffff_ffffn;

/** Zero and all-ones are the invalid sentinels. */
export function isInvalidHandle(handle: NativeHandle): boolean {
  return handle === 0n || handle === -1n || handle === ALL_ONES_64;
}

export interface ClipboardBindings {
  /**
   * Create a clipboard instance.
   * @param options - Reserved; libclipboard takes no options through this surface.
   */
  clipboard_new(options: null): NativeHandle;
  /** Destroy a clipboard instance. */
  clipboard_free(handle: NativeHandle): void;

  /**
   * Place text on the clipboard.
   * @param text - UTF-8 bytes including the NUL terminator.
   */
  clipboard_set_text(handle: NativeHandle, text: Uint8Array): number;
  /** @returns NUL-terminated UTF-8 bytes, or null when no text is available. */
  clipboard_text(handle: NativeHandle): Uint8Array | null;
  clipboard_text_free(handle: NativeHandle, text: Uint8Array): void;

  clipboard_set_image(handle: NativeHandle, data: Uint8Array, length: number): number;
  /** @returns Image bytes (the view's length is the payload length), or null. */
  clipboard_image(handle: NativeHandle): Uint8Array | null;
  clipboard_image_free(handle: NativeHandle, data: Uint8Array): void;

  clipboard_has_text(handle: NativeHandle): number;
  clipboard_has_image(handle: NativeHandle): number;
  clipboard_has_ownership(handle: NativeHandle): number;

  /** @returns Non-zero when the clipboard changed since the previous poll. */
  clipboard_poll(handle: NativeHandle): number;
  clipboard_clear(handle: NativeHandle): number;
}

export const REQUIRED_EXPORTS = [
  "clipboard_new",
  "clipboard_free",
  "clipboard_set_text",
  "clipboard_text",
  "clipboard_text_free",
  "clipboard_set_image",
  "clipboard_image",
  "clipboard_image_free",
  "clipboard_has_text",
  "clipboard_has_image",
  "clipboard_has_ownership",
  "clipboard_poll",
  "clipboard_clear",
] as const satisfies ReadonlyArray<keyof ClipboardBindings>;

export function missingExports(value: unknown): string[] {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return [...REQUIRED_EXPORTS];
  }
  return REQUIRED_EXPORTS.filter((name) => typeof Reflect.get(value, name) !== "function");
}

export function isClipboardBindings(value: unknown): value is ClipboardBindings {
  return missingExports(value).length === 0;
}
