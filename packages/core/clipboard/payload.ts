/**
 * Encoding and size-limit helpers for clipboard payloads.
 */
import { TextDecoder, TextEncoder } from "node:util";
import { SizeLimitError, UnsupportedFormatError, type PayloadDirection } from "../errors";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** UTF-8 bytes of `text` followed by a NUL terminator. */
export function encodeText(text: string): Uint8Array {
  const body = encoder.encode(text);
  const bytes = new Uint8Array(body.length + 1);
  bytes.set(body);
  return bytes;
}

/** Decodes UTF-8 up to the first NUL (or the end of the buffer). */
export function decodeText(bytes: Uint8Array): string {
  const end = bytes.indexOf(0);
  return decoder.decode(end === -1 ? bytes : bytes.subarray(0, end));
}

export function assertWithinLimit(kind: string, size: number, limit: number, direction: PayloadDirection): void {
  if (limit > 0 && size > limit) {
    throw new SizeLimitError(kind, size, limit, direction);
  }
}

export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

export function assertPng(bytes: Uint8Array): void {
  if (!isPng(bytes)) throw new UnsupportedFormatError("PNG");
}

/**
 * Runs `read` over a native buffer and frees it exactly once, whatever
 * `read` does. A failing `free` is reported through `onFreeError` and does
 * not replace the outcome of `read`.
 */
export function consumeNativeBuffer<T>(
  buffer: Uint8Array,
  read: (view: Uint8Array) => T,
  free: (view: Uint8Array) => void,
  onFreeError: (err: unknown) => void
): T {
  try {
    return read(buffer);
  } finally {
    try {
      free(buffer);
    } catch (err) {
      onFreeError(err);
    }
  }
}
