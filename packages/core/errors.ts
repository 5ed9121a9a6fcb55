/**
 * Error taxonomy for clipboard sessions.
 *
 * Every error raised by the public surface extends {@link ClipboardError};
 * errors thrown by the native addon are wrapped, never rethrown as-is.
 */

export type InitializationErrorCode = "library_not_found" | "creation_rejected" | "unexpected";

export type ClipboardErrorCode =
  | InitializationErrorCode
  | "access_failed"
  | "disposed"
  | "size_limit"
  | "unsupported_format";

export interface ClipboardErrorOptions {
  code: ClipboardErrorCode;
  message: string;
  cause?: unknown;
}

export class ClipboardError extends Error {
  readonly code: ClipboardErrorCode;

  constructor(options: ClipboardErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ClipboardError";
    this.code = options.code;
  }
}

/** The native clipboard instance could not be created. Never retried. */
export class InitializationError extends ClipboardError {
  declare readonly code: InitializationErrorCode;

  constructor(code: InitializationErrorCode, message: string, cause?: unknown) {
    super({ code, message, cause });
    this.name = "InitializationError";
  }
}

export class AccessError extends ClipboardError {
  readonly operation: string;
  /** Raw native status, when the failure was reported through one. */
  readonly status?: number;

  constructor(operation: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super({ code: "access_failed", message, cause: options.cause });
    this.name = "AccessError";
    this.operation = operation;
    this.status = options.status;
  }
}

export class DisposedError extends ClipboardError {
  constructor(objectName = "ClipboardSession") {
    super({ code: "disposed", message: `Cannot access a disposed ${objectName}.` });
    this.name = "DisposedError";
  }
}

export type PayloadDirection = "outgoing" | "incoming";

export class SizeLimitError extends ClipboardError {
  readonly size: number;
  readonly limit: number;
  readonly direction: PayloadDirection;

  constructor(kind: string, size: number, limit: number, direction: PayloadDirection) {
    super({
      code: "size_limit",
      message: `${kind} data size (${size} bytes) exceeds maximum allowed size (${limit} bytes).`,
    });
    this.name = "SizeLimitError";
    this.size = size;
    this.limit = limit;
    this.direction = direction;
  }
}

export class UnsupportedFormatError extends ClipboardError {
  readonly expected: string;

  constructor(expected: string, message = `Clipboard payload is not in ${expected} format.`) {
    super({ code: "unsupported_format", message });
    this.name = "UnsupportedFormatError";
    this.expected = expected;
  }
}

export function normalizeUnknownError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Passes clipboard errors through and wraps anything else into an
 * {@link AccessError} for `operation`.
 */
export function toClipboardError(error: unknown, operation: string, message?: string): ClipboardError {
  if (error instanceof ClipboardError) return error;
  return new AccessError(operation, message ?? `Unexpected error during ${operation}: ${normalizeUnknownError(error)}`, {
    cause: error,
  });
}
