import { DisposedError, InitializationError, normalizeUnknownError } from "../errors";
import { defaultLogger, type Logger } from "../logger";
import { type ClipboardBindings, type NativeHandle, isInvalidHandle } from "./bindings";

/** What the finalizer keeps alive: the addon and the raw pointer, nothing else. */
export type HeldHandle = {
  bindings: ClipboardBindings;
  raw: NativeHandle;
};

/** The subset of FinalizationRegistry the handle relies on. */
export interface HandleRegistry {
  register(target: object, held: HeldHandle, token: object): void;
  unregister(token: object): boolean;
}

/**
 * Bare native release, safe to run from a finalizer: touches only the
 * held pointer.
 */
export function releaseHeldHandle(held: HeldHandle, logger: Logger = defaultLogger): void {
  try {
    held.bindings.clipboard_free(held.raw);
  } catch (err) {
    logger.warn("Failed to free native clipboard handle", normalizeUnknownError(err));
  }
}

const defaultRegistry: HandleRegistry = new FinalizationRegistry<HeldHandle>((held) => releaseHeldHandle(held));

/**
 * Owns exactly one native clipboard instance and frees it exactly once,
 * either through {@link release} or when the wrapper is garbage collected.
 */
export class NativeResourceHandle {
  private readonly bindings: ClipboardBindings;
  private readonly registry: HandleRegistry;
  private readonly logger: Logger;
  private raw: NativeHandle;
  private released = false;

  private constructor(bindings: ClipboardBindings, raw: NativeHandle, registry: HandleRegistry, logger: Logger) {
    this.bindings = bindings;
    this.raw = raw;
    this.registry = registry;
    this.logger = logger;
    registry.register(this, { bindings, raw }, this);
  }

  static acquire(
    bindings: ClipboardBindings,
    options: { registry?: HandleRegistry; logger?: Logger } = {}
  ): NativeResourceHandle {
    let raw: NativeHandle;
    try {
      raw = bindings.clipboard_new(null);
    } catch (err) {
      throw new InitializationError(
        "unexpected",
        `Failed to initialize clipboard due to an unexpected error: ${normalizeUnknownError(err)}`,
        err
      );
    }
    if (typeof raw !== "bigint" || isInvalidHandle(raw)) {
      throw new InitializationError(
        "creation_rejected",
        "Failed to initialize native clipboard instance. The native library may not be available or compatible."
      );
    }
    return new NativeResourceHandle(bindings, raw, options.registry ?? defaultRegistry, options.logger ?? defaultLogger);
  }

  get value(): NativeHandle {
    if (this.released) throw new DisposedError("NativeResourceHandle");
    return this.raw;
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.registry.unregister(this);
    const held: HeldHandle = { bindings: this.bindings, raw: this.raw };
    this.raw = 0n;
    releaseHeldHandle(held, this.logger);
  }
}
