import { logLevelFromEnv, optionsFromEnv } from "../config";
import { AccessError, DisposedError, toClipboardError } from "../errors";
import { defaultLogger, scopedLogger, setLogLevel, type Logger } from "../logger";
import type { ChangeEvent, ObservedState } from "../models/ClipboardChange";
import { type ClipboardOptions, resolveOptions } from "../models/ClipboardOptions";
import type { ClipboardBindings, NativeHandle } from "../native/bindings";
import { type HandleRegistry, NativeResourceHandle } from "../native/handle";
import { getClipboardBindings } from "../native/loader";
import { ChangeNotifier } from "./events";
import { assertPng, assertWithinLimit, consumeNativeBuffer, decodeText, encodeText } from "./payload";
import { type PollingEngine, createPollingEngine } from "./poller";

/** How long disposal waits for an active polling run to exit. */
export const DISPOSE_GRACE_MS = 1000;

export type TryResult<T> = { ok: true; value: T } | { ok: false; error?: unknown };

export type ChangeHandler = (event: ChangeEvent) => void;

export type ClipboardSessionDeps = {
  /** Loaded addon; discovered on the library search path when omitted. */
  bindings?: ClipboardBindings;
  logger?: Logger;
  now?: () => number;
  /** Registry used to free the native handle if the session is never disposed. */
  finalizer?: HandleRegistry;
};

export type StartMonitoringOptions = {
  /** Overrides `pollingInterval` for this run (ms). */
  interval?: number;
  signal?: AbortSignal;
};

/**
 * A clipboard backed by one native libclipboard instance.
 *
 * Accessors are synchronous and are not serialized against the polling
 * loop; callers sharing a session across worker threads must serialize
 * their own calls.
 */
export class ClipboardSession {
  readonly options: Readonly<ClipboardOptions>;

  private readonly bindings: ClipboardBindings;
  private readonly handle: NativeResourceHandle;
  private readonly logger: Logger;
  private readonly notifier: ChangeNotifier<ChangeEvent>;
  private readonly poller: PollingEngine;
  private disposing: Promise<void> | null = null;
  private disposed = false;

  constructor(options: Partial<ClipboardOptions> = {}, deps: ClipboardSessionDeps = {}) {
    this.options = resolveOptions(options);
    this.logger = deps.logger ?? scopedLogger("clipboard", defaultLogger);
    this.bindings = deps.bindings ?? getClipboardBindings();
    this.handle = NativeResourceHandle.acquire(this.bindings, { registry: deps.finalizer, logger: this.logger });
    this.notifier = new ChangeNotifier<ChangeEvent>(this.logger);
    this.poller = createPollingEngine({
      enabled: this.options.changeDetectionEnabled,
      interval: this.options.pollingInterval,
      poll: () => this.bindings.clipboard_poll(this.handle.value) !== 0,
      readState: () => this.readState(),
      emit: (event) => this.notifier.emit(event),
      isDisposed: () => this.isDisposed,
      now: deps.now,
      logger: this.logger,
    });
    this.logger.debug("Clipboard instance initialized successfully");
  }

  /**
   * Builds a session from the `CLIPBRIDGE_*` variables in `env`. A valid
   * `CLIPBRIDGE_LOG_LEVEL` is applied to the process-wide logger.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, deps: ClipboardSessionDeps = {}): ClipboardSession {
    const level = logLevelFromEnv(env);
    if (level) setLogLevel(level);
    return new ClipboardSession(optionsFromEnv(env), deps);
  }

  get isDisposed(): boolean {
    return this.disposed || this.disposing !== null;
  }

  get isMonitoring(): boolean {
    return this.poller.isRunning;
  }

  hasText(): boolean {
    return this.flag("hasText", (h) => this.bindings.clipboard_has_text(h));
  }

  hasImage(): boolean {
    return this.flag("hasImage", (h) => this.bindings.clipboard_has_image(h));
  }

  hasOwnership(): boolean {
    return this.flag("hasOwnership", (h) => this.bindings.clipboard_has_ownership(h));
  }

  setText(text: string): void {
    if (typeof text !== "string") throw new TypeError("text must be a string");
    this.throwIfDisposed();

    const bytes = encodeText(this.options.trimWhitespace ? text.trim() : text);
    assertWithinLimit("Text", bytes.length, this.options.maxDataSize, "outgoing");
    this.checkStatus("setText", "Failed to set clipboard text.", () =>
      this.bindings.clipboard_set_text(this.handle.value, bytes)
    );
    this.logger.debug(`Set clipboard text (${bytes.length} bytes)`);
  }

  /** @returns The clipboard text, or null when none is available. */
  getText(): string | null {
    this.throwIfDisposed();
    const h = this.handle.value;
    const buffer = this.invoke("getText", () => this.bindings.clipboard_text(h));
    if (!buffer) {
      this.logger.debug("No text available in clipboard");
      return null;
    }

    const text = consumeNativeBuffer(
      buffer,
      (view) => {
        assertWithinLimit("Text", view.length, this.options.maxDataSize, "incoming");
        return decodeText(view);
      },
      (view) => this.bindings.clipboard_text_free(h, view),
      (err) => this.logger.warn("Failed to free native text memory", err)
    );
    return this.options.trimWhitespace ? text.trim() : text;
  }

  tryGetText(): TryResult<string> {
    return this.attempt("tryGetText", () => this.getText());
  }

  setImage(bytes: Uint8Array, opts: { requirePng?: boolean } = {}): void {
    if (!(bytes instanceof Uint8Array)) throw new TypeError("image must be a Uint8Array");
    this.throwIfDisposed();

    assertWithinLimit("Image", bytes.length, this.options.maxDataSize, "outgoing");
    if (opts.requirePng) assertPng(bytes);
    this.checkStatus("setImage", "Failed to set clipboard image.", () =>
      this.bindings.clipboard_set_image(this.handle.value, bytes, bytes.length)
    );
    this.logger.debug(`Set clipboard image (${bytes.length} bytes)`);
  }

  /** @returns A copy of the clipboard image bytes, or null when none is available. */
  getImage(): Uint8Array | null {
    this.throwIfDisposed();
    const h = this.handle.value;
    const buffer = this.invoke("getImage", () => this.bindings.clipboard_image(h));
    if (!buffer) {
      this.logger.debug("No image available in clipboard");
      return null;
    }

    return consumeNativeBuffer(
      buffer,
      (view) => {
        if (view.length === 0) {
          this.logger.debug("No image available in clipboard");
          return null;
        }
        assertWithinLimit("Image", view.length, this.options.maxDataSize, "incoming");
        return Uint8Array.from(view);
      },
      (view) => this.bindings.clipboard_image_free(h, view),
      (err) => this.logger.warn("Failed to free native image memory", err)
    );
  }

  tryGetImage(): TryResult<Uint8Array> {
    return this.attempt("tryGetImage", () => this.getImage());
  }

  clear(): void {
    this.throwIfDisposed();
    this.checkStatus("clear", "Failed to clear clipboard.", () => this.bindings.clipboard_clear(this.handle.value));
    this.logger.debug("Cleared clipboard");
  }

  onChange(handler: ChangeHandler): () => void {
    this.throwIfDisposed();
    return this.notifier.subscribe(handler);
  }

  offChange(handler: ChangeHandler): void {
    this.throwIfDisposed();
    this.notifier.unsubscribe(handler);
  }

  /**
   * Polls for changes until `signal` aborts, monitoring is restarted, or the
   * session is disposed. Starting again supersedes the previous run.
   * @returns Settles when this run exits; never rejects.
   */
  startMonitoring(opts: StartMonitoringOptions = {}): Promise<void> {
    this.throwIfDisposed();
    return this.poller.start(opts.interval, opts.signal);
  }

  /** @deprecated Abort the signal passed to {@link startMonitoring} instead. */
  stopMonitoring(): void {
    this.throwIfDisposed();
    this.poller.stop();
  }

  /**
   * Stops monitoring, waits up to {@link DISPOSE_GRACE_MS} for the run to
   * exit, then frees the native handle. Repeated calls share the first
   * call's promise.
   */
  dispose(): Promise<void> {
    this.disposing ??= this.shutdown();
    return this.disposing;
  }

  private async shutdown(): Promise<void> {
    try {
      const exited = await this.poller.shutdown(DISPOSE_GRACE_MS);
      if (!exited) {
        this.logger.warn(`Polling did not stop within ${DISPOSE_GRACE_MS}ms; releasing native handle anyway`);
      }
    } catch (err) {
      this.logger.warn("Error waiting for polling task to complete during disposal", err);
    }
    this.handle.release();
    this.notifier.clear();
    this.disposed = true;
    this.logger.debug("Clipboard instance disposed");
  }

  private readState(): ObservedState {
    const h = this.handle.value;
    return {
      hasText: this.bindings.clipboard_has_text(h) !== 0,
      hasImage: this.bindings.clipboard_has_image(h) !== 0,
      hasOwnership: this.bindings.clipboard_has_ownership(h) !== 0,
    };
  }

  private throwIfDisposed(): void {
    if (this.isDisposed) throw new DisposedError();
  }

  private flag(operation: string, query: (h: NativeHandle) => number): boolean {
    this.throwIfDisposed();
    const h = this.handle.value;
    return this.invoke(operation, () => query(h)) !== 0;
  }

  private invoke<T>(operation: string, call: () => T): T {
    try {
      return call();
    } catch (err) {
      this.logger.error(`Unexpected error in ${operation}`, err);
      throw toClipboardError(err, operation);
    }
  }

  private checkStatus(operation: string, message: string, call: () => number): void {
    const status = this.invoke(operation, call);
    if (status !== 0) {
      throw new AccessError(operation, `${message} Native error code: ${status}`, { status });
    }
  }

  private attempt<T>(operation: string, read: () => T | null): TryResult<T> {
    try {
      const value = read();
      return value === null ? { ok: false } : { ok: true, value };
    } catch (err) {
      this.logger.debug(`${operation} failed`, err);
      return { ok: false, error: err };
    }
  }
}
