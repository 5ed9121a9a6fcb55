/**
 * In-process stand-in for the libclipboard addon.
 *
 * Every buffer handed out by `clipboard_text` / `clipboard_image` is tracked
 * until it comes back through the paired free call, so tests can assert that
 * nothing leaks and nothing is freed twice.
 */
import type { ClipboardBindings, NativeHandle } from "../../packages/core/native/bindings";

type PollStep = { result: number; apply?: (fake: FakeClipboard) => void } | Error;

export class FakeClipboard implements ClipboardBindings {
  text: Uint8Array | null = null;
  image: Uint8Array | null = null;
  ownership = false;

  /** Returned by the next `clipboard_new` instead of a fresh handle. */
  createResult: NativeHandle | null = null;
  createError: Error | null = null;
  /** Non-zero statuses returned by the setters and `clipboard_clear`. */
  statuses: { setText?: number; setImage?: number; clear?: number } = {};
  /** Thrown by the state queries while set. */
  stateError: Error | null = null;
  freeError: Error | null = null;

  readonly live = new Set<NativeHandle>();
  readonly destroyed: NativeHandle[] = [];
  readonly outstanding = new Set<Uint8Array>();
  doubleFrees = 0;
  pollCount = 0;

  private nextHandle: NativeHandle = 0x1000n;
  private pollSteps: PollStep[] = [];

  setTextValue(value: string | null) {
    this.text = value === null ? null : new TextEncoder().encode(`${value}\0`);
  }

  /** Queues the outcome of a future poll; an empty queue reports "no change". */
  queuePoll(result: number, apply?: (fake: FakeClipboard) => void) {
    this.pollSteps.push({ result, apply });
  }

  queuePollError(err: Error) {
    this.pollSteps.push(err);
  }

  clipboard_new(_options: null): NativeHandle {
    if (this.createError) throw this.createError;
    const handle = this.createResult ?? this.nextHandle++;
    this.live.add(handle);
    return handle;
  }

  clipboard_free(handle: NativeHandle): void {
    this.destroyed.push(handle);
    this.live.delete(handle);
  }

  clipboard_set_text(handle: NativeHandle, text: Uint8Array): number {
    this.assertLive(handle);
    if (this.statuses.setText) return this.statuses.setText;
    this.text = Uint8Array.from(text);
    this.ownership = true;
    return 0;
  }

  clipboard_text(handle: NativeHandle): Uint8Array | null {
    this.assertLive(handle);
    return this.handOut(this.text);
  }

  clipboard_text_free(_handle: NativeHandle, text: Uint8Array): void {
    this.takeBack(text);
  }

  clipboard_set_image(handle: NativeHandle, data: Uint8Array, length: number): number {
    this.assertLive(handle);
    if (this.statuses.setImage) return this.statuses.setImage;
    this.image = Uint8Array.from(data.subarray(0, length));
    this.ownership = true;
    return 0;
  }

  clipboard_image(handle: NativeHandle): Uint8Array | null {
    this.assertLive(handle);
    return this.handOut(this.image);
  }

  clipboard_image_free(_handle: NativeHandle, data: Uint8Array): void {
    this.takeBack(data);
  }

  clipboard_has_text(handle: NativeHandle): number {
    this.assertState(handle);
    return this.text ? 1 : 0;
  }

  clipboard_has_image(handle: NativeHandle): number {
    this.assertState(handle);
    return this.image ? 1 : 0;
  }

  clipboard_has_ownership(handle: NativeHandle): number {
    this.assertState(handle);
    return this.ownership ? 1 : 0;
  }

  clipboard_poll(handle: NativeHandle): number {
    this.assertLive(handle);
    this.pollCount++;
    const step = this.pollSteps.shift();
    if (!step) return 0;
    if (step instanceof Error) throw step;
    step.apply?.(this);
    return step.result;
  }

  clipboard_clear(handle: NativeHandle): number {
    this.assertLive(handle);
    if (this.statuses.clear) return this.statuses.clear;
    this.text = null;
    this.image = null;
    return 0;
  }

  private handOut(stored: Uint8Array | null): Uint8Array | null {
    if (!stored) return null;
    const view = Uint8Array.from(stored);
    this.outstanding.add(view);
    return view;
  }

  private takeBack(view: Uint8Array) {
    if (!this.outstanding.delete(view)) this.doubleFrees++;
    if (this.freeError) throw this.freeError;
  }

  private assertState(handle: NativeHandle) {
    this.assertLive(handle);
    if (this.stateError) throw this.stateError;
  }

  private assertLive(handle: NativeHandle) {
    if (!this.live.has(handle)) throw new Error(`use of dead handle ${handle}`);
  }
}
