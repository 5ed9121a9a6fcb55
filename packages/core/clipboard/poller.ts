import { defaultLogger, type Logger } from "../logger";
import { type ChangeEvent, type ObservedState, createChangeEvent, sameState } from "../models/ClipboardChange";
import { MAX_POLLING_INTERVAL_MS, isValidInterval } from "../models/ClipboardOptions";
import { createLinkedController, settleWithin, sleep } from "./cancellation";

export type PollingState = "idle" | "running" | "stopping";

export type PollingEngineOptions = {
  /** When false, `start` resolves immediately without polling. */
  enabled: boolean;
  /** Default delay between polls (ms). */
  interval: number;
  /** True when the native side reports a change since the last poll. */
  poll: () => boolean;
  readState: () => ObservedState;
  emit: (event: ChangeEvent) => void;
  /** Checked after every wait; a disposed owner ends the run. */
  isDisposed: () => boolean;
  now?: () => number;
  logger?: Logger;
};

export interface PollingEngine {
  /**
   * Starts a run, aborting any run already in progress. The returned
   * promise settles when this run exits and never rejects.
   */
  start(interval?: number, signal?: AbortSignal): Promise<void>;
  /** Requests the current run to stop without waiting for it. */
  stop(): void;
  /**
   * Stops the current run and waits for it at most `graceMs`.
   * @returns false when the run did not exit in time.
   */
  shutdown(graceMs: number): Promise<boolean>;
  readonly state: PollingState;
  readonly isRunning: boolean;
}

type PollingRun = {
  controller: AbortController;
  unlink: () => void;
  done: Promise<void>;
};

export function createPollingEngine(options: PollingEngineOptions): PollingEngine {
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? Date.now;
  let current: PollingRun | undefined;

  async function runLoop(signal: AbortSignal, interval: number): Promise<void> {
    if (signal.aborted) return;

    let baseline: ObservedState;
    try {
      baseline = options.readState();
    } catch (err) {
      logger.error("Failed to read initial clipboard state; polling not started", err);
      return;
    }
    logger.debug(`Clipboard polling started (interval ${interval}ms)`);

    while (!signal.aborted) {
      const elapsed = await sleep(interval, signal);
      if (!elapsed || signal.aborted || options.isDisposed()) break;

      try {
        if (!options.poll()) continue;
        const state = options.readState();
        if (sameState(state, baseline)) continue;
        options.emit(createChangeEvent(state, now()));
        baseline = state;
        logger.debug("Clipboard change detected and event fired");
      } catch (err) {
        if (signal.aborted) break;
        logger.warn("Error during clipboard polling", err);
      }
    }
    logger.debug("Clipboard polling stopped");
  }

  function finish(run: PollingRun) {
    run.unlink();
    if (current === run) current = undefined;
  }

  return {
    start(interval = options.interval, signal?: AbortSignal) {
      if (!options.enabled) {
        logger.warn("Polling requested but change detection is disabled in options");
        return Promise.resolve();
      }
      if (!isValidInterval(interval)) {
        throw new RangeError(`Polling interval must be between 1 and ${MAX_POLLING_INTERVAL_MS} milliseconds, got ${interval}`);
      }

      const previous = current;
      if (previous) {
        previous.controller.abort();
        previous.unlink();
      }

      const { controller, unlink } = createLinkedController(signal);
      const run: PollingRun = { controller, unlink, done: Promise.resolve() };
      current = run;
      run.done = runLoop(controller.signal, interval)
        .catch((err: unknown) => {
          logger.error("Unexpected error in clipboard polling", err);
        })
        .finally(() => finish(run));
      return run.done;
    },

    stop() {
      current?.controller.abort();
    },

    async shutdown(graceMs: number) {
      const run = current;
      if (!run) return true;
      run.controller.abort();
      const exited = await settleWithin(run.done, graceMs);
      finish(run);
      return exited;
    },

    get state(): PollingState {
      if (!current) return "idle";
      return current.controller.signal.aborted ? "stopping" : "running";
    },

    get isRunning() {
      return current !== undefined && !current.controller.signal.aborted;
    },
  };
}
