/**
 * Cooperative cancellation helpers built on AbortSignal and timers.
 */

/**
 * Waits `ms` or until `signal` aborts, whichever comes first.
 * @returns true when the full delay elapsed, false when aborted.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export type LinkedController = {
  controller: AbortController;
  /** Detaches from the parent signal; idempotent. */
  unlink(): void;
};

/**
 * A fresh controller that also aborts when `parent` does. Aborting the
 * child never affects the parent.
 */
export function createLinkedController(parent?: AbortSignal): LinkedController {
  const controller = new AbortController();
  if (!parent) return { controller, unlink: () => {} };
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, unlink: () => {} };
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return {
    controller,
    unlink: () => parent.removeEventListener("abort", onAbort),
  };
}

/**
 * Resolves true if `task` settles within `ms`, false otherwise. The timer
 * is cleared either way and never keeps the process alive.
 */
export function settleWithin(task: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    timer.unref?.();
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    void task.then(done, done);
  });
}
