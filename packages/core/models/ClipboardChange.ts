/**
 * Clipboard flags observed on a poll tick.
 */
export interface ObservedState {
  hasText: boolean;
  hasImage: boolean;
  hasOwnership: boolean;
}

/**
 * Notification raised when the observed clipboard flags change.
 */
export interface ChangeEvent extends ObservedState {
  /** Detection time (epoch ms) */
  readonly timestamp: number;
}

export function sameState(a: ObservedState, b: ObservedState): boolean {
  return a.hasText === b.hasText && a.hasImage === b.hasImage && a.hasOwnership === b.hasOwnership;
}

export function createChangeEvent(state: ObservedState, timestamp: number): Readonly<ChangeEvent> {
  return Object.freeze({
    timestamp,
    hasText: state.hasText,
    hasImage: state.hasImage,
    hasOwnership: state.hasOwnership,
  });
}

/**
 * Validate a ChangeEvent object.
 */
export function validateChangeEvent(event: ChangeEvent): boolean {
  return (
    typeof event.timestamp === "number" &&
    typeof event.hasText === "boolean" &&
    typeof event.hasImage === "boolean" &&
    typeof event.hasOwnership === "boolean"
  );
}
