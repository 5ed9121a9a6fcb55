export * from "./errors";
export * from "./models";
export * from "./config";
export {
  setLogLevel,
  getLogLevel,
  scopedLogger,
  defaultLogger,
  type Logger,
  type LogLevel,
} from "./logger";
export {
  type ClipboardBindings,
  type NativeHandle,
  isClipboardBindings,
  isInvalidHandle,
} from "./native/bindings";
export { NativeResourceHandle, type HandleRegistry, type HeldHandle } from "./native/handle";
export { loadClipboardBindings, getClipboardBindings, candidatePaths, type LoaderOptions } from "./native/loader";
export { ChangeNotifier } from "./clipboard/events";
export { createPollingEngine, type PollingEngine, type PollingState } from "./clipboard/poller";
export {
  ClipboardSession,
  DISPOSE_GRACE_MS,
  type ChangeHandler,
  type ClipboardSessionDeps,
  type StartMonitoringOptions,
  type TryResult,
} from "./clipboard/session";
