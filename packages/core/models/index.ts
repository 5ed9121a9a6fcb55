export * from "./ClipboardChange";
export * from "./ClipboardOptions";
