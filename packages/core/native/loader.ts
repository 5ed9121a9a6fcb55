/**
 * Locates and loads the libclipboard native addon.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { InitializationError, normalizeUnknownError } from "../errors";
import * as log from "../logger";
import { type ClipboardBindings, isClipboardBindings, missingExports } from "./bindings";

export const ADDON_NAME = "libclipboard";
export const NATIVE_PATH_ENV = "CLIPBRIDGE_NATIVE_PATH";

/**
 * Nearest directory at or above `start` holding a package.json, so the
 * addon directory is found from both the sources and the `dist/` build.
 * Falls back to `start` when none is found.
 */
export function findPackageRoot(start: string, exists: (file: string) => boolean = fs.existsSync): string {
  let dir = start;
  for (;;) {
    if (exists(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
}

const nativeDir = path.join(findPackageRoot(__dirname), "native");

const SYSTEM_DIRS: Partial<Record<NodeJS.Platform, string[]>> = {
  linux: ["/usr/local/lib", "/usr/lib"],
  darwin: ["/usr/local/lib", "/usr/lib"],
  win32: ["C:/Windows/System32", "C:/Windows/SysWOW64"],
};

const LIBRARY_PATH_ENV: Partial<Record<NodeJS.Platform, string>> = {
  linux: "LD_LIBRARY_PATH",
  darwin: "DYLD_LIBRARY_PATH",
  win32: "PATH",
};

export type LoaderOptions = {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  arch?: string;
  requireFn?: (id: string) => unknown;
};

/**
 * Candidate addon paths in search order: explicit override, conventional
 * names beside the package, system directories, then library-path entries.
 */
export function candidatePaths(options: LoaderOptions = {}): string[] {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const arch = options.arch ?? process.arch;
  const fileNames = [`${ADDON_NAME}.${platform}-${arch}.node`, `${ADDON_NAME}.node`];

  const candidates: string[] = [];
  const override = env[NATIVE_PATH_ENV];
  if (override) candidates.push(override);

  for (const name of fileNames) candidates.push(path.join(nativeDir, name));

  for (const dir of SYSTEM_DIRS[platform] ?? []) {
    for (const name of fileNames) candidates.push(path.join(dir, name));
  }

  const envName = LIBRARY_PATH_ENV[platform];
  const searchPath = envName ? env[envName] : undefined;
  if (searchPath) {
    const separator = platform === "win32" ? ";" : ":";
    for (const dir of searchPath.split(separator)) {
      if (!dir) continue;
      for (const name of fileNames) candidates.push(path.join(dir, name));
    }
  }

  return Array.from(new Set(candidates));
}

export function loadClipboardBindings(options: LoaderOptions = {}): ClipboardBindings {
  const load = options.requireFn ?? require;
  const errors: string[] = [];

  for (const candidate of candidatePaths(options)) {
    try {
      const mod: unknown = load(candidate);
      if (isClipboardBindings(mod)) {
        log.debug(`Loaded native clipboard addon from ${candidate}`);
        return mod;
      }
      errors.push(`${candidate}: missing exports ${missingExports(mod).join(", ")}`);
    } catch (err) {
      errors.push(`${candidate}: ${normalizeUnknownError(err)}`);
    }
  }

  const details = errors.map((e) => `- ${e}`).join("\n");
  throw new InitializationError(
    "library_not_found",
    `Native ${ADDON_NAME} addon not found. Ensure it is available on the library search path.\n\nTried:\n${details}`
  );
}

let cached: ClipboardBindings | undefined;

/** Process-wide bindings, loaded on first use. */
export function getClipboardBindings(): ClipboardBindings {
  cached ??= loadClipboardBindings();
  return cached;
}
