/**
 * Pair discovery.
 *
 * Walks a project tree and finds every directory that directly holds both
 * CLAUDE.md and AGENTS.md. Nothing is cached: every call reads the live
 * filesystem.
 */

import * as fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import * as path from "node:path";
import {
  PRIMARY_FILE_NAME,
  SECONDARY_FILE_NAME,
  type DiscoveryResult,
  type SkippedDirectory,
  type SyncLogger,
  type SyncPair,
} from "../types.js";
import { errorCode, errorMessage } from "./errors.js";
import { emitRecord } from "../log/logger.js";

/**
 * Directory names skipped by default: VCS metadata, dependency caches and
 * build output.
 */
export const DEFAULT_IGNORE_DIRS: readonly string[] = [
  ".git",
  ".hg",
  ".svn",
  "node_modules",
  "bower_components",
  "vendor",
  "dist",
  "build",
  "out",
  "coverage",
  ".next",
  ".nuxt",
  ".turbo",
  ".cache",
  ".venv",
  "venv",
  "__pycache__",
  "target",
];

export interface DiscoveryOptions {
  /** Directory names never entered (default: DEFAULT_IGNORE_DIRS) */
  ignoreDirs?: readonly string[];
  /** Receives a warning for each unreadable directory */
  logger?: SyncLogger;
}

/**
 * Finds every pair under `root`, at any depth.
 *
 * The root itself is always visited, even if its name is in the ignore set.
 * Symlinked directories are not followed. Unreadable directories are
 * reported in `skippedDirs` and the walk carries on.
 *
 * @param root - Directory to start from
 * @returns Pairs sorted by directory, plus the directories that were skipped
 *
 * @example
 * ```ts
 * const { pairs } = await discoverPairs("/repo");
 * // [{ directory: "/repo", primaryPath: "/repo/CLAUDE.md", secondaryPath: "/repo/AGENTS.md" },
 * //  { directory: "/repo/backend", ... }]
 * ```
 */
export async function discoverPairs(
  root: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult> {
  const ignore = new Set(options.ignoreDirs ?? DEFAULT_IGNORE_DIRS);
  const pairs: SyncPair[] = [];
  const skippedDirs: SkippedDirectory[] = [];

  const stack = [path.resolve(root)];

  while (stack.length > 0) {
    const directory = stack.pop();
    if (directory === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      const code = errorCode(error);
      const skipped: SkippedDirectory = {
        path: directory,
        message: errorMessage(error),
        ...(code ? { code } : {}),
      };
      skippedDirs.push(skipped);
      if (options.logger) {
        await emitRecord(options.logger, {
          timestamp: new Date().toISOString(),
          level: "warn",
          scope: "discovery",
          message: `Skipping unreadable directory ${directory}: ${skipped.message}`,
        });
      }
      continue;
    }

    const pair = pairFromEntries(directory, entries);
    if (pair) {
      pairs.push(pair);
    }

    for (const entry of entries) {
      if (entry.isDirectory() && !ignore.has(entry.name)) {
        stack.push(path.join(directory, entry.name));
      }
    }
  }

  pairs.sort((a, b) => (a.directory < b.directory ? -1 : a.directory > b.directory ? 1 : 0));

  return { pairs, skippedDirs };
}

/**
 * Looks for a pair directly inside one directory (non-recursive).
 *
 * @returns The pair, or null if either file is missing, is not a regular
 *   file, or the directory cannot be read
 */
export async function findPairInDirectory(directory: string): Promise<SyncPair | null> {
  const resolved = path.resolve(directory);
  try {
    const entries = await fs.readdir(resolved, { withFileTypes: true });
    return pairFromEntries(resolved, entries);
  } catch {
    return null;
  }
}

/**
 * Returns true if any directory between `root` and `target` is ignored.
 *
 * Targets outside `root` are never considered ignored.
 */
export function isIgnoredPath(
  root: string,
  target: string,
  ignoreDirs: readonly string[] = DEFAULT_IGNORE_DIRS
): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return false;
  }

  const ignore = new Set(ignoreDirs);
  const directorySegments = relative.split(path.sep).slice(0, -1);
  return directorySegments.some((segment) => ignore.has(segment));
}

function pairFromEntries(directory: string, entries: Dirent[]): SyncPair | null {
  let hasPrimary = false;
  let hasSecondary = false;

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (entry.name === PRIMARY_FILE_NAME) hasPrimary = true;
    if (entry.name === SECONDARY_FILE_NAME) hasSecondary = true;
  }

  if (!hasPrimary || !hasSecondary) {
    return null;
  }

  return {
    directory,
    primaryPath: path.join(directory, PRIMARY_FILE_NAME),
    secondaryPath: path.join(directory, SECONDARY_FILE_NAME),
  };
}
