/**
 * Shared fixtures for instruction pair tests.
 *
 * Every test works in its own temporary project directory; nothing touches
 * the real working tree.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type { LogRecord, SyncLogger } from "../src/types.js";

/**
 * Creates a fresh temporary directory. Resolved through realpath so paths
 * compare equal to what the code under test computes.
 */
export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  return fs.realpath(dir);
}

export async function removeTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Writes files relative to `root`, creating parent directories.
 *
 * @example
 * ```ts
 * await writeFiles(root, {
 *   "backend/CLAUDE.md": "v2 instructions",
 *   "backend/AGENTS.md": "v1 instructions",
 * });
 * ```
 */
export async function writeFiles(
  root: string,
  files: Record<string, string | Buffer>
): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

export async function readText(root: string, relativePath: string): Promise<string> {
  return fs.readFile(path.join(root, relativePath), "utf-8");
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Logger stub that keeps every record it receives.
 */
export function createCapturingLogger(): { logger: SyncLogger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    logger: (record) => {
      records.push(record);
    },
    records,
  };
}
