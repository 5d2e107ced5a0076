/**
 * Atomic file replacement for the counterpart of a pair.
 *
 * The new content is written to a temporary file in the same directory and
 * renamed over the target, so a crash mid-write never leaves a truncated
 * counterpart behind.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { WriteFailureError, errorCode } from "./errors.js";

/**
 * Replaces a file's content with the given bytes atomically.
 *
 * The temporary file is named `<target>.<uuid>.tmp` so concurrent writers to
 * the same target never share one. When the target already exists its
 * permission bits are carried over to the replacement.
 *
 * @param filePath - Absolute path of the file to replace
 * @param content - Exact bytes to write (no re-encoding)
 * @returns Number of bytes written
 * @throws WriteFailureError if any step fails; the target is left untouched
 *
 * @example
 * ```ts
 * await writeFileAtomic("/repo/backend/AGENTS.md", await fs.readFile("/repo/backend/CLAUDE.md"));
 * ```
 */
export async function writeFileAtomic(filePath: string, content: Buffer): Promise<number> {
  const tempPath = path.join(
    path.dirname(filePath),
    `${path.basename(filePath)}.${randomUUID()}.tmp`
  );

  try {
    const mode = await existingMode(filePath);
    await fs.writeFile(tempPath, content, mode === undefined ? {} : { mode });
    if (mode !== undefined) {
      // writeFile's mode is masked by the umask; chmod is not
      await fs.chmod(tempPath, mode);
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeTempFile(tempPath);
    throw new WriteFailureError(filePath, error);
  }

  return content.byteLength;
}

/**
 * Returns the permission bits of an existing file, or undefined if it is gone.
 */
async function existingMode(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mode & 0o777;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await fs.unlink(tempPath);
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      console.warn(
        `[file-writer] Failed to remove temporary file ${tempPath}:`,
        error instanceof Error ? error.message : error
      );
    }
  }
}
