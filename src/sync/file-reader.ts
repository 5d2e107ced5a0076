/**
 * Raw reads of instruction files.
 *
 * Content is returned as bytes so that whatever is copied to the counterpart
 * is exactly what the trigger holds, line endings and encoding included.
 */

import * as fs from "node:fs/promises";
import { ReadFailureError } from "./errors.js";

/**
 * Reads an instruction file's raw bytes.
 *
 * @throws ReadFailureError if the file is missing, unreadable or a directory
 */
export async function readInstructionFile(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new ReadFailureError(filePath, error);
  }
}

/**
 * Reads both files of a pair in parallel.
 */
export async function readBoth(
  firstPath: string,
  secondPath: string
): Promise<[Buffer, Buffer]> {
  return Promise.all([readInstructionFile(firstPath), readInstructionFile(secondPath)]);
}
