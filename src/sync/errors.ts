/**
 * Error types raised by the file I/O layer.
 *
 * The reconciler converts these into `error` outcomes; they never escape
 * `syncFromTrigger`.
 */

import type { SyncFailure } from "../types.js";

/**
 * Extracts the Node error code (e.g., "ENOENT") from an unknown error.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for read and write failures on a single file.
 */
abstract class FileOperationError extends Error {
  abstract readonly kind: SyncFailure["kind"];
  public readonly code?: string;

  constructor(
    message: string,
    public readonly path: string,
    cause: unknown
  ) {
    super(message, { cause });
    this.code = errorCode(cause);
  }

  toFailure(): SyncFailure {
    return {
      kind: this.kind,
      path: this.path,
      message: this.message,
      ...(this.code ? { code: this.code } : {}),
    };
  }
}

/**
 * Error thrown when an instruction file cannot be read.
 */
export class ReadFailureError extends FileOperationError {
  readonly kind = "read-failure";

  constructor(path: string, cause: unknown) {
    super(`Failed to read ${path}: ${errorMessage(cause)}`, path, cause);
    this.name = "ReadFailureError";
  }
}

/**
 * Error thrown when the counterpart cannot be replaced.
 */
export class WriteFailureError extends FileOperationError {
  readonly kind = "write-failure";

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${errorMessage(cause)}`, path, cause);
    this.name = "WriteFailureError";
  }
}

/**
 * Error thrown for invalid configuration files or values.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigError";
  }
}
