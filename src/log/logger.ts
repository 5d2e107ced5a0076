/**
 * Log sinks for sync outcomes.
 *
 * Discovery and the reconciler never log through a global; they take a
 * `SyncLogger` function and hand it one structured record per event. This
 * module provides the sinks the CLI wires up.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  PRIMARY_FILE_NAME,
  SECONDARY_FILE_NAME,
  type LogRecord,
  type SyncLogger,
  type SyncResult,
} from "../types.js";

/**
 * Formats a record as a single human-readable line (no trailing newline).
 *
 * @example
 * ```ts
 * formatLogLine({ timestamp: "2026-01-01T00:00:00.000Z", level: "info", scope: "sync", message: "ok" });
 * // "2026-01-01T00:00:00.000Z [sync] INFO ok"
 * ```
 */
export function formatLogLine(record: LogRecord): string {
  const message = record.message.replace(/\r?\n/g, "\\n");
  return `${record.timestamp} [${record.scope}] ${record.level.toUpperCase()} ${message}`;
}

/** Logger that drops every record. Default for library callers. */
export const silentLogger: SyncLogger = () => {};

/**
 * Hands a record to a logger. A logger that throws or rejects is reported on
 * stderr; it never changes the caller's outcome.
 */
export async function emitRecord(logger: SyncLogger, record: LogRecord): Promise<void> {
  try {
    await logger(record);
  } catch (error) {
    console.error(
      `[log] Logger failed for [${record.scope}] record:`,
      error instanceof Error ? error.message : error
    );
  }
}

export interface ConsoleLoggerOptions {
  /** Suppress info-level records */
  quiet?: boolean;
}

/**
 * Logs to the console, `[scope]`-prefixed, routed by level.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): SyncLogger {
  return (record) => {
    const line = `[${record.scope}] ${record.message}`;
    switch (record.level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "info":
        if (!options.quiet) console.log(line);
        break;
    }
  };
}

/**
 * Appends one formatted line per record to `logFile`.
 *
 * The parent directory is created on first use. A failed append is reported
 * on stderr and otherwise ignored: the log must never change a sync outcome.
 */
export function createFileLogger(logFile: string): SyncLogger {
  let directoryReady = false;

  return async (record) => {
    try {
      if (!directoryReady) {
        await fs.mkdir(path.dirname(logFile), { recursive: true });
        directoryReady = true;
      }
      await fs.appendFile(logFile, formatLogLine(record) + "\n", "utf-8");
    } catch (error) {
      console.error(
        `[log] Failed to append to ${logFile}:`,
        error instanceof Error ? error.message : error
      );
    }
  };
}

/**
 * Fans a record out to several loggers, in order.
 */
export function combineLoggers(...loggers: SyncLogger[]): SyncLogger {
  return async (record) => {
    for (const logger of loggers) {
      await logger(record);
    }
  };
}

/**
 * Describes a sync result in one sentence, for log lines and CLI output.
 */
export function describeOutcome(result: SyncResult): string {
  const { outcome, pair, triggerPath } = result;
  const where = pair ? pair.directory : path.dirname(triggerPath);

  switch (outcome.kind) {
    case "synced": {
      const [from, to] =
        outcome.direction === "primary-to-secondary"
          ? [PRIMARY_FILE_NAME, SECONDARY_FILE_NAME]
          : [SECONDARY_FILE_NAME, PRIMARY_FILE_NAME];
      return `Synced ${from} -> ${to} in ${where} (${outcome.bytesWritten} bytes)`;
    }
    case "already-in-sync":
      return `Already in sync: ${where}`;
    case "no-matching-pair":
      if (outcome.reason === "not-instruction-file") {
        return `Not an instruction file, nothing to do: ${triggerPath}`;
      }
      if (outcome.reason === "ignored-directory") {
        return `Inside an ignored directory, nothing to do: ${triggerPath}`;
      }
      return `No ${PRIMARY_FILE_NAME}/${SECONDARY_FILE_NAME} pair in ${where}, nothing to do`;
    case "ambiguous-trigger":
      return `Trigger ${triggerPath} does not match the pair in ${where}, nothing to do`;
    case "error":
      return `Sync failed in ${where}: ${outcome.failure.message}`;
  }
}
