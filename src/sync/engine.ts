/**
 * Sync Engine: trigger-driven reconciliation of instruction file pairs.
 *
 * Implements the pipeline run for every "this file was just written" event:
 * 1. Resolve the trigger path and check it names an instruction file
 * 2. Locate the pair in the trigger's directory
 * 3. Work out which side of the pair the trigger is
 * 4. Read both files and compare normalized contents
 * 5. If they differ, copy the trigger's raw bytes over the counterpart
 * 6. Log and return the outcome
 *
 * The trigger is always the source of truth. Modification times are never
 * consulted, and the trigger file itself is never written.
 */

import * as path from "node:path";
import {
  PRIMARY_FILE_NAME,
  SECONDARY_FILE_NAME,
  type NoMatchReason,
  type PairSide,
  type PairStatus,
  type SyncLogger,
  type SyncPair,
  type SyncResult,
} from "../types.js";
import { DEFAULT_IGNORE_DIRS, discoverPairs, findPairInDirectory, isIgnoredPath } from "./discovery.js";
import { ReadFailureError, WriteFailureError } from "./errors.js";
import { readBoth } from "./file-reader.js";
import { writeFileAtomic } from "./file-writer.js";
import { contentsMatch } from "./normalize.js";
import { describeOutcome, emitRecord, silentLogger } from "../log/logger.js";

/**
 * Options for a sync operation.
 */
export interface SyncOptions {
  /** Base for relative trigger paths and for the ignore check (default: cwd) */
  root?: string;
  /** Directory names treated as out of bounds (default: DEFAULT_IGNORE_DIRS) */
  ignoreDirs?: readonly string[];
  /** Receives one record per outcome (default: silent) */
  logger?: SyncLogger;
}

/**
 * Reconciles the pair owning `triggerPath`.
 *
 * Performs at most one write, to the counterpart. File-system failures are
 * returned as `error` outcomes rather than thrown.
 *
 * @param triggerPath - The file reported as just written (absolute or relative to `root`)
 * @param options - Optional sync options (root, ignoreDirs, logger)
 * @returns The pair involved (if any) and what happened
 *
 * @example
 * ```ts
 * const result = await syncFromTrigger("backend/CLAUDE.md", { root: "/repo" });
 * if (result.outcome.kind === "synced") {
 *   console.log(result.outcome.direction); // "primary-to-secondary"
 * }
 * ```
 */
export async function syncFromTrigger(
  triggerPath: string,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const root = path.resolve(options.root ?? process.cwd());
  const logger = options.logger ?? silentLogger;
  const trigger = path.resolve(root, triggerPath);

  const result = await reconcile(trigger, root, options.ignoreDirs ?? DEFAULT_IGNORE_DIRS);

  await emitRecord(logger, {
    timestamp: new Date().toISOString(),
    level: result.outcome.kind === "error" ? "error" : "info",
    scope: "sync",
    message: describeOutcome(result),
    ...(result.pair ? { pair: result.pair.directory } : {}),
    outcome: result.outcome.kind,
  });

  return result;
}

async function reconcile(
  trigger: string,
  root: string,
  ignoreDirs: readonly string[]
): Promise<SyncResult> {
  const noMatch = (reason: NoMatchReason): SyncResult => ({
    triggerPath: trigger,
    pair: null,
    outcome: { kind: "no-matching-pair", reason },
  });

  const name = path.basename(trigger);
  if (name !== PRIMARY_FILE_NAME && name !== SECONDARY_FILE_NAME) {
    return noMatch("not-instruction-file");
  }

  if (isIgnoredPath(root, trigger, ignoreDirs)) {
    return noMatch("ignored-directory");
  }

  const pair = await findPairInDirectory(path.dirname(trigger));
  if (!pair) {
    return noMatch("missing-counterpart");
  }

  const side = sideOf(pair, trigger);
  if (!side) {
    return { triggerPath: trigger, pair, outcome: { kind: "ambiguous-trigger" } };
  }

  const counterpart = side === "primary" ? pair.secondaryPath : pair.primaryPath;

  try {
    const [triggerContent, counterpartContent] = await readBoth(trigger, counterpart);

    if (contentsMatch(triggerContent, counterpartContent)) {
      return { triggerPath: trigger, pair, outcome: { kind: "already-in-sync" } };
    }

    const bytesWritten = await writeFileAtomic(counterpart, triggerContent);
    return {
      triggerPath: trigger,
      pair,
      outcome: {
        kind: "synced",
        direction: side === "primary" ? "primary-to-secondary" : "secondary-to-primary",
        bytesWritten,
      },
    };
  } catch (error) {
    if (error instanceof ReadFailureError || error instanceof WriteFailureError) {
      return { triggerPath: trigger, pair, outcome: { kind: "error", failure: error.toFailure() } };
    }
    throw error;
  }
}

/**
 * Matches a resolved trigger path against a pair by exact path.
 */
export function sideOf(pair: SyncPair, trigger: string): PairSide | null {
  if (trigger === pair.primaryPath) return "primary";
  if (trigger === pair.secondaryPath) return "secondary";
  return null;
}

/**
 * Read-only drift report for every pair under `root`.
 *
 * Compares each pair's normalized contents without writing anything and
 * without choosing a direction.
 */
export async function checkPairs(
  root: string,
  options: Omit<SyncOptions, "root"> = {}
): Promise<PairStatus[]> {
  const { pairs } = await discoverPairs(root, options);

  const statuses: PairStatus[] = [];
  for (const pair of pairs) {
    try {
      const [primary, secondary] = await readBoth(pair.primaryPath, pair.secondaryPath);
      statuses.push({ pair, state: contentsMatch(primary, secondary) ? "in-sync" : "out-of-sync" });
    } catch (error) {
      if (!(error instanceof ReadFailureError)) throw error;
      statuses.push({ pair, state: "unreadable", message: error.message });
    }
  }

  return statuses;
}
