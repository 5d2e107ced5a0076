/**
 * Core types for the instruction pair sync engine.
 */

/** File name of the primary instruction file in a pair. */
export const PRIMARY_FILE_NAME = "CLAUDE.md";

/** File name of the secondary instruction file in a pair. */
export const SECONDARY_FILE_NAME = "AGENTS.md";

export type PairSide = "primary" | "secondary";

export type SyncDirection = "primary-to-secondary" | "secondary-to-primary";

/**
 * One directory's (primary, secondary) file tuple.
 *
 * All paths are absolute. Pairs are rebuilt from the live filesystem on every
 * discovery pass and never cached between runs.
 */
export interface SyncPair {
  /** Directory holding both files */
  directory: string;
  /** Absolute path to CLAUDE.md */
  primaryPath: string;
  /** Absolute path to AGENTS.md */
  secondaryPath: string;
}

/**
 * A directory the discovery walk could not read.
 */
export interface SkippedDirectory {
  path: string;
  message: string;
  /** Node error code (e.g., "EACCES"), when available */
  code?: string;
}

export interface DiscoveryResult {
  pairs: SyncPair[];
  skippedDirs: SkippedDirectory[];
}

export type SyncFailureKind = "read-failure" | "write-failure";

export interface SyncFailure {
  kind: SyncFailureKind;
  /** The file that could not be read or written */
  path: string;
  message: string;
  code?: string;
}

/**
 * Why a trigger did not map to a pair. None of these are errors.
 */
export type NoMatchReason =
  | "not-instruction-file"
  | "missing-counterpart"
  | "ignored-directory";

export type SyncOutcome =
  | { kind: "synced"; direction: SyncDirection; bytesWritten: number }
  | { kind: "already-in-sync" }
  | { kind: "no-matching-pair"; reason: NoMatchReason }
  | { kind: "ambiguous-trigger" }
  | { kind: "error"; failure: SyncFailure };

export interface SyncResult {
  /** Absolute path of the file reported as just written */
  triggerPath: string;
  /** The pair owning the trigger; null when no pair matched */
  pair: SyncPair | null;
  outcome: SyncOutcome;
}

export type PairState = "in-sync" | "out-of-sync" | "unreadable";

/**
 * Read-only drift report entry for a single pair.
 */
export interface PairStatus {
  pair: SyncPair;
  state: PairState;
  /** Failure detail when state is "unreadable" */
  message?: string;
}

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = "info" | "warn" | "error";

/**
 * Structured record handed to the injected logger.
 */
export interface LogRecord {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Emitting component (e.g., "sync", "discovery") */
  scope: string;
  message: string;
  /** Directory of the pair involved, if any */
  pair?: string;
  /** Outcome kind for reconciler records */
  outcome?: SyncOutcome["kind"];
}

/**
 * Logging capability injected into discovery and the reconciler.
 */
export type SyncLogger = (record: LogRecord) => void | Promise<void>;

// =============================================================================
// Configuration
// =============================================================================

/**
 * Shape of the optional `.instruction-sync.yml` file.
 */
export interface ConfigFile {
  /** Replaces the default ignore set */
  ignoreDirs?: string[];
  /** Added to the ignore set */
  extraIgnoreDirs?: string[];
  /** Log file path, relative to the root */
  logFile?: string;
}

export interface ResolvedConfig {
  /** Absolute project root */
  root: string;
  /** Directory names never entered during discovery */
  ignoreDirs: string[];
  /** Absolute log file path, or null to log to the console only */
  logFile: string | null;
}
