/**
 * instruction-pair-sync
 *
 * Keeps CLAUDE.md and AGENTS.md identical in every directory that has both.
 *
 * @packageDocumentation
 */

// =============================================================================
// Reconciler
// =============================================================================

export { syncFromTrigger, checkPairs, sideOf, type SyncOptions } from "./sync/engine.js";

// =============================================================================
// Discovery
// =============================================================================

export {
  discoverPairs,
  findPairInDirectory,
  isIgnoredPath,
  DEFAULT_IGNORE_DIRS,
  type DiscoveryOptions,
} from "./sync/discovery.js";

// =============================================================================
// Content and File Utilities
// =============================================================================

export { normalizeContent, contentsMatch } from "./sync/normalize.js";
export { readInstructionFile } from "./sync/file-reader.js";
export { writeFileAtomic } from "./sync/file-writer.js";
export { ReadFailureError, WriteFailureError, ConfigError } from "./sync/errors.js";

// =============================================================================
// Logging and Configuration
// =============================================================================

export {
  formatLogLine,
  describeOutcome,
  createConsoleLogger,
  createFileLogger,
  combineLoggers,
  silentLogger,
} from "./log/logger.js";

export { loadConfig, readConfigFile, validateConfigFile, DEFAULT_CONFIG_FILE, type LoadConfigOptions } from "./config.js";

// =============================================================================
// Core Types
// =============================================================================

export { PRIMARY_FILE_NAME, SECONDARY_FILE_NAME } from "./types.js";

export type {
  SyncPair,
  PairSide,
  SyncDirection,
  SyncOutcome,
  SyncResult,
  SyncFailure,
  SyncFailureKind,
  NoMatchReason,
  DiscoveryResult,
  SkippedDirectory,
  PairState,
  PairStatus,
  LogLevel,
  LogRecord,
  SyncLogger,
  ConfigFile,
  ResolvedConfig,
} from "./types.js";
