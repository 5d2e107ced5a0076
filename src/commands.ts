/**
 * Command implementations behind the CLI.
 *
 * Each command returns its exit code instead of exiting, so `cli.ts` stays a
 * thin wrapper and the commands can be driven from tests.
 */

import * as path from "node:path";
import { loadConfig } from "./config.js";
import { checkPairs, syncFromTrigger } from "./sync/engine.js";
import { discoverPairs } from "./sync/discovery.js";
import { combineLoggers, createConsoleLogger, createFileLogger } from "./log/logger.js";
import type { ResolvedConfig, SyncLogger } from "./types.js";

export type CommandName = "sync" | "discover" | "status";

const COMMANDS: readonly CommandName[] = ["sync", "discover", "status"];

export interface CliArgs {
  command: CommandName | null;
  /** Positional argument after the command (trigger path or directory) */
  target: string | null;
  root: string | null;
  configPath: string | null;
  logFile: string | null;
  quiet: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

/** Exit code when `status` finds pairs that are not in sync. */
export const EXIT_OUT_OF_SYNC = 2;

export function parseArgs(argv: string[]): ParseResult {
  const args: CliArgs = {
    command: null,
    target: null,
    root: null,
    configPath: null,
    logFile: null,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--quiet" || arg === "-q") {
      args.quiet = true;
    } else if (arg === "--root" || arg === "--config" || arg === "--log-file") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("-")) {
        return { ok: false, error: `${arg} requires a path` };
      }
      if (arg === "--root") args.root = value;
      else if (arg === "--config") args.configPath = value;
      else args.logFile = value;
      i++; // Skip the value
    } else if (arg.startsWith("-")) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else if (!args.command) {
      const command = COMMANDS.find((name) => name === arg);
      if (!command) {
        return { ok: false, error: `Unknown command: ${arg}` };
      }
      args.command = command;
    } else if (!args.target) {
      args.target = arg;
    } else {
      return { ok: false, error: `Unexpected argument: ${arg}` };
    }
  }

  return { ok: true, args };
}

export const HELP_TEXT = `
instruction-pair-sync - Keep CLAUDE.md and AGENTS.md in sync

Usage:
  instruction-pair-sync <command> [options]

Commands:
  sync <path>      Copy <path> (a CLAUDE.md or AGENTS.md that was just
                   written) over its counterpart when their contents differ
  discover [dir]   List directories holding both files (default: root)
  status [dir]     Report which pairs are out of sync, without writing

Options:
  --root <dir>       Project root (default: $INSTRUCTION_SYNC_ROOT or cwd)
  --config <file>    Config file (default: <root>/.instruction-sync.yml)
  --log-file <file>  Append one line per outcome to <file>
                     (default: $INSTRUCTION_SYNC_LOG_FILE or config logFile)
  --quiet, -q        Only print warnings and errors
  --help, -h         Show this help message

Exit codes:
  0  success (synced, already in sync, or nothing to do)
  1  sync failed, or invalid usage/configuration
  2  status found pairs out of sync or unreadable

Examples:
  instruction-pair-sync sync backend/CLAUDE.md
  instruction-pair-sync discover --root ~/projects/api
  instruction-pair-sync status --quiet
`;

/**
 * Builds the logger for a run: console always, plus the log file if set.
 */
export function buildLogger(config: ResolvedConfig, quiet: boolean): SyncLogger {
  const consoleLogger = createConsoleLogger({ quiet });
  return config.logFile ? combineLoggers(consoleLogger, createFileLogger(config.logFile)) : consoleLogger;
}

export async function runSync(
  config: ResolvedConfig,
  triggerPath: string,
  logger: SyncLogger
): Promise<number> {
  const result = await syncFromTrigger(triggerPath, {
    root: config.root,
    ignoreDirs: config.ignoreDirs,
    logger,
  });
  return result.outcome.kind === "error" ? 1 : 0;
}

export async function runDiscover(
  config: ResolvedConfig,
  directory: string | null,
  logger: SyncLogger
): Promise<number> {
  const start = directory ? path.resolve(config.root, directory) : config.root;
  const { pairs, skippedDirs } = await discoverPairs(start, {
    ignoreDirs: config.ignoreDirs,
    logger,
  });

  for (const pair of pairs) {
    console.log(pair.directory);
  }

  await logger({
    timestamp: new Date().toISOString(),
    level: "info",
    scope: "discovery",
    message: `Found ${pairs.length} pair(s) under ${start}` +
      (skippedDirs.length > 0 ? `, skipped ${skippedDirs.length} unreadable director(ies)` : ""),
  });

  return 0;
}

export async function runStatus(
  config: ResolvedConfig,
  directory: string | null,
  logger: SyncLogger
): Promise<number> {
  const start = directory ? path.resolve(config.root, directory) : config.root;
  const statuses = await checkPairs(start, { ignoreDirs: config.ignoreDirs, logger });

  for (const status of statuses) {
    const detail = status.message ? ` (${status.message})` : "";
    console.log(`${status.state.padEnd(11)} ${status.pair.directory}${detail}`);
  }

  const drifted = statuses.filter((s) => s.state !== "in-sync").length;
  await logger({
    timestamp: new Date().toISOString(),
    level: drifted > 0 ? "warn" : "info",
    scope: "status",
    message: `${statuses.length} pair(s) checked, ${drifted} not in sync`,
  });

  return drifted > 0 ? EXIT_OUT_OF_SYNC : 0;
}

/**
 * Parses arguments, loads config and dispatches. Returns the exit code.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run with --help for usage information.");
    return 1;
  }

  const { args } = parsed;
  if (args.help || !args.command) {
    console.log(HELP_TEXT);
    return args.help ? 0 : 1;
  }

  const config = await loadConfig({
    ...(args.root ? { root: args.root } : {}),
    ...(args.configPath ? { configPath: args.configPath } : {}),
    ...(args.logFile ? { logFile: args.logFile } : {}),
    env,
  });
  const logger = buildLogger(config, args.quiet);

  switch (args.command) {
    case "sync":
      if (!args.target) {
        console.error("Error: sync requires the path of the file that was written");
        return 1;
      }
      return runSync(config, args.target, logger);
    case "discover":
      return runDiscover(config, args.target, logger);
    case "status":
      return runStatus(config, args.target, logger);
  }
}
