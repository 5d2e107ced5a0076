/**
 * Configuration loading.
 *
 * Precedence, lowest to highest: built-in defaults, `.instruction-sync.yml`
 * in the root (or an explicit config path), environment variables, then
 * values passed in by the CLI.
 *
 * Environment variables:
 * - INSTRUCTION_SYNC_ROOT: project root (default: cwd)
 * - INSTRUCTION_SYNC_LOG_FILE: append-only log file
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import type { ConfigFile, ResolvedConfig } from "./types.js";
import { DEFAULT_IGNORE_DIRS } from "./sync/discovery.js";
import { ConfigError, errorCode, errorMessage } from "./sync/errors.js";

export const DEFAULT_CONFIG_FILE = ".instruction-sync.yml";

const CONFIG_KEYS: ReadonlyArray<keyof ConfigFile> = ["ignoreDirs", "extraIgnoreDirs", "logFile"];

export interface LoadConfigOptions {
  /** Project root; overrides INSTRUCTION_SYNC_ROOT */
  root?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Log file; overrides the config file and INSTRUCTION_SYNC_LOG_FILE */
  logFile?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

/**
 * Resolves the effective configuration.
 *
 * @throws ConfigError if the config file is malformed, or if an explicit
 *   `configPath` does not exist
 *
 * @example
 * ```ts
 * const config = await loadConfig({ root: "/repo" });
 * // { root: "/repo", ignoreDirs: [".git", "node_modules", ...], logFile: null }
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const root = path.resolve(cwd, options.root ?? nonEmpty(env.INSTRUCTION_SYNC_ROOT) ?? ".");

  const file = options.configPath
    ? await readConfigFile(path.resolve(cwd, options.configPath), true)
    : await readConfigFile(path.join(root, DEFAULT_CONFIG_FILE), false);

  const ignoreDirs = [
    ...new Set([...(file.ignoreDirs ?? DEFAULT_IGNORE_DIRS), ...(file.extraIgnoreDirs ?? [])]),
  ];

  let logFile: string | null = null;
  if (options.logFile) {
    logFile = path.resolve(cwd, options.logFile);
  } else if (nonEmpty(env.INSTRUCTION_SYNC_LOG_FILE)) {
    logFile = path.resolve(cwd, env.INSTRUCTION_SYNC_LOG_FILE ?? "");
  } else if (file.logFile) {
    logFile = path.resolve(root, file.logFile);
  }

  return { root, ignoreDirs, logFile };
}

/**
 * Reads and validates a YAML config file.
 *
 * A missing file yields an empty config unless `required` is set.
 */
export async function readConfigFile(filePath: string, required: boolean): Promise<ConfigFile> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (errorCode(error) === "ENOENT" && !required) {
      return {};
    }
    throw new ConfigError(`cannot read config file (${errorMessage(error)})`, filePath);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`invalid YAML (${errorMessage(error)})`, filePath);
  }

  return validateConfigFile(parsed, filePath);
}

/**
 * Checks the shape of a parsed config document.
 *
 * An empty document is treated as an empty config.
 */
export function validateConfigFile(value: unknown, source?: string): ConfigFile {
  if (value === null || value === undefined) {
    return {};
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError("config must be a mapping", source);
  }

  const entries: [string, unknown][] = Object.entries(value);
  const record = new Map(entries);
  const unknownKeys = [...record.keys()].filter(
    (key) => !CONFIG_KEYS.some((known) => known === key)
  );
  if (unknownKeys.length > 0) {
    throw new ConfigError(`unknown key(s): ${unknownKeys.join(", ")}`, source);
  }

  const result: ConfigFile = {};

  const ignoreDirs = stringList(record.get("ignoreDirs"), "ignoreDirs", source);
  if (ignoreDirs) result.ignoreDirs = ignoreDirs;

  const extraIgnoreDirs = stringList(record.get("extraIgnoreDirs"), "extraIgnoreDirs", source);
  if (extraIgnoreDirs) result.extraIgnoreDirs = extraIgnoreDirs;

  const logFile = record.get("logFile");
  if (logFile !== undefined) {
    if (typeof logFile !== "string" || logFile.trim() === "") {
      throw new ConfigError("logFile must be a non-empty string", source);
    }
    result.logFile = logFile;
  }

  return result;
}

function stringList(value: unknown, key: string, source?: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string" && item !== "")) {
    throw new ConfigError(`${key} must be a list of directory names`, source);
  }
  const invalid = value.find((item) => item.includes("/") || item.includes("\\"));
  if (invalid !== undefined) {
    throw new ConfigError(`${key} entries are directory names, not paths: "${invalid}"`, source);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}
