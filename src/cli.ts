#!/usr/bin/env node

/**
 * CLI entry point for instruction-pair-sync.
 *
 * Meant to be called by an editor hook after it writes a file:
 *
 *   instruction-pair-sync sync "$FILE_PATH"
 *
 * See `commands.ts` for the commands and exit codes.
 */

import { runCli } from "./commands.js";
import { ConfigError } from "./sync/errors.js";

async function main(): Promise<void> {
  // Skip node and script path
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error("Unexpected error:", error);
  }
  process.exit(1);
});
