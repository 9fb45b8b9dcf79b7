#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { bootstrap, exitCodeOf } from './commands/bootstrap.js';
import { VERSION } from './version.js';

interface CliOptions {
  cwd?: string;
  poetry?: string;
  fixPermissions?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
  /** Commander maps --no-env to env: false. */
  env: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('devboot')
    .description(
      'Configure an in-project Poetry virtualenv and install dependencies (sync to poetry.lock when present)',
    )
    .version(VERSION)
    .option('--cwd <dir>', 'Project directory (default: current directory)')
    .option('--poetry <path>', 'Poetry binary (or set DEVBOOT_POETRY_BIN)')
    .option('--fix-permissions', 'Make the Poetry binary executable before running it')
    .option('--quiet', 'Show a spinner and print tool output only on failure')
    .option('--dry-run', 'Print the resolved plan without running anything')
    .option('--no-env', 'Skip loading the project .env file')
    .action(async (options: CliOptions) => {
      let exitCode: number;
      try {
        const result = await bootstrap({
          cwd: options.cwd,
          poetry: options.poetry,
          fixPermissions: options.fixPermissions,
          quiet: options.quiet,
          dryRun: options.dryRun,
          noEnv: options.env === false,
        });
        exitCode = exitCodeOf(result);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        exitCode = 1;
      }
      process.exit(exitCode);
    });

  return program;
}

// Only parse when run as CLI entry point (robust ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Non-standard invocation (missing/virtual argv path) — default to not parsing
}
if (isDirectRun) {
  buildProgram().parseAsync().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
