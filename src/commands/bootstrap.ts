import chalk from 'chalk';
import { runBootstrap } from '../core/bootstrap-runner.js';
import { createSpawnRunner, type CommandRunner } from '../core/command-runner.js';
import {
  LOCKFILE_FILENAME,
  MANIFEST_FILENAME,
  detectProjectFiles,
  formatCommand,
  planBootstrap,
} from '../core/poetry-commands.js';
import { resolveSettings, type SettingsInput } from '../core/settings.js';
import { createConsoleReporter, icons, header, label, table, value } from '../utils/output.js';
import type { BootstrapOutcome, BootstrapReporter, BootstrapSettings } from '../types/bootstrap.js';

export type BootstrapOptions = Omit<SettingsInput, 'env'>;

export interface BootstrapDeps {
  runner?: CommandRunner;
  report?: BootstrapReporter;
  env?: NodeJS.ProcessEnv;
}

export type BootstrapCommandResult =
  | { kind: 'run'; outcome: BootstrapOutcome }
  | { kind: 'dry-run'; settings: BootstrapSettings; exitCode: 0 };

async function printPlan(settings: BootstrapSettings): Promise<void> {
  const files = await detectProjectFiles(settings.projectDir);
  const plan = planBootstrap(settings, files);

  console.log(header('Bootstrap plan (dry run)'));
  console.log(
    table([
      [label('Project'), value(settings.projectDir)],
      [label('Poetry'), `${value(settings.poetry.path)} ${label(`(${settings.poetry.source})`)}`],
      [label(MANIFEST_FILENAME), files.manifest ? 'found' : chalk.yellow('missing')],
      [label(LOCKFILE_FILENAME), files.lockfile ? 'found' : chalk.yellow('missing')],
    ]),
  );
  console.log('');
  plan.forEach((cmd, i) => {
    console.log(`  ${i + 1}. ${formatCommand(cmd.command, cmd.args)}`);
  });
  if (!files.lockfile) {
    console.log('');
    console.log(
      `${icons.warning} ${chalk.yellow(`Warning: ${LOCKFILE_FILENAME} not found. Install would use ${MANIFEST_FILENAME}.`)}`,
    );
  }
}

/**
 * Configure Poetry's in-project virtualenv and install dependencies.
 * Returns rather than exits so the caller decides the process status.
 */
export async function bootstrap(
  options: BootstrapOptions = {},
  deps: BootstrapDeps = {},
): Promise<BootstrapCommandResult> {
  const settings = await resolveSettings({ ...options, env: deps.env });

  if (settings.dryRun) {
    await printPlan(settings);
    return { kind: 'dry-run', settings, exitCode: 0 };
  }

  const outcome = await runBootstrap({
    settings,
    runner: deps.runner ?? createSpawnRunner(),
    report: deps.report ?? createConsoleReporter({ quiet: settings.quiet }),
  });
  return { kind: 'run', outcome };
}

export function exitCodeOf(result: BootstrapCommandResult): number {
  return result.kind === 'dry-run' ? result.exitCode : result.outcome.exitCode;
}
