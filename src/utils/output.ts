import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { formatCommand } from '../core/poetry-commands.js';
import type { BootstrapEvent, BootstrapReporter, StepName } from '../types/bootstrap.js';

export const icons = {
  success: chalk.green('\u2714'),
  error: chalk.red('\u2716'),
  warning: chalk.yellow('\u26A0'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => (r[c] ?? '').length));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1 ? cell.padEnd(widths[i] + columnGap) : cell,
        )
        .join(''),
    )
    .join('\n');
}

export const STEP_NUMBERS: Record<StepName, string> = {
  permissions: '0.',
  configure: '1.',
  install: '2.',
};

export interface ConsoleReporterOptions {
  quiet?: boolean;
}

/**
 * Human-readable progress on stdout/stderr. Quiet mode swaps the per-step
 * lines for a spinner and prints captured tool output only on failure.
 */
export function createConsoleReporter(
  options: ConsoleReporterOptions = {},
): BootstrapReporter {
  let spinner: Ora | null = null;

  return (event: BootstrapEvent) => {
    switch (event.type) {
      case 'start':
        console.log(header('Bootstrapping development environment'));
        console.log(
          `${label('Poetry:')} ${value(event.settings.poetry.path)} ${label(`(${event.settings.poetry.source})`)}`,
        );
        break;
      case 'step': {
        const text = `${STEP_NUMBERS[event.step]} ${event.message}`;
        if (options.quiet) {
          spinner = ora(text).start();
        } else {
          console.log(text);
        }
        break;
      }
      case 'command':
        if (!options.quiet) {
          console.log(label(`$ ${formatCommand(event.command, event.args)}`));
        }
        break;
      case 'warning': {
        const warning = chalk.yellow(`Warning: ${event.message}`);
        if (spinner) {
          const pending = spinner.text;
          spinner.stopAndPersist({ symbol: icons.warning, text: warning });
          spinner = ora(pending).start();
        } else {
          console.log(`${icons.warning} ${warning}`);
        }
        break;
      }
      case 'step-finished': {
        const { result } = event;
        if (result.ok) {
          if (spinner) {
            spinner.succeed();
            spinner = null;
          } else if (result.detail) {
            console.log(`${icons.success} ${label(result.detail)}`);
          }
          break;
        }
        if (spinner) {
          spinner.fail();
          spinner = null;
        }
        if (result.output) {
          process.stderr.write(result.output.endsWith('\n') ? result.output : `${result.output}\n`);
        }
        break;
      }
      case 'finished':
        if (event.outcome.status === 'done') {
          console.log(`${icons.success} ${chalk.green('Development environment ready.')}`);
        } else {
          console.error(
            `${icons.error} ${chalk.red(event.outcome.failure.message)} ${label(`(exit ${event.outcome.exitCode})`)}`,
          );
        }
        break;
    }
  };
}
