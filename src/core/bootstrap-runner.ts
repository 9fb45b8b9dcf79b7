import { ensureExecutable } from './permissions.js';
import {
  CONFIGURE_ARGS,
  LOCKFILE_FILENAME,
  MANIFEST_FILENAME,
  hasLockfile,
  installArgs,
  installModeFor,
} from './poetry-commands.js';
import type { CommandRunner } from './command-runner.js';
import type {
  BootstrapOutcome,
  BootstrapReporter,
  BootstrapSettings,
  InstallMode,
  StepName,
  StepResult,
} from '../types/bootstrap.js';

export interface BootstrapContext {
  settings: BootstrapSettings;
  runner: CommandRunner;
  report?: BootstrapReporter;
}

function joinOutput(stdout: string, stderr: string): string | undefined {
  const combined = [stdout, stderr].filter((s) => s.length > 0).join('');
  return combined.length > 0 ? combined : undefined;
}

async function invoke(
  ctx: BootstrapContext,
  step: StepName,
  args: string[],
): Promise<StepResult> {
  const { settings, runner } = ctx;
  const command = settings.poetry.path;
  ctx.report?.({ type: 'command', step, command, args });

  const result = await runner.run(command, args, {
    cwd: settings.projectDir,
    env: settings.env,
    capture: settings.quiet,
  });

  if (result.exitCode === 0) {
    return { ok: true, step };
  }

  return {
    ok: false,
    step,
    exitCode: result.exitCode,
    message: result.spawnError ?? `${step} failed with exit code ${result.exitCode}`,
    output: settings.quiet ? joinOutput(result.stdout, result.stderr) : undefined,
  };
}

export async function fixPermissionsStep(ctx: BootstrapContext): Promise<StepResult> {
  const binary = ctx.settings.poetry.path;
  ctx.report?.({
    type: 'step',
    step: 'permissions',
    message: `Ensuring ${binary} is executable...`,
  });
  try {
    const { changed, mode } = await ensureExecutable(binary);
    return {
      ok: true,
      step: 'permissions',
      detail: changed ? `mode set to ${mode.toString(8)}` : 'already executable',
    };
  } catch (err) {
    return {
      ok: false,
      step: 'permissions',
      exitCode: 1,
      message: `Cannot make ${binary} executable: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}

export async function configureStep(ctx: BootstrapContext): Promise<StepResult> {
  ctx.report?.({
    type: 'step',
    step: 'configure',
    message: 'Configuring Poetry: virtual environment inside the project (.venv)...',
  });
  return invoke(ctx, 'configure', [...CONFIGURE_ARGS]);
}

export async function installStep(
  ctx: BootstrapContext,
): Promise<{ result: StepResult; mode: InstallMode }> {
  const lockfile = await hasLockfile(ctx.settings.projectDir);
  const mode = installModeFor({ lockfile });

  ctx.report?.({
    type: 'step',
    step: 'install',
    message: `Installing project dependencies (from ${lockfile ? LOCKFILE_FILENAME : MANIFEST_FILENAME})...`,
  });
  if (!lockfile) {
    ctx.report?.({
      type: 'warning',
      message: `${LOCKFILE_FILENAME} not found. Installing from ${MANIFEST_FILENAME} instead.`,
    });
  }

  return { result: await invoke(ctx, 'install', installArgs(mode)), mode };
}

/**
 * Run the bootstrap sequence:
 * permissions (optional) → configure → lockfile check → install.
 * Stops at the first failing step; its exit code becomes the outcome's.
 */
export async function runBootstrap(ctx: BootstrapContext): Promise<BootstrapOutcome> {
  const steps: StepResult[] = [];
  ctx.report?.({ type: 'start', settings: ctx.settings });

  const finish = (outcome: BootstrapOutcome): BootstrapOutcome => {
    ctx.report?.({ type: 'finished', outcome });
    return outcome;
  };

  const record = (result: StepResult): BootstrapOutcome | null => {
    steps.push(result);
    ctx.report?.({ type: 'step-finished', result });
    if (result.ok) return null;
    return finish({ status: 'aborted', exitCode: result.exitCode, failure: result, steps });
  };

  let aborted: BootstrapOutcome | null;

  if (ctx.settings.fixPermissions) {
    aborted = record(await fixPermissionsStep(ctx));
    if (aborted) return aborted;
  }

  aborted = record(await configureStep(ctx));
  if (aborted) return aborted;

  const { result, mode } = await installStep(ctx);
  aborted = record(result);
  if (aborted) return aborted;

  return finish({ status: 'done', exitCode: 0, installMode: mode, steps });
}
