import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { POETRY_BIN_VAR, resolvePoetryBinary, type BinaryCandidate } from './binary-resolver.js';
import type { BootstrapSettings } from '../types/bootstrap.js';

export const FIX_PERMISSIONS_VAR = 'DEVBOOT_FIX_PERMISSIONS';
export const QUIET_VAR = 'DEVBOOT_QUIET';

export interface SettingsInput {
  cwd?: string;
  poetry?: string;
  fixPermissions?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
  /** Skip reading the project's .env file. */
  noEnv?: boolean;
  /** Environment snapshot. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  return TRUTHY.has(raw.trim().toLowerCase());
}

export async function loadEnvFile(projectDir: string): Promise<Record<string, string>> {
  try {
    const content = await readFile(join(projectDir, '.env'), 'utf-8');
    return parseDotenv(Buffer.from(content));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }
}

/**
 * Build the settings for one run.
 * Precedence: CLI > .env > env > defaults.
 */
export async function resolveSettings(input: SettingsInput = {}): Promise<BootstrapSettings> {
  const env = input.env ?? process.env;
  const projectDir = resolve(input.cwd ?? process.cwd());
  const envFile = input.noEnv ? {} : await loadEnvFile(projectDir);

  const lookup = (name: string): string | undefined => envFile[name] ?? env[name];

  const candidates: BinaryCandidate[] = [];
  if (input.poetry !== undefined) {
    candidates.push({ path: input.poetry, source: 'flag' });
  }
  if (envFile[POETRY_BIN_VAR] !== undefined) {
    candidates.push({ path: envFile[POETRY_BIN_VAR], source: 'env-file' });
  }
  const fromEnv = env[POETRY_BIN_VAR];
  if (fromEnv !== undefined) {
    candidates.push({ path: fromEnv, source: 'env' });
  }

  return {
    projectDir,
    poetry: resolvePoetryBinary(candidates, projectDir, env),
    fixPermissions: input.fixPermissions ?? parseFlag(lookup(FIX_PERMISSIONS_VAR)) ?? false,
    quiet: input.quiet ?? parseFlag(lookup(QUIET_VAR)) ?? false,
    dryRun: input.dryRun ?? false,
    env,
  };
}
