import { accessSync, constants } from 'node:fs';
import { delimiter, join, resolve } from 'node:path';
import os from 'node:os';
import { isFileSync } from '../utils/fs.js';
import type { BinarySource, ResolvedBinary } from '../types/bootstrap.js';

export const POETRY_COMMAND = 'poetry';
export const POETRY_BIN_VAR = 'DEVBOOT_POETRY_BIN';

export interface BinaryCandidate {
  path: string;
  source: Extract<BinarySource, 'flag' | 'env-file' | 'env'>;
}

export function resolveHomeDir(env: NodeJS.ProcessEnv): string {
  const raw = env.HOME ?? env.USERPROFILE;
  if (raw) {
    if (raw.startsWith('~')) {
      return join(os.homedir(), raw.slice(1));
    }
    return raw;
  }
  return os.homedir();
}

/** Where the official Poetry installer puts the executable. */
export function defaultPoetryPath(env: NodeJS.ProcessEnv): string {
  return join(resolveHomeDir(env), '.local', 'bin', POETRY_COMMAND);
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * First executable file named `command` on PATH, as a shell would pick it.
 * When no match is executable, the first plain file is returned instead.
 */
export function searchPath(command: string, env: NodeJS.ProcessEnv): string | null {
  const raw = env.PATH ?? env.Path ?? '';
  let firstFile: string | null = null;
  for (const dir of raw.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (!isFileSync(candidate)) continue;
    if (isExecutable(candidate)) return candidate;
    firstFile ??= candidate;
  }
  return firstFile;
}

/**
 * Resolve the Poetry binary. Explicit candidates (flag, .env, environment)
 * win in the order given; otherwise PATH is searched, and the installer
 * location is returned as a last resort whether or not it exists.
 *
 * A PATH entry without execute bits is only used when nothing executable
 * is found, so a lone binary that lost its mode bits can still be repaired.
 */
export function resolvePoetryBinary(
  candidates: BinaryCandidate[],
  projectDir: string,
  env: NodeJS.ProcessEnv,
): ResolvedBinary {
  for (const candidate of candidates) {
    const trimmed = candidate.path.trim();
    if (trimmed.length === 0) continue;
    // A bare command name is looked up on PATH rather than in the project.
    if (!/[\\/]/.test(trimmed)) {
      return { path: searchPath(trimmed, env) ?? trimmed, source: candidate.source };
    }
    return { path: resolve(projectDir, trimmed), source: candidate.source };
  }

  const onPath = searchPath(POETRY_COMMAND, env);
  if (onPath) {
    return { path: onPath, source: 'path' };
  }

  return { path: defaultPoetryPath(env), source: 'default' };
}
