import { join } from 'node:path';
import { isFile } from '../utils/fs.js';
import type {
  BootstrapSettings,
  InstallMode,
  PlannedCommand,
  ProjectFiles,
} from '../types/bootstrap.js';

export const MANIFEST_FILENAME = 'pyproject.toml';
export const LOCKFILE_FILENAME = 'poetry.lock';

/** Persist `virtualenvs.in-project = true` in the project's poetry.toml. */
export const CONFIGURE_ARGS: readonly string[] = [
  'config',
  'virtualenvs.in-project',
  'true',
  '--local',
];

export function installArgs(mode: InstallMode): string[] {
  return mode === 'sync'
    ? ['install', '--no-root', '--sync']
    : ['install', '--no-root'];
}

export async function hasLockfile(projectDir: string): Promise<boolean> {
  return isFile(join(projectDir, LOCKFILE_FILENAME));
}

export async function detectProjectFiles(projectDir: string): Promise<ProjectFiles> {
  const [manifest, lockfile] = await Promise.all([
    isFile(join(projectDir, MANIFEST_FILENAME)),
    hasLockfile(projectDir),
  ]);
  return { manifest, lockfile };
}

export function installModeFor(files: Pick<ProjectFiles, 'lockfile'>): InstallMode {
  return files.lockfile ? 'sync' : 'manifest';
}

/**
 * Commands a run would issue, in order. The permission step is shown as a
 * chmod for readability; the runner applies it through fs, not a process.
 */
export function planBootstrap(
  settings: Pick<BootstrapSettings, 'poetry' | 'fixPermissions'>,
  files: Pick<ProjectFiles, 'lockfile'>,
): PlannedCommand[] {
  const plan: PlannedCommand[] = [];
  const poetry = settings.poetry.path;

  if (settings.fixPermissions) {
    plan.push({ step: 'permissions', command: 'chmod', args: ['+x', poetry] });
  }
  plan.push({ step: 'configure', command: poetry, args: [...CONFIGURE_ARGS] });
  plan.push({ step: 'install', command: poetry, args: installArgs(installModeFor(files)) });

  return plan;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
