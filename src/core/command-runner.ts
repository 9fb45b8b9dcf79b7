import { spawn } from 'node:child_process';
import { constants } from 'node:os';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  signal?: NodeJS.Signals;
  /** Set when the process could not be started at all. */
  spawnError?: string;
}

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Pipe and collect output instead of inheriting the terminal. */
  capture?: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult>;
}

const SPAWN_ERROR_EXIT_CODES: Record<string, { exitCode: number; message: string }> = {
  EACCES: { exitCode: 126, message: 'Permission denied' },
  ENOENT: { exitCode: 127, message: 'Command not found' },
};

export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

function errorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * Spawn-backed runner. Never rejects: start-up failures and non-zero exits
 * both come back as a CommandResult with shell-style exit codes.
 */
export function createSpawnRunner(): CommandRunner {
  return {
    run(command, args, options) {
      return new Promise<CommandResult>((resolvePromise) => {
        let stdout = '';
        let stderr = '';
        let settled = false;

        const finish = (result: CommandResult): void => {
          if (settled) return;
          settled = true;
          resolvePromise(result);
        };

        const child = spawn(command, args, {
          cwd: options.cwd,
          env: options.env ?? process.env,
          stdio: options.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
        });

        child.stdout?.setEncoding('utf-8');
        child.stderr?.setEncoding('utf-8');
        child.stdout?.on('data', (chunk: string) => {
          stdout += chunk;
        });
        child.stderr?.on('data', (chunk: string) => {
          stderr += chunk;
        });

        child.on('error', (err) => {
          const code = errorCode(err);
          const mapped = code ? SPAWN_ERROR_EXIT_CODES[code] : undefined;
          finish({
            exitCode: mapped?.exitCode ?? 1,
            stdout,
            stderr,
            spawnError: mapped ? `${command}: ${mapped.message}` : `${command}: ${err.message}`,
          });
        });

        child.on('close', (code, signal) => {
          if (signal) {
            finish({ exitCode: signalExitCode(signal), stdout, stderr, signal });
            return;
          }
          finish({ exitCode: code ?? 1, stdout, stderr });
        });
      });
    },
  };
}
