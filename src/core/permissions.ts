import { chmod, stat } from 'node:fs/promises';

const EXECUTE_BITS = 0o111;

export interface EnsureExecutableResult {
  changed: boolean;
  /** Permission bits after the call. */
  mode: number;
}

/**
 * Add u+x, g+x and o+x to a file. A file that already carries all three
 * is left alone. Errors from stat/chmod propagate to the caller.
 */
export async function ensureExecutable(path: string): Promise<EnsureExecutableResult> {
  const s = await stat(path);
  const current = s.mode & 0o7777;

  if ((current & EXECUTE_BITS) === EXECUTE_BITS) {
    return { changed: false, mode: current };
  }

  const next = current | EXECUTE_BITS;
  await chmod(path, next);
  return { changed: true, mode: next };
}
