import { readFileSync } from 'node:fs';
import { getPackageJsonPath } from './utils/paths.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(getPackageJsonPath(), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fall through to the placeholder below
  }
  return '0.0.0';
}

export const VERSION = readVersion();
