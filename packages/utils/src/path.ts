/**
 * Path utilities
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Expand leading ~ to user's home directory
 */
export function expandHome(filepath: string): string {
  if (filepath === '~') {
    return os.homedir();
  }
  if (filepath.startsWith('~/')) {
    return path.join(os.homedir(), filepath.slice(2));
  }
  return filepath;
}

/**
 * Resolve a configured path: expand ~ and make it absolute against `base`
 */
export function resolvePath(filepath: string, base: string = process.cwd()): string {
  return path.resolve(base, expandHome(filepath));
}

/**
 * True when `name` is a single path segment (no separators, not `.`/`..`)
 */
export function isPlainFilename(name: string): boolean {
  if (name.length === 0 || name === '.' || name === '..') {
    return false;
  }
  return !name.includes('/') && !name.includes('\\') && !name.includes('\0');
}
