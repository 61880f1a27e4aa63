import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Expands a leading `~` to the given home directory.
 * Only `~` on its own or `~/...` is expanded; `~user` is left untouched.
 *
 * @param p The path to expand.
 * @param home Home directory, defaults to the current user's.
 */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') {
    return home;
  }
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(home, p.slice(2));
  }
  return p;
}

/**
 * Orders paths by UTF-16 code unit, the same way on every machine and locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * True when `child` is `parent` itself or lies below it.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
