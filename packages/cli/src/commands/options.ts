import path from 'path';
import { UsageError, expandHome } from '@roster/shared';
import { isSortColumn, type SortColumn } from '@roster/repo';

export function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseNonNegativeInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`${flag} expects a whole number, got "${value}"`);
  }
  return parsed;
}

export function parseSortColumn(value: string): SortColumn {
  if (!isSortColumn(value)) {
    throw new UsageError(`--sort expects one of path, lastCommit, status; got "${value}"`);
  }
  return value;
}

/**
 * Splits `scan.ignore` into gitignore-style patterns and absolute paths,
 * which exclude that exact subtree.
 */
export function splitIgnoreEntries(
  entries: string[],
  home: string,
): { patterns: string[]; excludePaths: string[] } {
  const patterns: string[] = [];
  const excludePaths: string[] = [];
  for (const entry of entries) {
    const expanded = expandHome(entry, home);
    if (path.isAbsolute(expanded)) {
      excludePaths.push(path.resolve(expanded));
    } else {
      patterns.push(entry);
    }
  }
  return { patterns, excludePaths };
}
