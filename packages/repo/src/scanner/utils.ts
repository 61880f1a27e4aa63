import ignore from 'ignore';
import path from 'node:path';
import { isErrnoException, isWithin, normalizePath } from '@roster/shared';
import type { ScanWarning, ScanWarningKind } from './types';

/** Entry name that marks a repository root; a directory or, for worktrees, a file. */
export const REPO_MARKER = '.git';

export const DEFAULT_SCAN_CONCURRENCY = 16;

export function classifyFsError(error: unknown, viaSymlink = false): ScanWarningKind {
  if (!isErrnoException(error)) {
    return 'unreadable';
  }
  switch (error.code) {
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    case 'ENOENT':
      return viaSymlink ? 'broken-symlink' : 'not-found';
    case 'ELOOP':
      return 'broken-symlink';
    default:
      return 'unreadable';
  }
}

export function toScanWarning(target: string, error: unknown, viaSymlink = false): ScanWarning {
  return {
    path: target,
    kind: classifyFsError(error, viaSymlink),
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Decides which directories a scan skips: ignore patterns relative to the
 * scan root, and absolute excluded subtrees.
 */
export class ExclusionMatcher {
  private readonly ig: ReturnType<typeof ignore>;
  private readonly excludePaths: string[];

  constructor(patterns: string[] = [], excludePaths: string[] = []) {
    this.ig = ignore().add(patterns);
    this.excludePaths = excludePaths.map((p) => path.resolve(p));
  }

  isExcluded(root: string, dir: string, resolvedDir: string = dir): boolean {
    if (this.excludePaths.some((p) => isWithin(p, dir) || isWithin(p, resolvedDir))) {
      return true;
    }
    const rel = normalizePath(path.relative(root, dir));
    if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) {
      return false;
    }
    // Trailing slash so directory-only patterns ("build/") match.
    return this.ig.ignores(rel + '/');
  }
}
