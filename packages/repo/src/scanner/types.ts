import type { RepoSet } from '../cache/repo-set';

export interface DiscoveryOptions {
  /** gitignore-style patterns, matched against paths relative to each scan root */
  ignore?: string[];
  /** Absolute paths whose whole subtree is skipped */
  excludePaths?: string[];
  /** Skip directories whose name starts with a dot. Defaults to true. */
  excludeHidden?: boolean;
  /** Follow symlinked directories (each target at most once). Defaults to true. */
  followSymlinks?: boolean;
  /** Upper bound on directories being read at the same time. Defaults to 16. */
  concurrency?: number;
  signal?: AbortSignal;
  /** Called once per repository root, as soon as it is found */
  onRepository?: (repoPath: string) => void;
}

export type ScanWarningKind = 'permission-denied' | 'not-found' | 'broken-symlink' | 'unreadable';

export interface ScanWarning {
  path: string;
  kind: ScanWarningKind;
  message: string;
}

export interface DiscoveryStats {
  directoriesVisited: number;
  durationMs: number;
}

export interface DiscoveryResult {
  repositories: RepoSet;
  warnings: ScanWarning[];
  stats: DiscoveryStats;
}
