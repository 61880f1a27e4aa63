export type StatusShow = 'index-and-worktree' | 'worktree-only';

export interface StatusQueryOptions {
  show: StatusShow;
  includeUntracked: boolean;
  includeIgnored: boolean;
}

export const STATUS_FLAGS = [
  'indexNew',
  'indexModified',
  'indexDeleted',
  'indexRenamed',
  'indexTypechange',
  'wtNew',
  'wtModified',
  'wtDeleted',
  'wtRenamed',
  'wtTypechange',
  'ignored',
  'conflicted',
] as const;

export type StatusFlag = (typeof STATUS_FLAGS)[number];

/** Independent per-file state bits reported by the backend. */
export type StatusFlags = Readonly<Record<StatusFlag, boolean>>;

export function makeStatusFlags(set: Partial<Record<StatusFlag, boolean>> = {}): StatusFlags {
  const flags: Record<StatusFlag, boolean> = {
    indexNew: false,
    indexModified: false,
    indexDeleted: false,
    indexRenamed: false,
    indexTypechange: false,
    wtNew: false,
    wtModified: false,
    wtDeleted: false,
    wtRenamed: false,
    wtTypechange: false,
    ignored: false,
    conflicted: false,
  };
  return { ...flags, ...set };
}

export function hasAnyFlag(flags: StatusFlags): boolean {
  return STATUS_FLAGS.some((flag) => flags[flag]);
}

export interface BackendStatusEntry {
  /** Path relative to the repository root, forward slashes */
  path: string;
  flags: StatusFlags;
}

export interface StashEntry {
  index: number;
  message: string;
}

/** A repository the backend managed to open. Only valid for the call that opened it. */
export interface BackendRepository {
  readonly path: string;
  readonly gitDir: string;
}

/**
 * Read-only version-control queries.
 * `open` rejects with `RepositoryUnavailableError` when the path is not a repository.
 */
export interface VcsBackend {
  open(repoPath: string): Promise<BackendRepository>;
  statuses(repo: BackendRepository, options: StatusQueryOptions): Promise<BackendStatusEntry[]>;
  /** Commit time of the branch tip, or null when there is no commit yet */
  headCommitTimestamp(repo: BackendRepository): Promise<Date | null>;
  /** Most recent first */
  stashEntries(repo: BackendRepository): Promise<StashEntry[]>;
}
