import type { BackendRepository, StatusQueryOptions, VcsBackend } from '../git/types';
import { CLEAN_STATUS, shortFormatStatus, type ShortStatusCode } from './status-code';

export interface StatusEntry {
  /** File path relative to the repository root */
  path: string;
  code: ShortStatusCode;
}

/** Age reported when the tip commit cannot be resolved. Sorts after every real age. */
export const UNKNOWN_AGE_HOURS = Number.MAX_SAFE_INTEGER;

const MS_PER_HOUR = 60 * 60 * 1000;

const FULL_STATUS_OPTIONS: StatusQueryOptions = {
  show: 'index-and-worktree',
  includeUntracked: true,
  includeIgnored: false,
};

const SHORT_STATUS_OPTIONS: StatusQueryOptions = {
  show: 'worktree-only',
  includeUntracked: true,
  includeIgnored: false,
};

export interface RepositorySummary {
  lastCommitAgeHours: number;
  shortStatus: ShortStatusCode;
  statusEntries?: StatusEntry[];
  stashes?: string[];
}

export interface SummarizeOptions {
  includeStatusEntries?: boolean;
  includeStashes?: boolean;
}

export interface RepositoryHandleOptions {
  now?: () => Date;
}

export function formatStatusEntry(entry: StatusEntry): string {
  return `${entry.code} ${entry.path}`;
}

export function formatStashEntry(index: number, message: string): string {
  return `stash@{${index}}: ${message}`;
}

/**
 * A repository root plus read-only queries against it.
 *
 * Nothing is held open between calls: every query reopens the repository
 * through the backend, so a repository that moved or vanished since the scan
 * surfaces as a `RepositoryUnavailableError` from that query.
 */
export class RepositoryHandle {
  private readonly now: () => Date;

  constructor(
    public readonly path: string,
    private readonly backend: VcsBackend,
    options: RepositoryHandleOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private open(): Promise<BackendRepository> {
    return this.backend.open(this.path);
  }

  /**
   * Whole hours since the tip commit, or `UNKNOWN_AGE_HOURS` when there is no
   * commit or the tip cannot be read.
   */
  async lastCommitAgeHours(): Promise<number> {
    const repo = await this.open();
    let timestamp: Date | null;
    try {
      timestamp = await this.backend.headCommitTimestamp(repo);
    } catch {
      return UNKNOWN_AGE_HOURS;
    }
    if (!timestamp) {
      return UNKNOWN_AGE_HOURS;
    }
    return Math.trunc((this.now().getTime() - timestamp.getTime()) / MS_PER_HOUR);
  }

  /** Code of the first worktree status entry, or `CLEAN_STATUS`. */
  async shortStatus(): Promise<ShortStatusCode> {
    const repo = await this.open();
    const entries = await this.backend.statuses(repo, SHORT_STATUS_OPTIONS);
    const first = entries[0];
    return first ? shortFormatStatus(first.flags) : CLEAN_STATUS;
  }

  async fullStatus(): Promise<StatusEntry[]> {
    const repo = await this.open();
    const entries = await this.backend.statuses(repo, FULL_STATUS_OPTIONS);
    return entries.map((entry) => ({ path: entry.path, code: shortFormatStatus(entry.flags) }));
  }

  /** `stash@{<index>}: <message>` lines, most recent first. */
  async stashList(): Promise<string[]> {
    const repo = await this.open();
    const stashes = await this.backend.stashEntries(repo);
    return stashes.map((stash) => formatStashEntry(stash.index, stash.message));
  }

  async summarize(options: SummarizeOptions = {}): Promise<RepositorySummary> {
    const [lastCommitAgeHours, shortStatus] = await Promise.all([
      this.lastCommitAgeHours(),
      this.shortStatus(),
    ]);
    const summary: RepositorySummary = { lastCommitAgeHours, shortStatus };
    if (options.includeStatusEntries) {
      summary.statusEntries = await this.fullStatus();
    }
    if (options.includeStashes) {
      summary.stashes = await this.stashList();
    }
    return summary;
  }

  toString(): string {
    return this.path;
  }
}
