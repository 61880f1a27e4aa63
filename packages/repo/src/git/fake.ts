import { BackendError, RepositoryUnavailableError } from '@roster/shared';
import type {
  BackendRepository,
  BackendStatusEntry,
  StashEntry,
  StatusQueryOptions,
  VcsBackend,
} from './types';
import { hasAnyFlag, makeStatusFlags } from './types';

export interface FakeRepository {
  headTimestamp?: Date | null;
  /** Makes headCommitTimestamp reject */
  headError?: boolean;
  statuses?: BackendStatusEntry[];
  /** Makes statuses reject */
  statusError?: boolean;
  stashes?: string[];
}

/**
 * In-memory backend for tests and dry runs. Repositories are keyed by path;
 * unknown paths fail to open.
 */
export class FakeBackend implements VcsBackend {
  private readonly repos = new Map<string, FakeRepository>();
  readonly openCalls: string[] = [];

  constructor(repos: Record<string, FakeRepository> = {}) {
    for (const [repoPath, repo] of Object.entries(repos)) {
      this.repos.set(repoPath, repo);
    }
  }

  set(repoPath: string, repo: FakeRepository): this {
    this.repos.set(repoPath, repo);
    return this;
  }

  remove(repoPath: string): void {
    this.repos.delete(repoPath);
  }

  async open(repoPath: string): Promise<BackendRepository> {
    this.openCalls.push(repoPath);
    if (!this.repos.has(repoPath)) {
      throw new RepositoryUnavailableError(repoPath);
    }
    return { path: repoPath, gitDir: `${repoPath}/.git` };
  }

  async statuses(
    repo: BackendRepository,
    options: StatusQueryOptions,
  ): Promise<BackendStatusEntry[]> {
    const state = this.state(repo);
    if (state.statusError) {
      throw new BackendError(`Could not read status for ${repo.path}`);
    }
    return (state.statuses ?? [])
      .filter((entry) => options.includeUntracked || !isOnlyUntracked(entry))
      .filter((entry) => options.includeIgnored || !entry.flags.ignored)
      .map((entry) =>
        options.show === 'worktree-only'
          ? {
              path: entry.path,
              flags: makeStatusFlags({
                ...entry.flags,
                indexNew: false,
                indexModified: false,
                indexDeleted: false,
                indexRenamed: false,
                indexTypechange: false,
              }),
            }
          : entry,
      )
      .filter((entry) => hasAnyFlag(entry.flags));
  }

  async headCommitTimestamp(repo: BackendRepository): Promise<Date | null> {
    const state = this.state(repo);
    if (state.headError) {
      throw new BackendError(`Could not read HEAD for ${repo.path}`);
    }
    return state.headTimestamp ?? null;
  }

  async stashEntries(repo: BackendRepository): Promise<StashEntry[]> {
    return (this.state(repo).stashes ?? []).map((message, index) => ({ index, message }));
  }

  private state(repo: BackendRepository): FakeRepository {
    const state = this.repos.get(repo.path);
    if (!state) {
      throw new RepositoryUnavailableError(repo.path);
    }
    return state;
  }
}

function isOnlyUntracked(entry: BackendStatusEntry): boolean {
  const { wtNew, indexNew } = entry.flags;
  return wtNew && !indexNew;
}
