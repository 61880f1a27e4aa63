import fs from 'node:fs/promises';
import path from 'node:path';
import Bottleneck from 'bottleneck';
import {
  CacheError,
  atomicWrite,
  createEvent,
  isErrnoException,
  readTextIfExists,
  silentLogger,
  type CacheLoaded,
  type CachePruned,
  type CacheSaved,
  type Logger,
} from '@roster/shared';
import { REPO_MARKER } from '../scanner/utils';
import { RepoSet, canonicalizeRepoPath } from './repo-set';

export interface CacheStoreOptions {
  /** Absolute path of the line-delimited cache file */
  cachePath: string;
  logger?: Logger;
  runId?: string;
  /** Upper bound on concurrent existence checks during merge */
  checkConcurrency?: number;
}

export interface MergeResult {
  repositories: RepoSet;
  /** Newly discovered paths that were not cached before */
  added: string[];
  /** Cached paths dropped because they no longer hold a repository */
  pruned: string[];
}

/**
 * True when `dir` is a directory that still carries a repository marker.
 */
export async function isRepositoryRoot(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) return false;
    await fs.lstat(path.join(dir, REPO_MARKER));
    return true;
  } catch {
    return false;
  }
}

/**
 * Persists the set of known repository roots, one absolute path per line.
 *
 * Writes go to a temp file in the cache directory and are renamed into
 * place, one at a time.
 */
export class CacheStore {
  readonly cachePath: string;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly writeLimiter = new Bottleneck({ maxConcurrent: 1 });
  private readonly checkLimiter: Bottleneck;
  private loaded: RepoSet | null = null;

  constructor(options: CacheStoreOptions) {
    if (!path.isAbsolute(options.cachePath)) {
      throw new CacheError(options.cachePath, `Cache path must be absolute: ${options.cachePath}`);
    }
    this.cachePath = options.cachePath;
    this.logger = options.logger ?? silentLogger;
    this.runId = options.runId ?? 'local';
    this.checkLimiter = new Bottleneck({ maxConcurrent: options.checkConcurrency ?? 32 });
  }

  /** Reads the persisted set. A missing file is an empty set. */
  async load(): Promise<RepoSet> {
    let content: string | null;
    try {
      content = await readTextIfExists(this.cachePath);
    } catch (error) {
      throw new CacheError(this.cachePath, `Could not read repository cache at ${this.cachePath}`, {
        cause: error,
      });
    }

    const set = new RepoSet();
    for (const rawLine of (content ?? '').split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line) continue;
      if (!path.isAbsolute(line)) {
        await this.logger.warn(`Skipping non-absolute cache entry: ${line}`);
        continue;
      }
      set.add(line);
    }

    this.loaded = set;
    await this.logger.log(
      createEvent<CacheLoaded>('CacheLoaded', this.runId, {
        cachePath: this.cachePath,
        repositoryCount: set.size,
      }),
    );
    return set;
  }

  /**
   * Unions the cached set with `discovered` and drops cached paths that no
   * longer exist or lost their marker.
   */
  async merge(discovered: Iterable<string>): Promise<RepoSet> {
    const result = await this.reconcile(discovered);
    return result.repositories;
  }

  /** `merge`, also reporting what was added and pruned. */
  async reconcile(discovered: Iterable<string>): Promise<MergeResult> {
    const cached = this.loaded ?? (await this.load());
    const fresh = new RepoSet(discovered);

    const previous = cached.toSortedArray().filter((p) => !fresh.has(p));
    const checks = await Promise.all(
      previous.map((p) =>
        this.checkLimiter.schedule(async () => ({
          original: p,
          alive: await isRepositoryRoot(p),
          canonical: await canonicalizeRepoPath(p),
        })),
      ),
    );

    const repositories = new RepoSet(fresh);
    const pruned: string[] = [];
    for (const check of checks) {
      if (check.alive) {
        repositories.add(check.canonical);
      } else {
        pruned.push(check.original);
      }
    }
    const added = fresh.toSortedArray().filter((p) => !cached.has(p));

    if (pruned.length > 0) {
      await this.logger.log(createEvent<CachePruned>('CachePruned', this.runId, { pruned }));
      await this.logger.debug(`Pruned ${pruned.length} stale cache entries`);
    }

    return { repositories, added, pruned };
  }

  /** Atomically replaces the persisted set. Concurrent calls run one after another. */
  async save(set: RepoSet): Promise<void> {
    const lines = set.toSortedArray();
    const content = lines.length > 0 ? lines.join('\n') + '\n' : '';

    await this.writeLimiter.schedule(async () => {
      try {
        await atomicWrite(this.cachePath, content);
      } catch (error) {
        throw new CacheError(
          this.cachePath,
          `Could not write repository cache at ${this.cachePath}`,
          { cause: error },
        );
      }
    });

    this.loaded = new RepoSet(lines);
    await this.logger.log(
      createEvent<CacheSaved>('CacheSaved', this.runId, {
        cachePath: this.cachePath,
        repositoryCount: lines.length,
      }),
    );
  }

  /** Modification time of the cache file, or null before the first save. */
  async lastSavedAt(): Promise<Date | null> {
    try {
      const stats = await fs.stat(this.cachePath);
      return stats.mtime;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw new CacheError(this.cachePath, `Could not read repository cache`, { cause: error });
    }
  }
}
