import type { Dirent } from 'node:fs';
import nodeFs from 'node:fs/promises';
import path from 'node:path';
import Bottleneck from 'bottleneck';
import {
  ScanAbortedError,
  comparePaths,
  createEvent,
  silentLogger,
  type Logger,
  type ScanCompleted,
  type ScanStarted,
} from '@roster/shared';
import { RepoSet } from '../cache/repo-set';
import type { DiscoveryOptions, DiscoveryResult, ScanWarning } from './types';
import {
  DEFAULT_SCAN_CONCURRENCY,
  ExclusionMatcher,
  REPO_MARKER,
  toScanWarning,
} from './utils';

export * from './types';
export { ExclusionMatcher, REPO_MARKER, classifyFsError } from './utils';

/** The slice of `fs/promises` the scanner reads through. */
export interface ScannerFs {
  readdir(dir: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  realpath(p: string): Promise<string>;
  stat(p: string): Promise<{ isDirectory(): boolean }>;
}

interface PendingDirectory {
  /** Canonical path of the directory */
  dir: string;
  /** Canonical scan root the directory was reached from */
  root: string;
  /** Path of the directory as reached from `root`, through any followed links */
  logical: string;
}

interface DirectoryVisit {
  dir: string;
  read: boolean;
  isRepository: boolean;
  children: PendingDirectory[];
  warnings: ScanWarning[];
}

// Directories handed to the limiter per round, as a multiple of its concurrency.
const BATCH_FACTOR = 4;

/**
 * Walks directory trees looking for repository roots.
 *
 * The walk keeps an explicit frontier instead of recursing, reads
 * directories through a bounded limiter and funnels every result into one
 * loop that owns the result set.
 */
export class RepoScanner {
  private fs: ScannerFs;
  private logger: Logger;
  private runId: string;

  constructor(fs: ScannerFs = nodeFs, options: { logger?: Logger; runId?: string } = {}) {
    this.fs = fs;
    this.logger = options.logger ?? silentLogger;
    this.runId = options.runId ?? 'local';
  }

  async scan(roots: string[], options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
    const startedAt = Date.now();
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_SCAN_CONCURRENCY);
    const limiter = new Bottleneck({ maxConcurrent: concurrency });
    const matcher = new ExclusionMatcher(options.ignore, options.excludePaths);

    const repositories = new RepoSet();
    const warnings: ScanWarning[] = [];
    const visited = new Set<string>();
    const frontier: PendingDirectory[] = [];
    let directoriesVisited = 0;

    await this.logger.log(
      createEvent<ScanStarted>('ScanStarted', this.runId, { roots, concurrency }),
    );

    for (const root of roots) {
      const resolved = path.resolve(root);
      let canonical: string;
      try {
        canonical = await this.fs.realpath(resolved);
        const stats = await this.fs.stat(canonical);
        if (!stats.isDirectory()) {
          warnings.push({ path: resolved, kind: 'unreadable', message: 'Not a directory' });
          continue;
        }
      } catch (error) {
        warnings.push(toScanWarning(resolved, error));
        continue;
      }
      if (visited.has(canonical)) continue;
      visited.add(canonical);
      frontier.push({ dir: canonical, root: canonical, logical: canonical });
    }

    while (frontier.length > 0) {
      if (options.signal?.aborted) {
        throw new ScanAbortedError({ cause: options.signal.reason });
      }

      // Taking from the end keeps the walk depth-first and the frontier small.
      const batch = frontier.splice(-Math.min(frontier.length, concurrency * BATCH_FACTOR));
      const visits = await Promise.all(
        batch.map((item) => limiter.schedule(() => this.visit(item, matcher, options))),
      );

      for (const visit of visits) {
        if (visit.read) directoriesVisited++;
        warnings.push(...visit.warnings);

        if (visit.isRepository && !repositories.has(visit.dir)) {
          repositories.add(visit.dir);
          options.onRepository?.(visit.dir);
        }

        for (const child of visit.children) {
          if (visited.has(child.dir)) continue;
          visited.add(child.dir);
          frontier.push(child);
        }
      }
    }

    if (options.signal?.aborted) {
      throw new ScanAbortedError({ cause: options.signal.reason });
    }

    warnings.sort((a, b) => comparePaths(a.path, b.path));
    const durationMs = Date.now() - startedAt;

    await this.logger.log(
      createEvent<ScanCompleted>('ScanCompleted', this.runId, {
        repositoryCount: repositories.size,
        warningCount: warnings.length,
        directoriesVisited,
        durationMs,
      }),
    );

    return {
      repositories,
      warnings,
      stats: { directoriesVisited, durationMs },
    };
  }

  private async visit(
    item: PendingDirectory,
    matcher: ExclusionMatcher,
    options: DiscoveryOptions,
  ): Promise<DirectoryVisit> {
    const excludeHidden = options.excludeHidden ?? true;
    const followSymlinks = options.followSymlinks ?? true;

    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(item.dir, { withFileTypes: true });
    } catch (error) {
      // Permission denied or deleted during scan
      return {
        dir: item.dir,
        read: false,
        isRepository: false,
        children: [],
        warnings: [toScanWarning(item.dir, error)],
      };
    }

    const children: PendingDirectory[] = [];
    const warnings: ScanWarning[] = [];
    let isRepository = false;

    for (const entry of entries) {
      const name = entry.name;
      if (name === REPO_MARKER) {
        // The marker itself is never descended into.
        isRepository = true;
        continue;
      }
      if (excludeHidden && name.startsWith('.')) continue;

      const entryPath = path.join(item.dir, name);
      const logicalPath = path.join(item.logical, name);
      let target: string;

      if (entry.isDirectory()) {
        target = entryPath;
      } else if (entry.isSymbolicLink()) {
        if (!followSymlinks) continue;
        try {
          target = await this.fs.realpath(entryPath);
          const stats = await this.fs.stat(target);
          if (!stats.isDirectory()) continue;
        } catch (error) {
          warnings.push(toScanWarning(entryPath, error, true));
          continue;
        }
      } else {
        continue;
      }

      // Patterns match the path below the root, even once a link leads elsewhere.
      if (matcher.isExcluded(item.root, logicalPath, target)) continue;
      children.push({ dir: target, root: item.root, logical: logicalPath });
    }

    return { dir: item.dir, read: true, isRepository, children, warnings };
  }
}
