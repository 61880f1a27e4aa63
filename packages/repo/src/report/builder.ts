import Bottleneck from 'bottleneck';
import {
  AppError,
  createEvent,
  silentLogger,
  type ErrorCode,
  type Logger,
  type ReportBuilt,
} from '@roster/shared';
import type { RepositorySummary, SummarizeOptions } from '../handle/repository-handle';
import { CLEAN_STATUS } from '../handle/status-code';
import { sortEntries } from './columns';
import type {
  AccessibleEntry,
  Report,
  ReportCounts,
  ReportEntry,
  SortColumn,
  SortDirection,
} from './types';

/** What the builder needs from a repository; `RepositoryHandle` satisfies it. */
export interface SummarySource {
  readonly path: string;
  summarize(options?: SummarizeOptions): Promise<RepositorySummary>;
}

export interface ReportOptions {
  sortBy?: SortColumn;
  direction?: SortDirection;
  /** Adds the per-file status list to each entry */
  includeStatusEntries?: boolean;
  /** Adds the stash lines to each entry */
  includeStashes?: boolean;
  /** Drops accessible entries without changes */
  dirtyOnly?: boolean;
  /** Drops accessible entries without stashes; implies includeStashes */
  withStashesOnly?: boolean;
  /** Drops accessible entries whose tip is older than this many hours */
  maxAgeHours?: number;
}

export interface ReportBuilderOptions {
  /** Repositories queried at the same time. Defaults to 8. */
  concurrency?: number;
  logger?: Logger;
  runId?: string;
  now?: () => Date;
}

export const DEFAULT_REPORT_CONCURRENCY = 8;

export function isDirty(entry: ReportEntry): boolean {
  if (!entry.accessible) return false;
  return entry.shortStatus !== CLEAN_STATUS || (entry.statusEntries?.length ?? 0) > 0;
}

function errorCodeOf(error: unknown): ErrorCode {
  return error instanceof AppError ? error.code : 'UnknownError';
}

function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Collects a summary from every repository and assembles a sorted report.
 *
 * A repository that fails is kept as an inaccessible entry; `build` itself
 * does not reject because of a single repository.
 */
export class ReportBuilder {
  private readonly limiter: Bottleneck;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly now: () => Date;

  constructor(options: ReportBuilderOptions = {}) {
    this.limiter = new Bottleneck({
      maxConcurrent: options.concurrency ?? DEFAULT_REPORT_CONCURRENCY,
    });
    this.logger = options.logger ?? silentLogger;
    this.runId = options.runId ?? 'local';
    this.now = options.now ?? (() => new Date());
  }

  async build(sources: Iterable<SummarySource>, options: ReportOptions = {}): Promise<Report> {
    const summarizeOptions: SummarizeOptions = {
      includeStatusEntries: options.includeStatusEntries ?? false,
      includeStashes: (options.includeStashes ?? false) || (options.withStashesOnly ?? false),
    };

    const collected = await Promise.all(
      Array.from(sources, (source) =>
        this.limiter.schedule(() => this.collect(source, summarizeOptions)),
      ),
    );

    const counts: ReportCounts = {
      total: collected.length,
      accessible: collected.filter((entry) => entry.accessible).length,
      inaccessible: collected.filter((entry) => !entry.accessible).length,
      dirty: collected.filter(isDirty).length,
    };

    const sortBy = options.sortBy ?? 'path';
    const direction = options.direction ?? 'asc';
    const entries = sortEntries(
      collected.filter((entry) => this.keep(entry, options)),
      sortBy,
      direction,
    );

    await this.logger.log(createEvent<ReportBuilt>('ReportBuilt', this.runId, counts));

    return {
      entries,
      counts,
      sortBy,
      direction,
      generatedAt: this.now().toISOString(),
    };
  }

  private async collect(source: SummarySource, options: SummarizeOptions): Promise<ReportEntry> {
    try {
      const summary = await source.summarize(options);
      const entry: AccessibleEntry = {
        path: source.path,
        accessible: true,
        lastCommitAgeHours: summary.lastCommitAgeHours,
        shortStatus: summary.shortStatus,
      };
      if (summary.statusEntries) entry.statusEntries = summary.statusEntries;
      if (summary.stashes) entry.stashes = summary.stashes;
      return entry;
    } catch (error) {
      await this.logger.debug(`Repository ${source.path} is inaccessible: ${errorMessageOf(error)}`);
      return {
        path: source.path,
        accessible: false,
        error: { code: errorCodeOf(error), message: errorMessageOf(error) },
      };
    }
  }

  // Inaccessible entries survive every filter so a vanished repository stays visible.
  private keep(entry: ReportEntry, options: ReportOptions): boolean {
    if (!entry.accessible) return true;
    if (options.dirtyOnly && !isDirty(entry)) return false;
    if (options.withStashesOnly && (entry.stashes?.length ?? 0) === 0) return false;
    if (options.maxAgeHours !== undefined && entry.lastCommitAgeHours > options.maxAgeHours) {
      return false;
    }
    return true;
  }
}
