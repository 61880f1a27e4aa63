import type { ErrorCode, SORT_COLUMNS } from '@roster/shared';
import type { StatusEntry } from '../handle/repository-handle';
import type { ShortStatusCode } from '../handle/status-code';

export type SortColumn = (typeof SORT_COLUMNS)[number];
export type SortDirection = 'asc' | 'desc';

export interface AccessibleEntry {
  path: string;
  accessible: true;
  lastCommitAgeHours: number;
  shortStatus: ShortStatusCode;
  statusEntries?: StatusEntry[];
  stashes?: string[];
}

/** A known repository that could not be opened or queried during the build. */
export interface InaccessibleEntry {
  path: string;
  accessible: false;
  error: {
    code: ErrorCode;
    message: string;
  };
}

export type ReportEntry = AccessibleEntry | InaccessibleEntry;

export interface ReportCounts {
  /** Every repository the build looked at, before filters */
  total: number;
  accessible: number;
  inaccessible: number;
  dirty: number;
}

export interface Report {
  entries: ReportEntry[];
  counts: ReportCounts;
  sortBy: SortColumn;
  direction: SortDirection;
  /** ISO 8601 */
  generatedAt: string;
}
