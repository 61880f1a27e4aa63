import { comparePaths } from '@roster/shared';
import { CLEAN_STATUS } from '../handle/status-code';
import type { AccessibleEntry, ReportEntry, SortColumn, SortDirection } from './types';

type Comparator = (a: ReportEntry, b: ReportEntry) => number;

interface Column {
  /** Primary key order; ties always fall back to ascending path */
  compare: Comparator;
  /** Whether inaccessible entries are kept after the others regardless of direction */
  inaccessibleLast: boolean;
}

function byAccessible(compare: (a: AccessibleEntry, b: AccessibleEntry) => number): Comparator {
  return (a, b) => {
    if (a.accessible && b.accessible) return compare(a, b);
    return 0;
  };
}

function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const COLUMNS: Record<SortColumn, Column> = {
  path: {
    compare: (a, b) => comparePaths(a.path, b.path),
    inaccessibleLast: false,
  },
  // Freshest first; unknown ages carry the largest value.
  lastCommit: {
    compare: byAccessible((a, b) => a.lastCommitAgeHours - b.lastCommitAgeHours),
    inaccessibleLast: true,
  },
  // Changed repositories before clean ones, then by code.
  status: {
    compare: byAccessible((a, b) => {
      const aClean = a.shortStatus === CLEAN_STATUS;
      const bClean = b.shortStatus === CLEAN_STATUS;
      if (aClean !== bClean) return aClean ? 1 : -1;
      return compareCodes(a.shortStatus, b.shortStatus);
    }),
    inaccessibleLast: true,
  },
};

export function isSortColumn(value: string): value is SortColumn {
  return Object.prototype.hasOwnProperty.call(COLUMNS, value);
}

/**
 * Returns a sorted copy. The order is total: equal keys are ordered by path,
 * so the same entries always come out in the same order.
 */
export function sortEntries(
  entries: readonly ReportEntry[],
  sortBy: SortColumn = 'path',
  direction: SortDirection = 'asc',
): ReportEntry[] {
  const column = COLUMNS[sortBy];
  const sign = direction === 'desc' ? -1 : 1;

  return [...entries].sort((a, b) => {
    if (column.inaccessibleLast && a.accessible !== b.accessible) {
      return a.accessible ? -1 : 1;
    }
    const primary = column.compare(a, b) * sign;
    if (primary !== 0) return primary;
    return comparePaths(a.path, b.path);
  });
}
