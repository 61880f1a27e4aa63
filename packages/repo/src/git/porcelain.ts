import {
  hasAnyFlag,
  makeStatusFlags,
  type BackendStatusEntry,
  type StatusFlag,
  type StatusFlags,
  type StatusShow,
} from './types';

// Unmerged XY pairs, see git-status(1).
const CONFLICT_PAIRS = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);

const INDEX_FLAGS: Record<string, StatusFlag> = {
  A: 'indexNew',
  C: 'indexNew',
  M: 'indexModified',
  D: 'indexDeleted',
  R: 'indexRenamed',
  T: 'indexTypechange',
};

const WORKTREE_FLAGS: Record<string, StatusFlag> = {
  A: 'wtNew',
  M: 'wtModified',
  D: 'wtDeleted',
  R: 'wtRenamed',
  T: 'wtTypechange',
};

/**
 * Translates one porcelain XY pair into backend flags.
 */
export function flagsFromXY(xy: string): StatusFlags {
  if (xy === '??') return makeStatusFlags({ wtNew: true });
  if (xy === '!!') return makeStatusFlags({ ignored: true });
  if (CONFLICT_PAIRS.has(xy)) return makeStatusFlags({ conflicted: true });

  const set: Partial<Record<StatusFlag, boolean>> = {};
  const indexFlag = INDEX_FLAGS[xy.charAt(0)];
  const worktreeFlag = WORKTREE_FLAGS[xy.charAt(1)];
  if (indexFlag) set[indexFlag] = true;
  if (worktreeFlag) set[worktreeFlag] = true;
  return makeStatusFlags(set);
}

/**
 * Parses `git status --porcelain=v1 -z` output.
 *
 * Records are NUL-terminated `XY path`; renames and copies carry the source
 * path as an extra record that is skipped here.
 */
export function parsePorcelainZ(
  output: string,
  show: StatusShow = 'index-and-worktree',
): BackendStatusEntry[] {
  const records = output.split('\0');
  const entries: BackendStatusEntry[] = [];

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (record.length < 4) continue;

    const xy = record.slice(0, 2);
    const filePath = record.slice(3);
    if (xy.includes('R') || xy.includes('C')) {
      i++;
    }

    let flags = flagsFromXY(xy);
    if (show === 'worktree-only') {
      flags = makeStatusFlags({
        ...flags,
        indexNew: false,
        indexModified: false,
        indexDeleted: false,
        indexRenamed: false,
        indexTypechange: false,
      });
      if (!hasAnyFlag(flags)) continue;
    }
    entries.push({ path: filePath, flags });
  }

  return entries;
}
