import type { StatusFlags } from '../git/types';

/** Two characters: index state then worktree state. */
export type ShortStatusCode = string;

/** Code of a repository whose first status entry shows no change. */
export const CLEAN_STATUS: ShortStatusCode = '  ';

/**
 * Translates a file's status flags to its short-format code,
 * e.g. `M ` for a staged modification or `??` for an untracked file.
 */
export function shortFormatStatus(flags: StatusFlags): ShortStatusCode {
  let index = flags.indexNew
    ? 'A'
    : flags.indexModified
      ? 'M'
      : flags.indexDeleted
        ? 'D'
        : flags.indexRenamed
          ? 'R'
          : flags.indexTypechange
            ? 'T'
            : ' ';

  let worktree = ' ';
  if (flags.wtNew) {
    if (index === ' ') {
      index = '?';
    }
    worktree = '?';
  } else if (flags.wtModified) {
    worktree = 'M';
  } else if (flags.wtDeleted) {
    worktree = 'D';
  } else if (flags.wtRenamed) {
    worktree = 'R';
  } else if (flags.wtTypechange) {
    worktree = 'T';
  }

  if (flags.ignored) {
    index = '!';
    worktree = '!';
  }
  // Checked last so it wins over ignored.
  if (flags.conflicted) {
    index = 'C';
    worktree = 'C';
  }
  return `${index}${worktree}`;
}
