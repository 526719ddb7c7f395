/**
 * Interactive menu
 *
 * Two ranked sections share one zero-based index: the most frequent
 * directories first, then the most recent ones. Besides an index the user may
 * answer `i` (list ignored directories) or `m` (list marks); both print and
 * select nothing.
 */

import { DEFAULT_MAX_CHOICES } from '../config.ts';
import { listIgnored } from '../registry/ignore.ts';
import { listMarks } from '../registry/marks.ts';
import type { NavDatabase } from '../types/database.ts';
import type { MenuEntry, MenuOutcome, Resolution } from '../types/navigation.ts';
import { rankByFrequency, rankByRecency } from '../utils/frecency.ts';

export const LIST_IGNORED_COMMAND = 'i';
export const LIST_MARKS_COMMAND = 'm';

export function buildMenu(db: NavDatabase, maxChoices = DEFAULT_MAX_CHOICES): MenuEntry[] {
  const frequent = rankByFrequency(db).slice(0, maxChoices);
  const recent = rankByRecency(db).slice(0, maxChoices);

  return [
    ...frequent.map((directory, i) => ({ index: i, directory, section: 'frequent' as const })),
    ...recent.map((directory, i) => ({
      index: frequent.length + i,
      directory,
      section: 'recent' as const,
    })),
  ];
}

/**
 * Map the user's reply to a directory, a listing, or an invalid selection
 */
export function handleSelection(
  input: string,
  menu: readonly MenuEntry[],
  db: NavDatabase,
): MenuOutcome {
  const selection = input.trim();

  const entry = menu.find((e) => String(e.index) === selection);
  if (entry) {
    return { kind: 'selected', directory: entry.directory };
  }

  if (selection === LIST_IGNORED_COMMAND) {
    return { kind: 'listing', listing: { kind: 'ignored', directories: listIgnored(db) } };
  }
  if (selection === LIST_MARKS_COMMAND) {
    return { kind: 'listing', listing: { kind: 'marks', marks: listMarks(db) } };
  }

  return { kind: 'invalid', selection };
}

export function menuOutcomeToResolution(outcome: MenuOutcome): Resolution {
  switch (outcome.kind) {
    case 'selected':
      return { status: 'resolved', directory: outcome.directory, via: 'menu' };
    case 'listing':
      return { status: 'unresolved', reason: 'listing', listing: outcome.listing };
    case 'invalid':
      return { status: 'unresolved', reason: 'invalid-selection', selection: outcome.selection };
  }
}
