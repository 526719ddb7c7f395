/**
 * Mark registry - named bookmarks for directories
 *
 * Marks are independent of visit records: they never decay, are never
 * evicted, and may point at directories that were never visited.
 */

import type { NavDatabase } from '../types/database.ts';
import type { MarkEntry } from '../types/navigation.ts';

export type MarkRemoval = { removed: true; directory: string } | { removed: false };

/**
 * Point `name` at `directory`, overwriting any existing mark
 *
 * @returns the previous target when a mark was overwritten
 */
export function setMark(db: NavDatabase, name: string, directory: string): string | undefined {
  const previous = db.marks.get(name);
  db.marks.set(name, directory);
  return previous;
}

export function removeMark(db: NavDatabase, name: string): MarkRemoval {
  const directory = db.marks.get(name);
  if (directory === undefined) return { removed: false };
  db.marks.delete(name);
  return { removed: true, directory };
}

export function getMark(db: NavDatabase, name: string): string | undefined {
  return db.marks.get(name);
}

function byName(a: MarkEntry, b: MarkEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * All marks sorted by name
 */
export function listMarks(db: NavDatabase): MarkEntry[] {
  return [...db.marks.entries()].map(([name, directory]) => ({ name, directory })).sort(byName);
}

/**
 * Suggestions for a mark that does not exist
 *
 * Finds the longest prefix of `name` that starts at least one mark and returns
 * every mark starting with it, sorted by name. Matching is case-sensitive.
 */
export function suggestMarks(db: NavDatabase, name: string): MarkEntry[] {
  const marks = listMarks(db);

  for (let length = name.length; length > 0; length--) {
    const prefix = name.slice(0, length);
    const matches = marks.filter((mark) => mark.name.startsWith(prefix));
    if (matches.length > 0) return matches;
  }

  return [];
}
