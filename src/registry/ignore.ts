/**
 * Ignore registry
 *
 * An ignored directory is never scored. Ignoring drops its visit record, so a
 * directory is never both ignored and present in the frequency or time maps.
 */

import type { NavDatabase } from '../types/database.ts';

export function ignoreDirectory(db: NavDatabase, directory: string): void {
  db.ignored.add(directory);
  db.frequency.delete(directory);
  db.lastVisit.delete(directory);
}

/**
 * @returns false when the directory was not being ignored
 */
export function unignoreDirectory(db: NavDatabase, directory: string): boolean {
  return db.ignored.delete(directory);
}

export function isIgnored(db: NavDatabase, directory: string): boolean {
  return db.ignored.has(directory);
}

export function listIgnored(db: NavDatabase): string[] {
  return [...db.ignored];
}
