/**
 * Frecency scoring
 *
 * Each recorded visit multiplies every score by the discount factor and then
 * adds 1 to the visited directory, so weight shifts toward directories that
 * were visited recently in terms of visit count, not wall-clock time:
 *
 *   score(D) = Σ factor^k   over the visits to D, k = visits recorded since
 *
 * Directories not visited within the maximum age are forgotten after the next
 * recorded visit.
 */

import { DEFAULT_DISCOUNT_FACTOR, DEFAULT_MAX_AGE } from '../config.ts';
import type { NavDatabase } from '../types/database.ts';

/**
 * Multiply every score by `factor`, returning a new map
 */
export function decay(
  frequency: ReadonlyMap<string, number>,
  factor = DEFAULT_DISCOUNT_FACTOR,
): Map<string, number> {
  const decayed = new Map<string, number>();
  for (const [directory, score] of frequency) {
    decayed.set(directory, score * factor);
  }
  return decayed;
}

/**
 * Record a successful visit. Ignored directories are never scored.
 *
 * @returns false when the directory is ignored and nothing changed
 */
export function recordVisit(
  db: NavDatabase,
  directory: string,
  now: number,
  factor = DEFAULT_DISCOUNT_FACTOR,
): boolean {
  if (db.ignored.has(directory)) return false;

  db.frequency = decay(db.frequency, factor);
  db.frequency.set(directory, (db.frequency.get(directory) ?? 0) + 1);
  db.lastVisit.set(directory, now);
  return true;
}

/**
 * Forget directories whose last visit is more than `maxAge` seconds old
 *
 * @returns the evicted directories
 */
export function evictStale(db: NavDatabase, now: number, maxAge = DEFAULT_MAX_AGE): string[] {
  const evicted: string[] = [];
  for (const [directory, timestamp] of db.lastVisit) {
    if (now - timestamp > maxAge) evicted.push(directory);
  }

  for (const directory of evicted) {
    db.lastVisit.delete(directory);
    db.frequency.delete(directory);
  }
  return evicted;
}

function rankDescending(values: ReadonlyMap<string, number>): string[] {
  // Array.prototype.sort is stable, so ties keep insertion order
  return [...values.entries()].sort((a, b) => b[1] - a[1]).map(([directory]) => directory);
}

/**
 * Directories by descending score
 */
export function rankByFrequency(db: NavDatabase): string[] {
  return rankDescending(db.frequency);
}

/**
 * Directories by most recent visit first
 */
export function rankByRecency(db: NavDatabase): string[] {
  return rankDescending(db.lastVisit);
}
