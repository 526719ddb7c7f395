/**
 * Navigation database persistence
 *
 * On disk the database is one JSON object with four collections:
 *
 *   { "mark": { name: dir }, "count": { dir: score },
 *     "ignore": { dir: 1 }, "time": { dir: epochSeconds } }
 *
 * A missing file is an empty database. Anything else that cannot be read or
 * validated is fatal; there is no partial recovery.
 */

import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createEmptyDatabase, type NavDatabase } from '../types/database.ts';
import { atomicWrite } from '../utils/atomic-write.ts';
import { DatabaseLoadError, PersistenceError, describeError } from '../utils/errors.ts';

const IGNORE_MARKER = 1;

const databaseFileSchema = z
  .object({
    mark: z.record(z.string()).default({}),
    count: z.record(z.number().nonnegative()).default({}),
    ignore: z.record(z.literal(IGNORE_MARKER)).default({}),
    time: z.record(z.number().nonnegative()).default({}),
  })
  .strict();

export type DatabaseFile = z.infer<typeof databaseFileSchema>;

export interface LoadResult {
  db: NavDatabase;
  /** False when no file existed and an empty database was created */
  existed: boolean;
  /** Visit records dropped because their directory is ignored */
  repaired: string[];
}

/**
 * Parse and validate database JSON
 *
 * Throws a plain Error describing the first problem; callers attach the path.
 */
export function parseDatabase(text: string): { db: NavDatabase; repaired: string[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`invalid JSON (${describeError(err)})`);
  }

  const result = databaseFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'top level';
    throw new Error(`${where}: ${issue?.message ?? 'invalid content'}`);
  }

  return fromFile(result.data);
}

function fromFile(file: DatabaseFile): { db: NavDatabase; repaired: string[] } {
  const db = createEmptyDatabase();

  for (const [name, directory] of Object.entries(file.mark)) {
    db.marks.set(name, directory);
  }
  for (const directory of Object.keys(file.ignore)) {
    db.ignored.add(directory);
  }
  for (const [directory, score] of Object.entries(file.count)) {
    db.frequency.set(directory, score);
  }
  for (const [directory, timestamp] of Object.entries(file.time)) {
    db.lastVisit.set(directory, timestamp);
  }

  // An ignored directory never keeps a visit record
  const repaired: string[] = [];
  for (const directory of db.ignored) {
    const hadCount = db.frequency.delete(directory);
    const hadTime = db.lastVisit.delete(directory);
    if (hadCount || hadTime) repaired.push(directory);
  }

  return { db, repaired };
}

/**
 * Convert to the on-disk shape
 */
export function toFile(db: NavDatabase): DatabaseFile {
  return {
    mark: Object.fromEntries(db.marks),
    count: Object.fromEntries(db.frequency),
    ignore: Object.fromEntries([...db.ignored].map((directory) => [directory, IGNORE_MARKER] as const)),
    time: Object.fromEntries(db.lastVisit),
  };
}

export function serializeDatabase(db: NavDatabase): string {
  return JSON.stringify(toFile(db));
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load the database, bootstrapping an empty one when the file is absent
 */
export function loadDatabase(path: string): LoadResult {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      return { db: createEmptyDatabase(), existed: false, repaired: [] };
    }
    throw new DatabaseLoadError(path, describeError(err), { cause: err });
  }

  try {
    const { db, repaired } = parseDatabase(text);
    return { db, existed: true, repaired };
  } catch (err) {
    throw new DatabaseLoadError(path, describeError(err), { cause: err });
  }
}

/**
 * Persist the database atomically, creating the data directory if needed
 */
export function saveDatabase(path: string, db: NavDatabase): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    atomicWrite(path, serializeDatabase(db));
  } catch (err) {
    throw new PersistenceError(path, describeError(err), { cause: err });
  }
}
