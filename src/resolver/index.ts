/**
 * Resolution engine
 *
 * Turns one operation into a Resolution. Everything here is synchronous; the
 * menu's single blocking read lives in the navigator.
 */

import { ignoreDirectory, unignoreDirectory } from '../registry/ignore.ts';
import { getMark, removeMark, setMark, suggestMarks } from '../registry/marks.ts';
import type { NavDatabase } from '../types/database.ts';
import type { Operation, Resolution } from '../types/navigation.ts';
import { evictStale, recordVisit } from '../utils/frecency.ts';
import { resolveSearch } from './search.ts';

export interface ResolveContext {
  /** Epoch seconds */
  now: number;
  discountFactor: number;
  maxAge: number;
}

export type SyncOperation = Exclude<Operation, { kind: 'menu' }>;

export function resolveMarkJump(db: NavDatabase, name: string): Resolution {
  const directory = getMark(db, name);
  if (directory !== undefined) {
    return { status: 'resolved', directory, via: 'jump' };
  }
  return { status: 'unresolved', reason: 'mark-not-found', name, suggestions: suggestMarks(db, name) };
}

/**
 * Resolve every operation except the interactive menu
 */
export function resolveOperation(
  db: NavDatabase,
  operation: SyncOperation,
  context: ResolveContext,
): Resolution {
  switch (operation.kind) {
    case 'mark': {
      if (!operation.remove) {
        setMark(db, operation.name, operation.directory);
        return { status: 'unresolved', reason: 'mutation', operation: 'mark' };
      }
      const removal = removeMark(db, operation.name);
      if (!removal.removed) {
        return { status: 'unresolved', reason: 'mark-missing', name: operation.name };
      }
      return { status: 'unresolved', reason: 'mutation', operation: 'unmark' };
    }

    case 'ignore': {
      if (!operation.remove) {
        ignoreDirectory(db, operation.directory);
        return { status: 'unresolved', reason: 'mutation', operation: 'ignore' };
      }
      if (!unignoreDirectory(db, operation.directory)) {
        return { status: 'unresolved', reason: 'not-ignored', directory: operation.directory };
      }
      return { status: 'unresolved', reason: 'mutation', operation: 'unignore' };
    }

    case 'jump':
      return resolveMarkJump(db, operation.name);

    case 'add':
      if (recordVisit(db, operation.directory, context.now, context.discountFactor)) {
        evictStale(db, context.now, context.maxAge);
      }
      return { status: 'unresolved', reason: 'mutation', operation: 'add' };

    case 'search':
      return resolveSearch(db, operation.args);
  }
}
