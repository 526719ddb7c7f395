/**
 * Positional search
 *
 * A single argument is a literal path. Several arguments are an order prefix
 * (`f` for frequency, `r` for recency) followed by terms that must all appear
 * in a directory's path. The first directory in rank order that contains every
 * term wins.
 */

import type { NavDatabase } from '../types/database.ts';
import type { Resolution, SearchOrder } from '../types/navigation.ts';
import { UsageError } from '../utils/errors.ts';
import { rankByFrequency, rankByRecency } from '../utils/frecency.ts';

const ORDER_PREFIXES: Record<string, SearchOrder> = {
  f: 'frequency',
  r: 'recency',
};

export function parseSearchOrder(prefix: string): SearchOrder {
  const order = Object.hasOwn(ORDER_PREFIXES, prefix) ? ORDER_PREFIXES[prefix] : undefined;
  if (!order) {
    throw new UsageError(
      `'${prefix}' is an invalid search type. Use 'r' for recent and 'f' for frequent.`,
    );
  }
  return order;
}

/**
 * True when every term is a substring of `directory`
 */
export function matchesAllTerms(terms: readonly string[], directory: string): boolean {
  return terms.every((term) => directory.includes(term));
}

export function findDirectory(
  db: NavDatabase,
  order: SearchOrder,
  terms: readonly string[],
): string | undefined {
  const candidates = order === 'frequency' ? rankByFrequency(db) : rankByRecency(db);
  return candidates.find((directory) => matchesAllTerms(terms, directory));
}

export function resolveSearch(db: NavDatabase, args: readonly string[]): Resolution {
  const [first, ...terms] = args;
  if (first === undefined) {
    throw new UsageError('A search needs at least one argument.');
  }

  if (terms.length === 0) {
    return { status: 'resolved', directory: first, via: 'literal' };
  }

  const order = parseSearchOrder(first);
  const directory = findDirectory(db, order, terms);
  if (directory === undefined) {
    return { status: 'unresolved', reason: 'no-match', terms };
  }
  return { status: 'resolved', directory, via: 'search' };
}
