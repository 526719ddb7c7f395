/**
 * Operation and resolution types
 */

export type Operation =
  | { kind: 'mark'; name: string; remove: boolean; directory: string }
  | { kind: 'ignore'; remove: boolean; directory: string }
  | { kind: 'jump'; name: string }
  | { kind: 'add'; directory: string }
  | { kind: 'menu' }
  | { kind: 'search'; args: string[] };

export type SearchOrder = 'frequency' | 'recency';

export interface MarkEntry {
  name: string;
  directory: string;
}

/** How a resolved directory was reached */
export type ResolutionSource = 'jump' | 'menu' | 'literal' | 'search';

export type UnresolvedReason =
  | { reason: 'mutation'; operation: 'mark' | 'unmark' | 'ignore' | 'unignore' | 'add' }
  | { reason: 'mark-missing'; name: string }
  | { reason: 'not-ignored'; directory: string }
  | { reason: 'mark-not-found'; name: string; suggestions: MarkEntry[] }
  | { reason: 'no-match'; terms: string[] }
  | { reason: 'listing'; listing: MenuListing }
  | { reason: 'invalid-selection'; selection: string };

export type Resolution =
  | { status: 'resolved'; directory: string; via: ResolutionSource }
  | ({ status: 'unresolved' } & UnresolvedReason);

export type MenuSection = 'frequent' | 'recent';

export interface MenuEntry {
  index: number;
  directory: string;
  section: MenuSection;
}

export type MenuListing =
  | { kind: 'ignored'; directories: string[] }
  | { kind: 'marks'; marks: MarkEntry[] };

export type MenuOutcome =
  | { kind: 'selected'; directory: string }
  | { kind: 'listing'; listing: MenuListing }
  | { kind: 'invalid'; selection: string };
