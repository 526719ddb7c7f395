/**
 * Select the single operation an invocation performs
 */

import type { Operation } from '../types/navigation.ts';

export interface NavigateFlags {
  directory?: string[];
  add?: string;
  currentDirectory?: string;
  mark?: string;
  delete?: boolean;
  ignore?: boolean;
  jump?: string;
}

/**
 * Map parsed flags to one operation
 *
 * Precedence: mark, ignore, jump, add, then the menu when no positional
 * arguments were given, otherwise a search. Empty flag values count as absent. `currentDirectory`
 * overrides `cwd` for mark and ignore.
 */
export function selectOperation(flags: NavigateFlags, cwd: () => string): Operation {
  const remove = flags.delete ?? false;
  // Only mark and ignore need the working directory
  const currentDirectory = (): string => flags.currentDirectory || cwd();

  if (flags.mark) {
    return { kind: 'mark', name: flags.mark, remove, directory: currentDirectory() };
  }
  if (flags.ignore) {
    return { kind: 'ignore', remove, directory: currentDirectory() };
  }
  if (flags.jump) {
    return { kind: 'jump', name: flags.jump };
  }
  if (flags.add) {
    return { kind: 'add', directory: flags.add };
  }

  const args = flags.directory ?? [];
  if (args.length === 0) {
    return { kind: 'menu' };
  }
  return { kind: 'search', args };
}
