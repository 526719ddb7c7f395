/**
 * Output formatting utilities
 */

import { colorize } from '../cli/utils.ts';
import { LIST_IGNORED_COMMAND, LIST_MARKS_COMMAND } from '../resolver/menu.ts';
import type { MarkEntry, MenuEntry, MenuListing, MenuSection } from '../types/navigation.ts';

const SECTION_TITLES: Record<MenuSection, string> = {
  frequent: 'Most Frequent Directories:',
  recent: 'Most Recent Directories:',
};

/**
 * Menu lines, one heading per section followed by the extra commands
 */
export function formatMenu(menu: readonly MenuEntry[]): string[] {
  const lines: string[] = [];

  for (const section of ['frequent', 'recent'] as const) {
    lines.push(SECTION_TITLES[section]);
    for (const entry of menu.filter((e) => e.section === section)) {
      lines.push(`  (${entry.index}) ${entry.directory}`);
    }
  }

  lines.push('Other options:');
  lines.push(`  (${LIST_IGNORED_COMMAND}) List ignored directories`);
  lines.push(`  (${LIST_MARKS_COMMAND}) List all marks`);
  return lines;
}

export function formatMarkName(name: string): string {
  return colorize(name, 'cyan');
}

export function formatMark(mark: MarkEntry): string {
  return `  ${formatMarkName(mark.name)} ${mark.directory}`;
}

export function formatListing(listing: MenuListing): string[] {
  if (listing.kind === 'ignored') {
    return ['Ignored directories:', ...listing.directories.map((d) => `  ${d}`)];
  }
  return ['Marked directories:', ...listing.marks.map(formatMark)];
}
