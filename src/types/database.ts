/**
 * In-memory shape of the navigation database
 */

export interface NavDatabase {
  /** Mark name → directory */
  marks: Map<string, string>;
  /** Directory → decayed visit score */
  frequency: Map<string, number>;
  /** Directories excluded from scoring, search and the menu */
  ignored: Set<string>;
  /** Directory → epoch seconds of the last successful visit */
  lastVisit: Map<string, number>;
}

export function createEmptyDatabase(): NavDatabase {
  return {
    marks: new Map(),
    frequency: new Map(),
    ignored: new Set(),
    lastVisit: new Map(),
  };
}
