/**
 * Navigator - one invocation from load to exit code
 *
 * Loads the database once, applies exactly one operation, saves once, then
 * writes the resolved directory to stdout or explains on stderr why there is
 * none. I/O is injected so the whole flow runs without a terminal.
 */

import { isAbsolute, resolve } from 'node:path';
import type { LineWriter, Reporter } from './cli/utils.ts';
import { getDbPath, type NavConfig } from './config.ts';
import { isIgnored } from './registry/ignore.ts';
import { resolveOperation, type ResolveContext } from './resolver/index.ts';
import { buildMenu, handleSelection, menuOutcomeToResolution } from './resolver/menu.ts';
import { selectOperation, type NavigateFlags } from './resolver/operation.ts';
import { loadDatabase, saveDatabase } from './stores/database.ts';
import type { NavDatabase } from './types/database.ts';
import type { Operation, Resolution } from './types/navigation.ts';
import { ExitCode, PersistenceError, describeError } from './utils/errors.ts';
import { formatListing, formatMark, formatMenu } from './utils/format.ts';
import { evictStale, recordVisit } from './utils/frecency.ts';

export interface NavigateEnv {
  config: NavConfig;
  reporter: Reporter;
  /** Receives the resolved directory */
  writeOut: LineWriter;
  cwd: () => string;
  chdir: (directory: string) => void;
  /** The single blocking read, used only by the menu */
  readLine: () => Promise<string>;
  /** Epoch seconds */
  now: () => number;
}

export async function runNavigate(flags: NavigateFlags, env: NavigateEnv): Promise<ExitCode> {
  const { reporter } = env;
  const dbPath = getDbPath(env.config);

  const { db, existed, repaired } = loadDatabase(dbPath);
  reporter.debug(existed ? `Loaded file ${dbPath}` : `Creating new database at ${dbPath}`);
  for (const directory of repaired) {
    reporter.debug(`Dropped visit record for ignored directory ${directory}`);
  }

  const operation = selectOperation(flags, env.cwd);
  const context: ResolveContext = {
    now: env.now(),
    discountFactor: env.config.discountFactor,
    maxAge: env.config.maxAge,
  };

  const resolution =
    operation.kind === 'menu'
      ? await runMenu(db, env)
      : resolveOperation(db, operation, context);
  logOperation(operation, resolution, reporter);

  if (resolution.status === 'resolved' && resolution.via !== 'jump') {
    completeVisit(db, resolution.directory, env, context, flags.currentDirectory);
  }

  persist(dbPath, db, reporter);

  if (resolution.status === 'resolved') {
    env.writeOut(resolution.directory);
    return ExitCode.Resolved;
  }

  reportUnresolved(resolution, reporter);
  return ExitCode.Unresolved;
}

async function runMenu(db: NavDatabase, env: NavigateEnv): Promise<Resolution> {
  const menu = buildMenu(db, env.config.maxChoices);
  for (const line of formatMenu(menu)) {
    env.reporter.print(line);
  }

  const input = await env.readLine();
  const resolution = menuOutcomeToResolution(handleSelection(input, menu, db));
  if (resolution.status === 'resolved') {
    env.reporter.debug(`Selection ${input.trim()} maps to ${resolution.directory}`);
  }
  return resolution;
}

/**
 * Enter the resolved directory and score the visit
 *
 * Visits are recorded under the logical path (symlinks kept), the same
 * identity marks and ignores use: `directory` resolved against
 * `currentDirectory`, or against the working directory when none was given.
 * A failed change of directory is not fatal: the path is still emitted so the
 * calling shell can report it, but nothing is recorded.
 *
 * @returns true when a visit was recorded
 */
export function completeVisit(
  db: NavDatabase,
  directory: string,
  env: Pick<NavigateEnv, 'chdir' | 'cwd' | 'reporter'>,
  context: ResolveContext,
  currentDirectory?: string,
): boolean {
  const logicalPath = isAbsolute(directory)
    ? resolve(directory)
    : resolve(currentDirectory || env.cwd(), directory);

  try {
    env.chdir(logicalPath);
  } catch (err) {
    env.reporter.warn(`Cannot enter ${directory}: ${describeError(err)}`);
    return false;
  }

  if (isIgnored(db, logicalPath)) {
    env.reporter.debug(`Not recording ignored directory ${logicalPath}`);
    return false;
  }

  recordVisit(db, logicalPath, context.now, context.discountFactor);
  env.reporter.debug(`Recorded visit to ${logicalPath}`);
  for (const evicted of evictStale(db, context.now, context.maxAge)) {
    env.reporter.debug(`Deleting directory ${evicted}`);
  }
  return true;
}

function persist(dbPath: string, db: NavDatabase, reporter: Reporter): void {
  try {
    saveDatabase(dbPath, db);
    reporter.debug(`Successfully wrote data to ${dbPath}`);
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    reporter.error(err.message);
  }
}

function logOperation(operation: Operation, resolution: Resolution, reporter: Reporter): void {
  if (resolution.status !== 'unresolved' || resolution.reason !== 'mutation') return;

  switch (operation.kind) {
    case 'mark':
      reporter.debug(
        operation.remove
          ? `Removed mark ${operation.name}`
          : `Added mark ${operation.name} for ${operation.directory}`,
      );
      break;
    case 'ignore':
      reporter.debug(
        operation.remove
          ? `Removed directory ${operation.directory} from ignore`
          : `Ignoring directory ${operation.directory}`,
      );
      break;
    case 'add':
      reporter.debug(`Recorded visit to ${operation.directory}`);
      break;
    default:
      break;
  }
}

export function reportUnresolved(
  resolution: Extract<Resolution, { status: 'unresolved' }>,
  reporter: Reporter,
): void {
  switch (resolution.reason) {
    case 'mutation':
      break;
    case 'mark-missing':
      reporter.info(`Mark ${resolution.name} does not exist.`);
      break;
    case 'not-ignored':
      reporter.info(`Directory '${resolution.directory}' was not being ignored.`);
      break;
    case 'mark-not-found':
      reporter.error(`Mark ${resolution.name} does not exist.`);
      if (resolution.suggestions.length > 0) {
        reporter.print('Did you mean one of these marks?');
        for (const mark of resolution.suggestions) {
          reporter.print(formatMark(mark));
        }
      }
      break;
    case 'no-match':
      reporter.error(`Could not find a directory that matches '${resolution.terms.join(' ')}'`);
      break;
    case 'listing':
      for (const line of formatListing(resolution.listing)) {
        reporter.print(line);
      }
      break;
    case 'invalid-selection':
      reporter.error(`Invalid option: ${resolution.selection}`);
      break;
  }
}
