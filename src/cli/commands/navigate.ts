/**
 * Navigate command - resolve a directory, or update marks and ignores
 */

import type { ArgumentsCamelCase, Argv } from 'yargs';
import { loadConfig } from '../../config.ts';
import { runNavigate } from '../../navigator.ts';
import { ExitCode, NavmarkError, describeError } from '../../utils/errors.ts';
import { createReporter, prompt, writeStderr, writeStdout } from '../utils.ts';

interface NavigateArgs {
  directory: string[];
  add?: string;
  currentDirectory?: string;
  mark?: string;
  delete: boolean;
  ignore: boolean;
  jump?: string;
}

export const command = '$0 [directory..]';
export const describe = 'Change to a directory, search visited directories, or pick one from a menu';

export function builder(yargs: Argv): Argv<NavigateArgs> {
  return yargs
    .positional('directory', {
      type: 'string',
      array: true,
      default: [],
      describe:
        'Change the current working directory. With several arguments this becomes a search: ' +
        'the first chooses the order (f = most frequent first, r = most recent first) and the ' +
        'remaining terms must all be matched.',
    })
    .option('add', {
      alias: 'a',
      type: 'string',
      describe: 'Add the given directory to the database',
    })
    .option('current-directory', {
      alias: 'c',
      type: 'string',
      describe: 'Specify the current directory instead of asking the OS (keeps symlinks)',
    })
    .option('mark', {
      alias: 'm',
      type: 'string',
      describe: 'Mark the current directory with the given name',
    })
    .option('delete', {
      alias: 'd',
      type: 'boolean',
      default: false,
      describe: 'Remove information from the database (with --mark or --ignore)',
    })
    .option('ignore', {
      alias: 'i',
      type: 'boolean',
      default: false,
      describe: 'Ignore the current directory for all purposes',
    })
    .option('jump', {
      alias: 'j',
      type: 'string',
      describe: 'Jump to the given mark',
    }) as Argv<NavigateArgs>;
}

export async function handler(argv: ArgumentsCamelCase<NavigateArgs>): Promise<void> {
  let reporter = createReporter(writeStderr);

  try {
    const config = loadConfig();
    reporter = createReporter(writeStderr, config.debug);

    process.exitCode = await runNavigate(
      {
        directory: argv.directory.map(String),
        add: argv.add,
        currentDirectory: argv.currentDirectory,
        mark: argv.mark,
        delete: argv.delete,
        ignore: argv.ignore,
        jump: argv.jump,
      },
      {
        config,
        reporter,
        writeOut: writeStdout,
        cwd: () => process.cwd(),
        chdir: (directory) => process.chdir(directory),
        readLine: () => prompt(''),
        now: () => Date.now() / 1000,
      },
    );
  } catch (err) {
    if (err instanceof NavmarkError) {
      reporter.error(err.message);
      process.exitCode = err.exitCode;
      return;
    }
    reporter.error(`Unexpected error: ${describeError(err)}`);
    process.exitCode = ExitCode.Unresolved;
  }
}
