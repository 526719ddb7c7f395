#!/usr/bin/env tsx
/**
 * navmark CLI - frecency-ranked directory navigation
 *
 * Prints exactly one directory on success; a shell function changes into it.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as navigateCmd from './cli/commands/navigate.ts';
import { error } from './cli/utils.ts';
import { ExitCode } from './utils/errors.ts';

await yargs(hideBin(process.argv))
  .scriptName('navmark')
  .usage('$0 [directory..] [options]')
  .command(navigateCmd)
  .strict()
  .fail((message, err) => {
    error(message || (err ? err.message : 'Invalid usage'));
    process.exit(ExitCode.Usage);
  })
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .epilog('Set NAVMARK_DATA to the directory that holds navigate.json')
  .parseAsync();
