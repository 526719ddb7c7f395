/**
 * CLI utility functions
 *
 * Standard output carries nothing but the resolved directory, so every
 * message, menu and listing is written to standard error.
 */

import * as readline from 'node:readline';

export type LineWriter = (line: string) => void;

export const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export const writeStderr: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Print with color (simple ANSI codes)
 */
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export function colorize(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export interface Reporter {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  /** Only written when verbose */
  debug(message: string): void;
  /** Uncolored line, e.g. a menu row */
  print(line: string): void;
}

export function createReporter(write: LineWriter = writeStderr, verbose = false): Reporter {
  return {
    error: (message) => write(colorize(`✗ ${message}`, 'red')),
    warn: (message) => write(colorize(`⚠ ${message}`, 'yellow')),
    info: (message) => write(colorize(`ℹ ${message}`, 'blue')),
    debug: (message) => {
      if (verbose) write(colorize(`… ${message}`, 'gray'));
    },
    print: write,
  };
}

/**
 * Print error message
 */
export function error(message: string): void {
  createReporter().error(message);
}

/**
 * Read one line from stdin, prompting on stderr
 *
 * Resolves with an empty string if stdin closes before a line arrives.
 */
export async function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve('');
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}
