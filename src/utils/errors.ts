/**
 * Error taxonomy for navmark
 *
 * Every fatal path carries its own exit code so the CLI can map an error to a
 * one-line message and a deterministic status without a stack trace.
 */

export const ExitCode = {
  Resolved: 0,
  Unresolved: 1,
  Usage: 2,
  Config: 3,
  DatabaseLoad: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class NavmarkError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NavmarkError';
    this.exitCode = exitCode;
  }
}

/**
 * Missing or invalid environment configuration
 */
export class ConfigError extends NavmarkError {
  constructor(message: string) {
    super(message, ExitCode.Config);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid command-line usage, e.g. an unknown search order
 */
export class UsageError extends NavmarkError {
  constructor(message: string) {
    super(message, ExitCode.Usage);
    this.name = 'UsageError';
  }
}

/**
 * Database file exists but cannot be read or parsed
 */
export class DatabaseLoadError extends NavmarkError {
  constructor(path: string, detail: string, options?: ErrorOptions) {
    super(`Failed to load database ${path}: ${detail}`, ExitCode.DatabaseLoad, options);
    this.name = 'DatabaseLoadError';
  }
}

/**
 * Temp-file write or rename failed. Logged by the driver, never retried.
 */
export class PersistenceError extends NavmarkError {
  constructor(path: string, detail: string, options?: ErrorOptions) {
    super(`Failed to write data to ${path}: ${detail}`, ExitCode.Unresolved, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
