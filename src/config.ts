/**
 * Runtime configuration
 *
 * NAVMARK_DATA is required and names the directory that holds navigate.json.
 * The scoring constants can be tuned through the environment:
 * - NAVMARK_DISCOUNT_FACTOR  multiplier applied to every score on each visit
 * - NAVMARK_MAX_AGE          seconds without a visit before a directory is forgotten
 * - NAVMARK_MAX_CHOICES      entries per menu section
 * - NAVMARK_DEBUG            any non-empty value enables debug logging
 */

import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './utils/errors.ts';

export const DATA_DIR_ENV = 'NAVMARK_DATA';
export const DB_FILENAME = 'navigate.json';

export const DEFAULT_DISCOUNT_FACTOR = 0.99;
export const DEFAULT_MAX_AGE = 30 * 24 * 3600;
export const DEFAULT_MAX_CHOICES = 10;

export interface NavConfig {
  dataDir: string;
  discountFactor: number;
  maxAge: number;
  maxChoices: number;
  debug: boolean;
}

const overridesSchema = z.object({
  NAVMARK_DISCOUNT_FACTOR: z.coerce
    .number()
    .gt(0, 'must be greater than 0')
    .lte(1, 'must be at most 1')
    .default(DEFAULT_DISCOUNT_FACTOR),
  NAVMARK_MAX_AGE: z.coerce.number().positive('must be positive').default(DEFAULT_MAX_AGE),
  NAVMARK_MAX_CHOICES: z.coerce
    .number()
    .int('must be an integer')
    .positive('must be positive')
    .default(DEFAULT_MAX_CHOICES),
});

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NavConfig {
  const dataDir = env[DATA_DIR_ENV];
  if (!dataDir) {
    throw new ConfigError(`Need to set ${DATA_DIR_ENV} environment variable.`);
  }

  // Empty strings fall back to the defaults
  const parsed = overridesSchema.safeParse({
    NAVMARK_DISCOUNT_FACTOR: env.NAVMARK_DISCOUNT_FACTOR || undefined,
    NAVMARK_MAX_AGE: env.NAVMARK_MAX_AGE || undefined,
    NAVMARK_MAX_CHOICES: env.NAVMARK_MAX_CHOICES || undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
  }

  return {
    dataDir,
    discountFactor: parsed.data.NAVMARK_DISCOUNT_FACTOR,
    maxAge: parsed.data.NAVMARK_MAX_AGE,
    maxChoices: parsed.data.NAVMARK_MAX_CHOICES,
    debug: Boolean(env.NAVMARK_DEBUG),
  };
}

/**
 * Path of the database file inside the data directory
 */
export function getDbPath(config: Pick<NavConfig, 'dataDir'>): string {
  return join(config.dataDir, DB_FILENAME);
}
