/**
 * Durable file replacement
 *
 * The data is written to a temp file in the target's directory, flushed to
 * stable storage and renamed over the target. Readers see either the old file
 * or the new one, never a partial write.
 */

import { randomBytes } from 'node:crypto';
import { closeSync, fsyncSync, openSync, renameSync, rmSync, writeSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

/**
 * Temp file path beside the target
 */
export function tempPathFor(target: string): string {
  const suffix = randomBytes(6).toString('hex');
  return join(dirname(target), `.${basename(target)}.${suffix}.tmp`);
}

/**
 * Replace `target` with `data` as one atomic step
 */
export function atomicWrite(target: string, data: string): void {
  const tempPath = tempPathFor(target);

  try {
    const fd = openSync(tempPath, 'wx', 0o644);
    try {
      writeSync(fd, data, null, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, target);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw err;
  }
}
