import * as fs from 'fs';
import { logger } from '../util/logger';

/**
 * Overwrites `filePath` with exactly `task` (no trailing newline).
 * Returns false on any filesystem error; never throws.
 */
export function writeActiveTask(filePath: string, task: string): boolean {
  try {
    fs.writeFileSync(filePath, task, 'utf-8');
    logger.debug(`[active-task] Wrote ${Buffer.byteLength(task, 'utf-8')} bytes to ${filePath}`);
    return true;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.debug(`[active-task] Could not write ${filePath}: ${msg}`);
    return false;
  }
}
