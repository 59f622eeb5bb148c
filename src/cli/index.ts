#!/usr/bin/env node
/**
 * CLI entry point for tool-activity.
 *
 * Invoked by a coding agent's hooks with one JSON event on stdin. It:
 * 1. Reads stdin to the end
 * 2. Decodes it as JSON (anything else is a silent no-op)
 * 3. Dispatches the event, writing activity lines to stderr
 *
 * stdout is never written and the exit status is always 0, so the hook can
 * never make the agent treat the observed action as failed.
 */

import { logger } from '../util/logger';
import { loadConfig } from '../util/config';
import { ActivityLog } from '../core/activity-log';
import { dispatch } from '../core/dispatcher';
import { parseHookEvent, readStdin } from './input';

/**
 * Main entry point. Loads config, sets up logging, reads and decodes stdin,
 * and dispatches the event.
 */
async function main(): Promise<void> {
  try {
    const { config, warnings } = loadConfig();
    logger.configure(config.logging);

    for (const w of warnings) {
      logger.warn(`config warning: ${w}`);
    }

    const raw = await readStdin();
    const event = parseHookEvent(raw);
    if (event === undefined) return;

    const log = new ActivityLog(process.stderr);
    const outcome = dispatch(event, log, { activeTaskFile: config.activeTask.file });

    logger.debug(`Dispatched event: ${outcome} (${log.emitted} lines)`);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`CLI error: ${message}`);
  } finally {
    process.exitCode = 0;
  }
}

void main();
