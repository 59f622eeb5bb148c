import { logger } from '../util/logger';
import type { HookEvent } from './types';

/**
 * Reads all of stdin into a string. Returns an empty string if stdin is a TTY
 * (i.e. no piped input) or if reading fails.
 */
export function readStdin(): Promise<string> {
  return new Promise((resolve) => {
    if (process.stdin.isTTY) {
      resolve('');
      return;
    }

    const chunks: Buffer[] = [];

    process.stdin.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    process.stdin.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });

    process.stdin.on('error', () => {
      resolve('');
    });
  });
}

/**
 * Decodes the raw stdin text. Returns undefined for empty or malformed input.
 */
export function parseHookEvent(raw: string): HookEvent | undefined {
  if (!raw.trim()) {
    return undefined;
  }

  try {
    const event: HookEvent = JSON.parse(raw);
    return event;
  } catch {
    logger.debug(`Ignoring stdin that is not JSON: ${raw.substring(0, 200)}`);
    return undefined;
  }
}
