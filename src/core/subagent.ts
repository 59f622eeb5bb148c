import { z } from 'zod';
import type { HookEvent } from '../cli/types';
import type { ActivityLog } from './activity-log';
import { firstOf, stringField } from './fields';

const UNKNOWN = 'unknown';

export interface SubagentStop {
  sessionId: string;
  transcriptPath: string;
  stopHookActive: boolean;
}

export function readSubagentStop(event: HookEvent): SubagentStop {
  return {
    sessionId: stringField(event, 'session_id') ?? UNKNOWN,
    transcriptPath: stringField(event, 'transcript_path') ?? UNKNOWN,
    stopHookActive: firstOf([[event, 'stop_hook_active']], z.boolean()) ?? false,
  };
}

// ---------------------------------------------------------------------------
// Handler: SubagentStop
// ---------------------------------------------------------------------------

/**
 * Reports a finished sub-agent. The transcript location is only reported
 * while stop_hook_active is clear; the transcript itself is never read.
 */
export function handleSubagentStop(event: HookEvent, log: ActivityLog): SubagentStop {
  const stop = readSubagentStop(event);

  log.emit('AGENT', `Subagent completed - Session: ${stop.sessionId}`);

  if (!stop.stopHookActive && stop.transcriptPath !== UNKNOWN) {
    log.emit('AGENT', `Transcript saved to: ${stop.transcriptPath}`);
  }

  return stop;
}
