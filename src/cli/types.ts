/**
 * Hook event contract - the JSON payload a coding agent's hooks pass on stdin.
 *
 * Producers disagree on field names across versions, so the payload is kept
 * as a loose JSON tree and fields are resolved on demand (see core/fields).
 * The names below are the ones the dispatcher looks for:
 * - Tool events: tool_name | tool (legacy), tool_input | args (legacy)
 * - SubagentStop: session_id, transcript_path, stop_hook_active
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** One decoded stdin document. Any JSON value is accepted; only objects carry fields. */
export type HookEvent = JsonValue;

/** Hook event name that routes to the sub-agent lifecycle handler. */
export const SUBAGENT_STOP = 'SubagentStop';

export type TodoStatus = 'pending' | 'in_progress' | 'completed';

export interface TodoSummary {
  completed: number;
  inProgress: number;
  pending: number;
  /** Content of the first in_progress item, when it has one. */
  currentTask?: string;
}
