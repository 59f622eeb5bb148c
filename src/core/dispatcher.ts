import { z } from 'zod';
import { SUBAGENT_STOP } from '../cli/types';
import type { HookEvent, JsonValue } from '../cli/types';
import type { ActivityLog, ActivityTag } from './activity-log';
import { firstOf, jsonObject, stringField } from './fields';
import { handleSubagentStop } from './subagent';
import { handleTodoWrite } from './todos';
import type { TodoWriteOptions } from './todos';

// ---------------------------------------------------------------------------
// Tool-name classification
// ---------------------------------------------------------------------------

/** Builds the message for a tool input, or undefined when a required field is missing. */
type Describe = (input: JsonValue | undefined) => string | undefined;

interface ToolCategory {
  tag: ActivityTag;
  describe: Describe;
}

function requires(key: string, render: (value: string) => string): Describe {
  return (input) => {
    const value = stringField(input, key);
    return value === undefined ? undefined : render(value);
  };
}

/** `pattern` is required, `path` defaults to the current directory. */
function search(render: (pattern: string, path: string) => string): Describe {
  return (input) => {
    const pattern = stringField(input, 'pattern');
    if (pattern === undefined) return undefined;
    return render(pattern, stringField(input, 'path') ?? '.');
  };
}

const editing = requires('file_path', (p) => `Editing file: ${p}`);

// A Map rather than an object literal so names like "constructor" never hit a prototype.
const TOOL_CATEGORIES: ReadonlyMap<string, ToolCategory> = new Map<string, ToolCategory>([
  ['Read', { tag: 'READ', describe: requires('file_path', (p) => `Reading file: ${p}`) }],
  ['Write', { tag: 'WRITE', describe: requires('file_path', (p) => `Writing file: ${p}`) }],
  ['Edit', { tag: 'EDIT', describe: editing }],
  ['MultiEdit', { tag: 'EDIT', describe: editing }],
  ['Bash', { tag: 'BASH', describe: requires('command', (c) => `Executing: ${c}`) }],
  ['Grep', { tag: 'GREP', describe: search((pat, dir) => `Searching for '${pat}' in ${dir}`) }],
  [
    'Glob',
    { tag: 'GLOB', describe: search((pat, dir) => `Finding files matching '${pat}' in ${dir}`) },
  ],
  ['LS', { tag: 'LS', describe: requires('path', (p) => `Listing directory: ${p}`) }],
  ['WebFetch', { tag: 'WEB', describe: requires('url', (u) => `Fetching: ${u}`) }],
  ['WebSearch', { tag: 'SEARCH', describe: requires('query', (q) => `Searching web for: ${q}`) }],
  ['Task', { tag: 'TASK', describe: requires('description', (d) => `Launching agent: ${d}`) }],
]);

// ---------------------------------------------------------------------------
// Field reconciliation (current vs. legacy names)
// ---------------------------------------------------------------------------

export function resolveToolName(event: HookEvent): string {
  return (
    firstOf(
      [
        [event, 'tool_name'],
        [event, 'tool'],
      ],
      z.string(),
    ) ?? ''
  );
}

export function resolveToolInput(event: HookEvent): JsonValue | undefined {
  return firstOf(
    [
      [event, 'tool_input'],
      [event, 'args'],
    ],
    jsonObject,
  );
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export type DispatchOutcome = 'subagent' | 'todo' | 'tool' | 'generic' | 'skipped';

export type DispatchOptions = TodoWriteOptions;

/**
 * Classifies one event and emits its lines. Missing or mistyped fields skip
 * the line; nothing here throws on malformed input.
 */
export function dispatch(
  event: HookEvent,
  log: ActivityLog,
  options: DispatchOptions = {},
): DispatchOutcome {
  if (stringField(event, 'hook_event_name') === SUBAGENT_STOP) {
    handleSubagentStop(event, log);
    return 'subagent';
  }

  const toolName = resolveToolName(event);
  if (!toolName) return 'skipped';

  const toolInput = resolveToolInput(event);

  if (toolName === 'TodoWrite') {
    return handleTodoWrite(event, toolInput, log, options) ? 'todo' : 'skipped';
  }

  const category = TOOL_CATEGORIES.get(toolName);
  if (!category) {
    log.emit('TOOL', `Using: ${toolName}`);
    return 'generic';
  }

  const message = category.describe(toolInput);
  if (message === undefined) return 'skipped';

  log.emit(category.tag, message);
  return 'tool';
}
