import type { HookEvent, JsonValue, TodoStatus, TodoSummary } from '../cli/types';
import type { ActivityLog } from './activity-log';
import { writeActiveTask } from './active-task';
import { field, firstOf, jsonArray, stringField } from './fields';

const TRACKED_STATUSES = new Set<string>(['pending', 'in_progress', 'completed']);

function isTodoStatus(value: string | undefined): value is TodoStatus {
  return value !== undefined && TRACKED_STATUSES.has(value);
}

/**
 * Resolves the todo list: the dispatcher's resolved tool input first, then
 * `args.todos` off the top level of the event.
 */
export function resolveTodos(
  event: HookEvent,
  toolInput: JsonValue | undefined,
): JsonValue[] | undefined {
  return firstOf(
    [
      [toolInput, 'todos'],
      [field(event, 'args'), 'todos'],
    ],
    jsonArray,
  );
}

/**
 * Counts items per tracked status and picks the content of the first
 * in_progress item. Items with another status, or none, are not counted.
 */
export function summarizeTodos(todos: readonly JsonValue[]): TodoSummary {
  const summary: TodoSummary = { completed: 0, inProgress: 0, pending: 0 };
  let sawInProgress = false;

  for (const item of todos) {
    const status = stringField(item, 'status');
    if (!isTodoStatus(status)) continue;

    switch (status) {
      case 'completed':
        summary.completed++;
        break;
      case 'pending':
        summary.pending++;
        break;
      case 'in_progress':
        summary.inProgress++;
        if (!sawInProgress) {
          sawInProgress = true;
          summary.currentTask = stringField(item, 'content');
        }
        break;
    }
  }

  return summary;
}

// ---------------------------------------------------------------------------
// Handler: TodoWrite
// ---------------------------------------------------------------------------

export interface TodoWriteOptions {
  /** Where to persist the active task. Empty or undefined disables the write. */
  activeTaskFile?: string;
}

export function handleTodoWrite(
  event: HookEvent,
  toolInput: JsonValue | undefined,
  log: ActivityLog,
  options: TodoWriteOptions = {},
): TodoSummary | undefined {
  const todos = resolveTodos(event, toolInput);
  if (!todos) return undefined;

  const summary = summarizeTodos(todos);
  log.emit(
    'TODO',
    `Updated - Completed: ${summary.completed}, In Progress: ${summary.inProgress}, Pending: ${summary.pending}`,
  );

  if (summary.currentTask) {
    log.emit('TODO', `Current task: ${summary.currentTask}`);

    if (options.activeTaskFile) {
      writeActiveTask(options.activeTaskFile, summary.currentTask);
    }
  }

  return summary;
}
