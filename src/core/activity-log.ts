export type ActivityTag =
  | 'READ'
  | 'WRITE'
  | 'EDIT'
  | 'BASH'
  | 'GREP'
  | 'GLOB'
  | 'LS'
  | 'WEB'
  | 'SEARCH'
  | 'TASK'
  | 'TOOL'
  | 'TODO'
  | 'AGENT';

/** Anything with a string `write`, e.g. process.stderr. */
export interface ActivitySink {
  write(chunk: string): unknown;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall-clock time as HH:MM:SS (24-hour). */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Emits `[HH:MM:SS] [TAG] message` lines. The timestamp is taken once, when
 * the log is created, and shared by every line of the invocation.
 */
export class ActivityLog {
  private readonly stamp: string;
  private count = 0;

  constructor(
    private readonly sink: ActivitySink,
    now: Date = new Date(),
  ) {
    this.stamp = formatClock(now);
  }

  emit(tag: ActivityTag, message: string): void {
    this.sink.write(`[${this.stamp}] [${tag}] ${message}\n`);
    this.count++;
  }

  /** Number of lines emitted so far. */
  get emitted(): number {
    return this.count;
  }
}
