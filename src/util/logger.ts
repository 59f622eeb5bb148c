import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** The `logging` section of the resolved config. */
export interface LogSettings {
  level: LogLevel;
  /** Empty disables file logging. */
  file: string;
}

/**
 * Internal diagnostics for tool-activity itself. stderr carries activity
 * lines, so this only appends to the configured file, if any.
 */
class Logger {
  private settings: LogSettings = { level: 'info', file: '' };
  private dirReady = false;

  configure(settings: LogSettings): void {
    this.settings = {
      level: settings.level,
      file: settings.file.replace(/^~/, os.homedir()),
    };
    this.dirReady = false;
  }

  /** Resolved log file path, or '' when disabled. */
  get file(): string {
    return this.settings.file;
  }

  private enabled(level: LogLevel): boolean {
    return this.settings.file !== '' && LOG_LEVELS[level] >= LOG_LEVELS[this.settings.level];
  }

  private append(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const { file } = this.settings;
    try {
      if (!this.dirReady) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        this.dirReady = true;
      }
      fs.appendFileSync(file, `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`, 'utf-8');
    } catch {
      // A broken log file never affects the hook
    }
  }

  debug(message: string): void {
    this.append('debug', message);
  }

  info(message: string): void {
    this.append('info', message);
  }

  warn(message: string): void {
    this.append('warn', message);
  }

  error(message: string): void {
    this.append('error', message);
  }
}

export const logger = new Logger();
export type { LogLevel };
