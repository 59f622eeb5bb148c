import * as fs from 'fs';
import { z } from 'zod';
import type { LogSettings } from './logger';

export interface ToolActivityConfig {
  /** Active-task persistence for TodoWrite events. */
  activeTask: {
    /** File overwritten with the current in-progress task. Empty disables. Default: "". */
    file: string;
  };
  /** Internal logging (never stderr). Level defaults to "info", file to "" (off); ~ expands. */
  logging: LogSettings;
}

export interface LoadedConfig {
  config: ToolActivityConfig;
  /** Values that were rejected and replaced by their defaults. */
  warnings: string[];
}

const DEFAULT_CONFIG: ToolActivityConfig = {
  activeTask: {
    file: '',
  },
  logging: {
    level: 'info',
    file: '',
  },
};

/** Environment variables read by {@link loadConfig}. */
export const ENV = {
  configPath: 'TOOL_ACTIVITY_CONFIG',
  taskFile: 'TOOL_ACTIVITY_TASK_FILE',
  logLevel: 'TOOL_ACTIVITY_LOG_LEVEL',
  logFile: 'TOOL_ACTIVITY_LOG_FILE',
} as const;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function readConfigFile(filePath: string, warnings: string[]): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch {
    // No config file - defaults apply
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) return parsed;
    warnings.push(`${filePath} is not a JSON object, ignoring it`);
  } catch {
    warnings.push(`${filePath} is not valid JSON, ignoring it`);
  }
  return {};
}

/**
 * Validates one value, falling back to `fallback` (with a warning) when it is
 * present but of the wrong shape.
 */
function pick<T>(
  value: unknown,
  schema: z.ZodType<T>,
  fallback: T,
  name: string,
  warnings: string[],
): T {
  if (value === undefined) return fallback;

  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  warnings.push(`${name}=${JSON.stringify(value)} invalid, using default ${JSON.stringify(fallback)}`);
  return fallback;
}

/**
 * Builds the configuration from defaults, the JSON config file and the
 * environment, in increasing order of precedence. The config file is only
 * read when TOOL_ACTIVITY_CONFIG names one.
 */
export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: string[] = [];
  const configPath = env[ENV.configPath];
  const raw = configPath ? readConfigFile(configPath, warnings) : {};

  const activeTask = section(raw, 'activeTask');
  const logging = section(raw, 'logging');

  if (env[ENV.taskFile] !== undefined) activeTask.file = env[ENV.taskFile];
  if (env[ENV.logLevel] !== undefined) logging.level = env[ENV.logLevel];
  if (env[ENV.logFile] !== undefined) logging.file = env[ENV.logFile];

  const config: ToolActivityConfig = {
    activeTask: {
      file: pick(activeTask.file, z.string(), DEFAULT_CONFIG.activeTask.file, 'activeTask.file', warnings),
    },
    logging: {
      level: pick(logging.level, logLevelSchema, DEFAULT_CONFIG.logging.level, 'logging.level', warnings),
      file: pick(logging.file, z.string(), DEFAULT_CONFIG.logging.file, 'logging.file', warnings),
    },
  };

  return { config, warnings };
}

export { DEFAULT_CONFIG };
