/**
 * Settings engine for tickrun.
 *
 * Resolution priority: CLI flags > environment vars > defaults.
 * The task list itself is not configured here; see core/tasks/config-loader.ts.
 */

import type { LogLevel, RunnerSettings } from '../types/config.js';
import { getStateDir, getTickrunHome } from './paths.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/** Default logging values. */
const LOGGING_DEFAULTS = {
  level: 'warn',
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
} as const;

/** Environment variable names. */
export const ENV_KEYS = {
  home: 'TICKRUN_HOME',
  stateDir: 'TICKRUN_STATE_DIR',
  logLevel: 'TICKRUN_LOG_LEVEL',
  logFile: 'TICKRUN_LOG_FILE',
  maxWorkers: 'TICKRUN_MAX_WORKERS',
} as const;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Parse a non-negative integer, or return null.
 */
export function parseNonNegativeInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  return parseInt(value.trim(), 10);
}

/**
 * Resolve runner settings from the environment.
 * Invalid values fall back to defaults rather than failing the run.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): RunnerSettings {
  const level = env[ENV_KEYS.logLevel]?.trim().toLowerCase();
  const filePath = env[ENV_KEYS.logFile]?.trim();

  return {
    home: getTickrunHome(env),
    stateDir: getStateDir(env),
    maxWorkers: parseNonNegativeInt(env[ENV_KEYS.maxWorkers]) ?? 0,
    logging: {
      level: level && isLogLevel(level) ? level : LOGGING_DEFAULTS.level,
      ...(filePath ? { filePath } : {}),
      maxFileSize: LOGGING_DEFAULTS.maxFileSize,
      maxFiles: LOGGING_DEFAULTS.maxFiles,
    },
  };
}
