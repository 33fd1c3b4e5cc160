/**
 * Runner settings type definitions.
 * Resolution priority: CLI flags > environment variables > defaults.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'warn') */
  level: LogLevel;
  /** Log file path; when unset, logs go to stderr */
  filePath?: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated files to keep (default: 5) */
  maxFiles: number;
}

/** Fully resolved runner settings. */
export interface RunnerSettings {
  /** Directory holding the default config file. */
  home: string;
  /** Directory holding default state files. */
  stateDir: string;
  /** Worker pool size; 0 means "one per due task, capped". */
  maxWorkers: number;
  logging: LoggingConfig;
}
