/**
 * Centralized pino logger factory for tickrun.
 *
 * Singleton pattern. Logs go to stderr so stdout stays free for the run
 * report; when a log file is configured, pino-roll handles rotation and
 * retention instead. Context via child loggers (getLogger('subsystem')).
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging settings resolved by loadSettings()
 * @returns The root pino logger instance
 */
export function initLogger(config: LoggingConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.filePath) {
    mkdirSync(dirname(config.filePath), { recursive: true });

    // pino.transport() runs in a worker thread; the CLI flushes it
    // through closeLogger() before exiting.
    const transport = pino.transport({
      target: 'pino-roll',
      options: {
        file: config.filePath,
        size: bytesToSizeString(config.maxFileSize),
        frequency: 'daily',
        mkdir: true,
        limit: { count: config.maxFiles },
      },
    });
    rootLogger = pino(options, transport);
  } else {
    rootLogger = pino(options, pino.destination(2));
  }

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger so
 * library callers and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'scheduler', 'lock')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}

export type Logger = pino.Logger;
