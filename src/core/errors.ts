/**
 * tickrun error type with exit code integration.
 */

import type { ExitCode } from '../types/exit-codes.js';

/**
 * Structured error for setup failures (missing config, unwritable state
 * directory, unreadable YAML). Carries the process exit code and an
 * optional fix suggestion.
 *
 * Per-task failures never surface as a TickrunError; they are recorded in
 * the state snapshot instead.
 */
export class TickrunError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TickrunError';
    this.code = code;
    this.fix = options?.fix;
  }
}

/** Narrow an unknown throw to a Node errno error. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
