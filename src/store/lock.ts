/**
 * Single-instance locking using proper-lockfile.
 * Prevents two runs from working against the same state file at once.
 *
 * The marker lives beside the state file (`<state>.lock`) and is created
 * with an exclusive primitive, so there is no check-then-create window.
 * A marker whose mtime is at least the staleness threshold old is replaced;
 * while a run holds the lock its mtime is refreshed.
 *
 * The marker is a bare directory and carries no owner information, so the
 * holder's pid is logged at acquire time and the marker's age on contention.
 */

import { stat } from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import { TickrunError, isErrnoException } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { getLockPath } from '../core/paths.js';
import { ExitCode } from '../types/exit-codes.js';

/** A marker older than this belongs to a dead run. */
export const STALE_LOCK_MS = 2 * 60 * 60 * 1000;

/** A release function returned by proper-lockfile. */
export type ReleaseFn = () => Promise<void>;

/** Token for a held run lock. */
export interface RunLock {
  lockPath: string;
  /** Process holding the lock. */
  pid: number;
  acquiredAt: string;
  release: ReleaseFn;
}

/** Last refresh time of an existing marker, or null if it cannot be read. */
async function markerTime(lockPath: string): Promise<string | null> {
  try {
    return (await stat(lockPath)).mtime.toISOString();
  } catch {
    return null;
  }
}

/**
 * Try to take the run lock for a state file.
 *
 * @returns The lock, or null when another live instance holds it
 */
export async function acquireRunLock(
  statePath: string,
  options?: { stale?: number },
): Promise<RunLock | null> {
  const lockPath = getLockPath(statePath);
  const log = getLogger('lock');

  try {
    const release = await lockfile.lock(statePath, {
      lockfilePath: lockPath,
      // proper-lockfile replaces a marker only when strictly older than `stale`
      stale: (options?.stale ?? STALE_LOCK_MS) - 1,
      retries: 0,
      realpath: false,
      onCompromised: (err: Error) => {
        log.error({ err, lockPath }, 'run lock compromised');
      },
    });
    const lock: RunLock = {
      lockPath,
      pid: process.pid,
      acquiredAt: new Date().toISOString(),
      release,
    };
    log.info({ lockPath, pid: lock.pid, acquiredAt: lock.acquiredAt }, 'run lock acquired');
    return lock;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ELOCKED') {
      log.info({ lockPath, lastRefreshed: await markerTime(lockPath) }, 'run lock held by another instance');
      return null;
    }
    throw new TickrunError(
      ExitCode.FILE_ERROR,
      `Failed to acquire lock: ${lockPath}`,
      {
        fix: 'Check that the state directory exists and is writable.',
        cause: err,
      },
    );
  }
}

/**
 * Release a run lock. An already-removed or already-released marker is
 * not an error.
 */
export async function releaseRunLock(lock: RunLock | null): Promise<void> {
  if (!lock) return;
  try {
    await lock.release();
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ERELEASED' || err.code === 'ENOENT')) {
      return;
    }
    getLogger('lock').warn({ err, lockPath: lock.lockPath }, 'failed to release run lock');
  }
}

/**
 * Execute a function while holding the run lock.
 * The lock is released when the function completes (or throws).
 *
 * @returns `{ locked: true }` when another instance holds the lock
 */
export async function withRunLock<T>(
  statePath: string,
  fn: () => Promise<T>,
): Promise<{ locked: true } | { locked: false; value: T }> {
  const lock = await acquireRunLock(statePath);
  if (!lock) {
    return { locked: true };
  }
  try {
    return { locked: false, value: await fn() };
  } finally {
    await releaseRunLock(lock);
  }
}
