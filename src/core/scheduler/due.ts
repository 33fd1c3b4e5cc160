/**
 * Due-check and retry-after-failure policy.
 */

import { RERUN_ON_FAIL, type Cadence, type TaskStateRecord } from '../../types/task.js';
import { elapsedMs, parseTimestamp } from '../platform.js';
import { cadenceInterval } from './cadence.js';

type DueFields = Pick<TaskStateRecord, 'last_success' | 'last_attempt' | 'last_status'>;

/**
 * Pick the timestamp the interval is measured from.
 *
 * A task that never ran, last succeeded, or carries `rerun_onfail` is
 * measured from its last success. A failed task without the flag is
 * measured from its last attempt, so it waits a full interval before
 * being retried.
 */
export function referenceTimestamp(
  record: DueFields,
  requires: readonly string[],
): string | null {
  if (
    record.last_status === null ||
    record.last_status === 0 ||
    requires.includes(RERUN_ON_FAIL)
  ) {
    return record.last_success;
  }
  return record.last_attempt ?? record.last_success;
}

/**
 * True iff the reference is absent, unparsable, or at least one cadence
 * interval old at `now`.
 */
export function isDue(
  reference: string | null,
  cadence: Cadence,
  now: Date,
): boolean {
  const last = parseTimestamp(reference);
  if (!last) return true;
  return elapsedMs(last, now) >= cadenceInterval(cadence);
}

/** Convenience: reference selection plus the interval check. */
export function isTaskDue(
  record: DueFields,
  cadence: Cadence,
  requires: readonly string[],
  now: Date,
): boolean {
  return isDue(referenceTimestamp(record, requires), cadence, now);
}
