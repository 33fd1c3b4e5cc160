/**
 * Cadence → minimum re-run interval.
 */

import { CADENCES, type Cadence } from '../../types/task.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Fixed lookup; total over every Cadence. Monthly is anacron-style 30 days. */
export const CADENCE_INTERVALS: Readonly<Record<Cadence, number>> = Object.freeze({
  hourly: HOUR_MS,
  daily: DAY_MS,
  weekly: 7 * DAY_MS,
  monthly: 30 * DAY_MS,
});

export function isCadence(value: string): value is Cadence {
  return (CADENCES as readonly string[]).includes(value);
}

export function cadenceInterval(cadence: Cadence): number {
  return CADENCE_INTERVALS[cadence];
}
