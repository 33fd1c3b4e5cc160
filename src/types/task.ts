/**
 * Task, cadence and state type definitions.
 *
 * The persisted shapes are described with zod so the state store can
 * validate what it reads back from disk; the static types are inferred.
 */

import { z } from 'zod';

/** Cadences a task may be declared under, in config order. */
export const CADENCES = ['hourly', 'daily', 'weekly', 'monthly'] as const;

export const CadenceSchema = z.enum(CADENCES);
export type Cadence = z.infer<typeof CadenceSchema>;

/** Control flags share the requirement list but are never evaluated. */
export const CONTROL_FLAGS: ReadonlySet<string> = new Set(['rerun_onfail']);

/** Re-run a failed task on its success timestamp rather than its last attempt. */
export const RERUN_ON_FAIL = 'rerun_onfail';

/** A single configured command. Immutable for the duration of a run. */
export interface TaskDefinition {
  cadence: Cadence;
  command: string;
  /** Requirement names and control flags, in declaration order. */
  requires: readonly string[];
}

/** Normalized config: ordered task lists per cadence. */
export type TaskConfig = Partial<Record<Cadence, readonly TaskDefinition[]>>;

/** Persisted per-task record (snake_case matches the on-disk format). */
export const TaskStateRecordSchema = z.object({
  cadence: z.string(),
  command: z.string(),
  last_success: z.string().nullable(),
  last_attempt: z.string().nullable(),
  last_status: z.number().int().nullable(),
  last_note: z.string().nullable(),
});
export type TaskStateRecord = z.infer<typeof TaskStateRecordSchema>;

/** Shape of the state file. */
export interface StateSnapshot {
  tasks: Record<string, TaskStateRecord>;
}

/** Stable primary key into the state snapshot. */
export function taskId(cadence: Cadence, command: string): string {
  return `${cadence}::${command}`;
}
