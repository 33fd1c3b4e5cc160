/**
 * Durable per-task state, loaded and saved as one snapshot.
 *
 * File format:
 *   { "tasks": { "<cadence>::<command>": { cadence, command, last_attempt,
 *                 last_note, last_status, last_success } } }
 * written with sorted keys and 2-space indentation.
 */

import { z } from 'zod';
import {
  TaskStateRecordSchema,
  type Cadence,
  type StateSnapshot,
  type TaskStateRecord,
} from '../types/task.js';
import { getLogger } from '../core/logger.js';
import { atomicWriteJson, safeReadFile } from './atomic.js';

const StateFileSchema = z.object({
  tasks: z.record(z.unknown()),
});

/** A snapshot with no records. */
export function emptySnapshot(): StateSnapshot {
  return { tasks: {} };
}

/** A record for a task that has never been attempted. */
export function createTaskRecord(cadence: Cadence, command: string): TaskStateRecord {
  return {
    cadence,
    command,
    last_success: null,
    last_attempt: null,
    last_status: null,
    last_note: null,
  };
}

/**
 * Parse state file contents. Anything that is not a `{ tasks: {...} }`
 * document yields an empty snapshot; records that fail validation are
 * dropped and recreated on their next sighting.
 */
export function parseSnapshot(content: string): StateSnapshot {
  const log = getLogger('state');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    log.warn({ err }, 'state file is not valid JSON; starting from empty state');
    return emptySnapshot();
  }

  const file = StateFileSchema.safeParse(raw);
  if (!file.success) {
    log.warn('state file has an unexpected shape; starting from empty state');
    return emptySnapshot();
  }

  const snapshot = emptySnapshot();
  for (const [id, value] of Object.entries(file.data.tasks)) {
    const record = TaskStateRecordSchema.safeParse(value);
    if (record.success) {
      snapshot.tasks[id] = record.data;
    } else {
      log.warn({ taskId: id }, 'dropping malformed state record');
    }
  }
  return snapshot;
}

/**
 * Load the state snapshot. A missing or corrupt file is "no prior state",
 * never an error.
 */
export async function loadState(filePath: string): Promise<StateSnapshot> {
  let content: string | null;
  try {
    content = await safeReadFile(filePath, 'state file');
  } catch (err) {
    getLogger('state').warn({ err, filePath }, 'state file unreadable; starting from empty state');
    return emptySnapshot();
  }
  return content === null ? emptySnapshot() : parseSnapshot(content);
}

/**
 * Persist the snapshot atomically (temp file in the same directory, then
 * rename). Throws a FILE_ERROR TickrunError when the write fails.
 */
export async function saveState(filePath: string, snapshot: StateSnapshot): Promise<void> {
  await atomicWriteJson(filePath, snapshot, {
    indent: 2,
    sortKeys: true,
    label: 'state file',
    fix: 'Pass --state with a writable location.',
  });
}
