/**
 * Scheduler / dispatcher: one finite pass over the configured tasks.
 *
 * The controller (this module) is the only writer of the state snapshot.
 * It decides what is due, gates on requirements, hands due commands to a
 * bounded pool, and applies the returned results after every worker has
 * finished. Workers only report.
 */

import type {
  StateSnapshot,
  TaskConfig,
  TaskDefinition,
  TaskStateRecord,
} from '../../types/task.js';
import { taskId as toTaskId } from '../../types/task.js';
import { createTaskRecord } from '../../store/state.js';
import { getLogger, type Logger } from '../logger.js';
import { formatTimestamp, systemClock, type Clock } from '../platform.js';
import { evaluateAll, type RequirementRegistry } from '../requirements/registry.js';
import { listTasks } from '../tasks/config-loader.js';
import { isTaskDue } from './due.js';
import type { CommandExecutor } from './executor.js';
import { resolvePoolSize, runPool } from './pool.js';

/** What happened to one config entry during a pass. */
export type TaskOutcome = 'not-due' | 'unmet' | 'duplicate' | 'ran' | 'would-run';

export interface TaskReport {
  taskId: string;
  cadence: string;
  command: string;
  outcome: TaskOutcome;
  /** Unmet requirement names, for 'unmet'. */
  unmet?: string[];
  /** Result code, for 'ran' and 'would-run'. */
  code?: number;
}

/** Value a worker hands back to the controller. */
export interface TaskResult {
  taskId: string;
  code: number;
  startedAt: string;
  finishedAt: string;
}

export interface RunOptions {
  executor: CommandExecutor;
  requirements: RequirementRegistry;
  /** Skip execution and leave results unapplied. */
  dryRun?: boolean;
  /** Pool size override; 0 or absent means automatic. */
  maxWorkers?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RunOutcome {
  /** First non-zero result code in application order, else 0. */
  exitCode: number;
  /** Results in arrival order; applied to the snapshot unless dry-run. */
  results: TaskResult[];
  /** One entry per config entry, in config order. */
  report: TaskReport[];
}

/** Result code recorded when the executor itself rejects. */
export const EXECUTOR_FAILURE_CODE = 1;

/** Note written when a due task is held back by its requirements. */
export function unmetNote(unmet: readonly string[]): string {
  return `skipped: unmet requirements [${unmet.join(', ')}]`;
}

/** Note written after a task has run. */
export function finishedNote(finishedAt: string): string {
  return `finished_at=${finishedAt}`;
}

/**
 * Fetch-or-create the record for a task and refresh its descriptive
 * fields from the current config.
 */
function syncRecord(snapshot: StateSnapshot, id: string, task: TaskDefinition): TaskStateRecord {
  const record = snapshot.tasks[id] ?? createTaskRecord(task.cadence, task.command);
  record.cadence = task.cadence;
  record.command = task.command;
  snapshot.tasks[id] = record;
  return record;
}

/**
 * Apply one worker result to its record.
 */
export function applyResult(record: TaskStateRecord, result: TaskResult): void {
  record.last_attempt = result.startedAt;
  record.last_status = result.code;
  record.last_note = finishedNote(result.finishedAt);
  if (result.code === 0) {
    record.last_success = result.finishedAt;
  }
}

/**
 * Run one pass: decide, gate, execute, reconcile.
 *
 * Mutates `snapshot` in place (record refresh, unmet notes and, outside
 * dry-run, results). Persisting it is the caller's job.
 */
export async function runOnce(
  config: TaskConfig,
  snapshot: StateSnapshot,
  options: RunOptions,
): Promise<RunOutcome> {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? getLogger('scheduler');
  const now = clock.now();

  const report: TaskReport[] = [];
  const due: Array<{ id: string; task: TaskDefinition; entry: TaskReport }> = [];
  const seen = new Set<string>();

  for (const task of listTasks(config)) {
    const id = toTaskId(task.cadence, task.command);
    const record = syncRecord(snapshot, id, task);
    const entry: TaskReport = { taskId: id, cadence: task.cadence, command: task.command, outcome: 'not-due' };
    report.push(entry);

    if (!isTaskDue(record, task.cadence, task.requires, now)) {
      log.debug({ taskId: id }, 'skip: not due');
      continue;
    }

    const unmet = await evaluateAll(options.requirements, task.requires, {
      taskId: id,
      command: task.command,
    });
    if (unmet.length > 0) {
      record.last_note = unmetNote(unmet);
      entry.outcome = 'unmet';
      entry.unmet = unmet;
      log.info({ taskId: id, unmet }, 'skip: requirements not met');
      continue;
    }

    if (seen.has(id)) {
      entry.outcome = 'duplicate';
      continue;
    }
    seen.add(id);
    entry.outcome = options.dryRun ? 'would-run' : 'ran';
    due.push({ id, task, entry });
  }

  log.debug({ due: due.length }, 'due tasks selected');

  if (due.length === 0) {
    return { exitCode: 0, results: [], report };
  }

  const poolSize = resolvePoolSize(due.length, options.maxWorkers);

  const results = await runPool(due, poolSize, async ({ id, task }): Promise<TaskResult> => {
    const startedAt = formatTimestamp(clock.now());
    let code = 0;
    if (options.dryRun) {
      log.info({ taskId: id, command: task.command }, 'dry-run: would run');
    } else {
      log.info({ taskId: id, command: task.command }, 'run');
      try {
        code = await options.executor(task.command);
      } catch (err) {
        log.error({ err, taskId: id }, 'executor failed');
        code = EXECUTOR_FAILURE_CODE;
      }
    }
    return { taskId: id, code, startedAt, finishedAt: formatTimestamp(clock.now()) };
  });

  const entries = new Map(due.map(({ id, entry }) => [id, entry]));
  let exitCode = 0;

  for (const result of results) {
    const entry = entries.get(result.taskId);
    if (entry) entry.code = result.code;
    if (options.dryRun) continue;

    const record = snapshot.tasks[result.taskId];
    if (record) applyResult(record, result);
    if (result.code !== 0 && exitCode === 0) {
      exitCode = result.code;
    }
    log.info({ taskId: result.taskId, code: result.code }, result.code === 0 ? 'done' : 'failed');
  }

  return { exitCode, results, report };
}
