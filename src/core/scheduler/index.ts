/**
 * Scheduler: due policy, bounded execution and state reconciliation.
 */

export { runOnce, applyResult, unmetNote, finishedNote, EXECUTOR_FAILURE_CODE } from './dispatcher.js';
export type { RunOptions, RunOutcome, TaskReport, TaskResult, TaskOutcome } from './dispatcher.js';
export { isDue, isTaskDue, referenceTimestamp } from './due.js';
export { CADENCE_INTERVALS, cadenceInterval, isCadence } from './cadence.js';
export { createShellExecutor, signalExitCode, SPAWN_FAILURE_CODE } from './executor.js';
export type { CommandExecutor, OutputTarget } from './executor.js';
export { runPool, resolvePoolSize, MAX_AUTO_WORKERS } from './pool.js';
