/**
 * tickrun public API.
 *
 * runTasks() is the whole invocation; runOnce() is a single pass over an
 * already-loaded config and snapshot for callers that manage their own
 * persistence.
 */

export * from './types/index.js';
export { TickrunError } from './core/errors.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { loadSettings } from './core/config.js';
export {
  getDefaultConfigPath,
  getDefaultStatePath,
  getLockPath,
  getStateDir,
} from './core/paths.js';
export { systemClock, fixedClock, formatTimestamp, parseTimestamp } from './core/platform.js';
export type { Clock } from './core/platform.js';
export { runTasks, resolveStatePath } from './core/runner.js';
export type { RunTasksOptions, RunSummary } from './core/runner.js';
export * from './core/scheduler/index.js';
export * from './core/requirements/index.js';
export {
  loadTaskConfig,
  parseTaskConfig,
  normalizeTaskConfig,
  ensureDefaultConfig,
  listTasks,
} from './core/tasks/config-loader.js';
export * from './store/index.js';
export { runCli } from './cli/program.js';
