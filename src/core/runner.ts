/**
 * One complete invocation: check setup, take the run lock, load config and
 * state, run a pass, persist, release.
 *
 * Only setup failures (missing config, unwritable state location, invalid
 * YAML) escape as TickrunError; everything per-task is recorded in state.
 */

import { access, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ExitCode } from '../types/exit-codes.js';
import { loadState, saveState } from '../store/state.js';
import { withRunLock } from '../store/lock.js';
import { TickrunError } from './errors.js';
import { getLogger } from './logger.js';
import { getDefaultStatePath, getStateDir } from './paths.js';
import type { Clock } from './platform.js';
import { createDefaultRequirements, type RequirementRegistry } from './requirements/registry.js';
import { runOnce, type RunOutcome } from './scheduler/dispatcher.js';
import { createShellExecutor, type CommandExecutor } from './scheduler/executor.js';
import { loadTaskConfig } from './tasks/config-loader.js';

export interface RunTasksOptions {
  configPath: string;
  /** Explicit state file; defaults to one derived from the config name. */
  statePath?: string;
  /** Directory for the derived state file. */
  stateDir?: string;
  dryRun?: boolean;
  maxWorkers?: number;
  executor?: CommandExecutor;
  requirements?: RequirementRegistry;
  clock?: Clock;
}

export interface RunSummary {
  exitCode: number;
  statePath: string;
  /** True when another instance held the lock and nothing ran. */
  locked: boolean;
  outcome: RunOutcome | null;
}

/** Resolve the state file path for a run. */
export function resolveStatePath(opts: Pick<RunTasksOptions, 'configPath' | 'statePath' | 'stateDir'>): string {
  return opts.statePath ?? getDefaultStatePath(opts.configPath, opts.stateDir ?? getStateDir());
}

export async function runTasks(opts: RunTasksOptions): Promise<RunSummary> {
  const log = getLogger('runner');
  const statePath = resolveStatePath(opts);

  try {
    await access(opts.configPath);
  } catch (err) {
    throw new TickrunError(ExitCode.NOT_FOUND, `Config not found: ${opts.configPath}`, { cause: err });
  }

  try {
    await mkdir(dirname(statePath), { recursive: true });
  } catch (err) {
    throw new TickrunError(
      ExitCode.FILE_ERROR,
      `Cannot create state directory: ${dirname(statePath)}`,
      { fix: 'Pass --state with a writable location.', cause: err },
    );
  }

  const guarded = await withRunLock(statePath, async () => {
    const config = await loadTaskConfig(opts.configPath);
    const snapshot = await loadState(statePath);
    log.debug({ statePath, records: Object.keys(snapshot.tasks).length }, 'state loaded');

    const outcome = await runOnce(config, snapshot, {
      executor: opts.executor ?? createShellExecutor(),
      requirements: opts.requirements ?? createDefaultRequirements(),
      dryRun: opts.dryRun,
      maxWorkers: opts.maxWorkers,
      clock: opts.clock,
    });

    if (opts.dryRun) {
      log.debug({ statePath }, 'dry-run: state not saved');
    } else {
      await saveState(statePath, snapshot);
    }
    return outcome;
  });

  if (guarded.locked) {
    log.info({ statePath }, 'another instance appears to be running; exiting');
    return { exitCode: ExitCode.SUCCESS, statePath, locked: true, outcome: null };
  }

  return {
    exitCode: guarded.value.exitCode,
    statePath,
    locked: false,
    outcome: guarded.value,
  };
}
