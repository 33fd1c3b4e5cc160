/**
 * Tests for a complete invocation: setup checks, lock, load, pass, save.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { ExitCode } from '../../types/exit-codes.js';
import { acquireRunLock, releaseRunLock } from '../../store/lock.js';
import { loadState } from '../../store/state.js';
import { fixedClock } from '../platform.js';
import { createRequirementRegistry } from '../requirements/registry.js';
import { resolveStatePath, runTasks } from '../runner.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('runTasks', () => {
  let tempDir: string;
  let configPath: string;
  let statePath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tickrun-runner-'));
    configPath = join(tempDir, 'tasks.yaml');
    statePath = join(tempDir, 'state', 'tasks.state.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('derives the state path from the config name', () => {
    expect(resolveStatePath({ configPath: '/etc/jobs.yaml', stateDir: '/state' })).toBe(
      join('/state', 'jobs.state.json'),
    );
    expect(resolveStatePath({ configPath: '/etc/jobs.yaml', statePath: '/explicit.json' })).toBe('/explicit.json');
  });

  it('runs due tasks and persists their results', async () => {
    await writeFile(configPath, 'daily:\n  - echo one\n  - exit 3\n');
    const executor = vi.fn(async (command: string) => (command === 'exit 3' ? 3 : 0));

    const summary = await runTasks({
      configPath,
      statePath,
      executor,
      requirements: createRequirementRegistry({}),
      clock: fixedClock(NOW),
      maxWorkers: 1,
    });

    expect(summary.locked).toBe(false);
    expect(summary.exitCode).toBe(3);
    expect(executor).toHaveBeenCalledTimes(2);

    const state = await loadState(statePath);
    expect(state.tasks['daily::echo one']).toEqual({
      cadence: 'daily',
      command: 'echo one',
      last_success: '2024-03-01T12:00:00.000Z',
      last_attempt: '2024-03-01T12:00:00.000Z',
      last_status: 0,
      last_note: 'finished_at=2024-03-01T12:00:00.000Z',
    });
    expect(state.tasks['daily::exit 3']?.last_status).toBe(3);
    expect(state.tasks['daily::exit 3']?.last_success).toBeNull();
    expect(existsSync(`${statePath}.lock`)).toBe(false);
  });

  it('does not write state on a dry run', async () => {
    await writeFile(configPath, 'hourly:\n  - echo one\n');
    const executor = vi.fn(async () => 0);

    const summary = await runTasks({
      configPath,
      statePath,
      dryRun: true,
      executor,
      requirements: createRequirementRegistry({}),
      clock: fixedClock(NOW),
    });

    expect(summary.exitCode).toBe(0);
    expect(summary.outcome?.report.map((r) => r.outcome)).toEqual(['would-run']);
    expect(executor).not.toHaveBeenCalled();
    expect(existsSync(statePath)).toBe(false);
  });

  it('exits quietly when another instance holds the lock', async () => {
    await writeFile(configPath, 'hourly:\n  - echo one\n');
    await mkdir(dirname(statePath), { recursive: true });
    const held = await acquireRunLock(statePath);
    const executor = vi.fn(async () => 0);

    const summary = await runTasks({
      configPath,
      statePath,
      executor,
      requirements: createRequirementRegistry({}),
    });

    expect(summary).toEqual({ exitCode: ExitCode.SUCCESS, statePath, locked: true, outcome: null });
    expect(executor).not.toHaveBeenCalled();
    await releaseRunLock(held);
  });

  it('raises NOT_FOUND for a missing config', async () => {
    await expect(
      runTasks({ configPath, statePath, executor: async () => 0 }),
    ).rejects.toMatchObject({ code: ExitCode.NOT_FOUND, message: `Config not found: ${configPath}` });
  });

  it('raises CONFIG_ERROR for invalid YAML and releases the lock', async () => {
    await writeFile(configPath, 'daily: [unclosed\n');
    await expect(
      runTasks({ configPath, statePath, executor: async () => 0 }),
    ).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
    expect(existsSync(`${statePath}.lock`)).toBe(false);
  });

  it('raises FILE_ERROR when the state directory cannot be created', async () => {
    await writeFile(configPath, 'daily:\n');
    const blocker = join(tempDir, 'blocker');
    await writeFile(blocker, 'not a directory');

    await expect(
      runTasks({ configPath, statePath: join(blocker, 'tasks.state.json'), executor: async () => 0 }),
    ).rejects.toMatchObject({ code: ExitCode.FILE_ERROR });
  });

  it('writes a state file even when nothing is configured', async () => {
    await writeFile(configPath, 'daily:\n');
    const summary = await runTasks({ configPath, statePath, executor: async () => 0 });
    expect(summary.exitCode).toBe(0);
    expect(await readFile(statePath, 'utf8')).toBe('{\n  "tasks": {}\n}\n');
  });
});
