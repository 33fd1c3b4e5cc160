/**
 * Tests for the command-line surface: argument parsing, bootstrap,
 * report printing and error mapping.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fixedClock } from '../../core/platform.js';
import { createRequirementRegistry } from '../../core/requirements/registry.js';
import { ExitCode } from '../../types/exit-codes.js';
import { parseMaxWorkers, runCli, type CliDependencies } from '../program.js';

describe('parseMaxWorkers', () => {
  it('accepts non-negative integers', () => {
    expect(parseMaxWorkers('0')).toBe(0);
    expect(parseMaxWorkers('8')).toBe(8);
  });

  it('rejects anything else', () => {
    expect(() => parseMaxWorkers('-1')).toThrow(InvalidArgumentError);
    expect(() => parseMaxWorkers('many')).toThrow(InvalidArgumentError);
  });
});

describe('runCli', () => {
  let tempDir: string;
  let out: string[];
  let err: string[];
  let deps: CliDependencies;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tickrun-cli-'));
    out = [];
    err = [];
    deps = {
      env: { TICKRUN_HOME: tempDir, TICKRUN_STATE_DIR: join(tempDir, 'state'), NO_COLOR: '1' },
      cwd: tempDir,
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      executor: vi.fn(async () => 0),
      requirements: createRequirementRegistry({}),
      clock: fixedClock(new Date('2024-03-01T12:00:00.000Z')),
    };
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('prints the package version', async () => {
    expect(await runCli(['--version'], deps)).toBe(0);
    expect(out).toEqual(['0.1.0\n']);
  });

  it('rejects an invalid --max-workers value', async () => {
    expect(await runCli(['--max-workers', 'lots'], deps)).toBe(ExitCode.INVALID_INPUT);
    expect(err).toEqual([
      "error: option '--max-workers <n>' argument 'lots' is invalid. Must be a non-negative integer.\n",
    ]);
    expect(deps.executor).not.toHaveBeenCalled();
  });

  it('rejects an unknown option as invalid input', async () => {
    expect(await runCli(['--frobnicate'], deps)).toBe(ExitCode.INVALID_INPUT);
    expect(err.join('')).toContain("error: unknown option '--frobnicate'");
    expect(deps.executor).not.toHaveBeenCalled();
  });

  it('exits 0 for --help', async () => {
    expect(await runCli(['--help'], deps)).toBe(ExitCode.SUCCESS);
    expect(out.join('')).toContain('Usage: tickrun [options] [config]');
  });

  it('creates the default config when no path is given', async () => {
    expect(await runCli([], deps)).toBe(ExitCode.SUCCESS);
    expect(await readFile(join(tempDir, '.tickrun.yaml'), 'utf8')).toBe('daily:\n');
    expect(await readFile(join(tempDir, 'state', '.tickrun.state.json'), 'utf8')).toBe('{\n  "tasks": {}\n}\n');
    expect(out).toEqual([]);
  });

  it('leaves an existing default config untouched', async () => {
    await writeFile(join(tempDir, '.tickrun.yaml'), 'hourly:\n  - echo hi\n');
    expect(await runCli([], deps)).toBe(0);
    expect(await readFile(join(tempDir, '.tickrun.yaml'), 'utf8')).toBe('hourly:\n  - echo hi\n');
    expect(deps.executor).toHaveBeenCalledWith('echo hi');
  });

  it('resolves a relative config path against the working directory', async () => {
    await writeFile(join(tempDir, 'jobs.yaml'), 'weekly:\n  - echo weekly\n');
    expect(await runCli(['jobs.yaml'], deps)).toBe(0);
    expect(deps.executor).toHaveBeenCalledWith('echo weekly');
    const state = await readFile(join(tempDir, 'state', 'jobs.state.json'), 'utf8');
    expect(state).toContain('"weekly::echo weekly"');
  });

  it('honors --state', async () => {
    await writeFile(join(tempDir, 'jobs.yaml'), 'daily:\n  - echo a\n');
    expect(await runCli(['jobs.yaml', '--state', 'custom.json'], deps)).toBe(0);
    const state = await readFile(join(tempDir, 'custom.json'), 'utf8');
    expect(state).toContain('"daily::echo a"');
  });

  it('prints the report on --dry-run', async () => {
    await writeFile(join(tempDir, 'jobs.yaml'), 'daily:\n  - echo a\n');
    expect(await runCli(['jobs.yaml', '--dry-run'], deps)).toBe(0);
    expect(out).toEqual(['DRY-RUN (would run): [daily] echo a\nDue tasks: 1\n']);
    expect(deps.executor).not.toHaveBeenCalled();
  });

  it('returns the failing task code', async () => {
    await writeFile(join(tempDir, 'jobs.yaml'), 'daily:\n  - exit 5\n');
    deps.executor = vi.fn(async () => 5);
    expect(await runCli(['jobs.yaml'], deps)).toBe(5);
  });

  it('maps a missing config to NOT_FOUND', async () => {
    const missing = join(tempDir, 'missing.yaml');
    expect(await runCli([missing], deps)).toBe(ExitCode.NOT_FOUND);
    expect(err).toEqual([`Error: Config not found: ${missing}\n`]);
  });

  it('maps invalid YAML to CONFIG_ERROR with a fix hint', async () => {
    const path = join(tempDir, 'broken.yaml');
    await writeFile(path, 'daily: [unclosed\n');
    expect(await runCli([path], deps)).toBe(ExitCode.CONFIG_ERROR);
    expect(err).toEqual([
      `Error: Invalid YAML in: ${path}\n`,
      'Fix: Each cadence key must hold a list of commands.\n',
    ]);
  });
});
