/**
 * Tests for YAML task list loading and normalization.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TickrunError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';
import {
  ensureDefaultConfig,
  listTasks,
  loadTaskConfig,
  normalizeTaskConfig,
  parseTaskConfig,
} from '../config-loader.js';

describe('parseTaskConfig', () => {
  it('accepts every entry form', () => {
    const config = parseTaskConfig(
      [
        'daily:',
        '  - bash a.sh:',
        '      - internet',
        '  - python a.py: Internet',
        '  - ./just_run_me.sh',
        '  - ./also_okay:',
        'weekly:',
        '  - ./cleanup_logs.sh: [internet, AC_POWER, rerun_onfail]',
        '',
      ].join('\n'),
    );

    expect(config).toEqual({
      daily: [
        { cadence: 'daily', command: 'bash a.sh', requires: ['internet'] },
        { cadence: 'daily', command: 'python a.py', requires: ['internet'] },
        { cadence: 'daily', command: './just_run_me.sh', requires: [] },
        { cadence: 'daily', command: './also_okay', requires: [] },
      ],
      weekly: [
        { cadence: 'weekly', command: './cleanup_logs.sh', requires: ['internet', 'ac_power', 'rerun_onfail'] },
      ],
    });
  });

  it('lower-cases cadence keys and drops unknown ones', () => {
    const config = parseTaskConfig('Hourly:\n  - a\nyearly:\n  - b\n');
    expect(config).toEqual({ hourly: [{ cadence: 'hourly', command: 'a', requires: [] }] });
  });

  it('drops cadences whose value is not a list', () => {
    expect(parseTaskConfig('daily:\n')).toEqual({});
    expect(parseTaskConfig('daily: echo hi\n')).toEqual({});
  });

  it('drops malformed entries and keeps the rest', () => {
    const config = parseTaskConfig('monthly:\n  - 42\n  - bad: {nested: true}\n  - good\n');
    expect(config).toEqual({ monthly: [{ cadence: 'monthly', command: 'good', requires: [] }] });
  });

  it('treats an empty or non-mapping document as empty', () => {
    expect(parseTaskConfig('')).toEqual({});
    expect(parseTaskConfig('- just\n- a list\n')).toEqual({});
  });

  it('raises CONFIG_ERROR on invalid YAML', () => {
    try {
      parseTaskConfig('daily: [unclosed\n', 'tasks.yaml');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(TickrunError);
      expect((err as TickrunError).code).toBe(ExitCode.CONFIG_ERROR);
      expect((err as TickrunError).message).toBe('Invalid YAML in: tasks.yaml');
    }
  });
});

describe('normalizeTaskConfig', () => {
  it('stringifies non-string requirement names', () => {
    expect(normalizeTaskConfig({ daily: [{ job: ['Internet', 5] }] })).toEqual({
      daily: [{ cadence: 'daily', command: 'job', requires: ['internet', '5'] }],
    });
  });
});

describe('listTasks', () => {
  it('flattens cadence-major in declaration order', () => {
    const config = parseTaskConfig('weekly:\n  - w1\ndaily:\n  - d1\n  - d2\n');
    expect(listTasks(config).map((t) => `${t.cadence}:${t.command}`)).toEqual(['weekly:w1', 'daily:d1', 'daily:d2']);
  });
});

describe('loadTaskConfig / ensureDefaultConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tickrun-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads a config file', async () => {
    const path = join(tempDir, 'tasks.yaml');
    await writeFile(path, 'daily:\n  - echo task1\n');
    expect(await loadTaskConfig(path)).toEqual({
      daily: [{ cadence: 'daily', command: 'echo task1', requires: [] }],
    });
  });

  it('raises NOT_FOUND for a missing file', async () => {
    await expect(loadTaskConfig(join(tempDir, 'missing.yaml'))).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
    });
  });

  it('creates the default config once', async () => {
    const path = join(tempDir, 'home', '.tickrun.yaml');
    expect(await ensureDefaultConfig(path)).toBe(true);
    expect(await readFile(path, 'utf8')).toBe('daily:\n');

    await writeFile(path, 'hourly:\n  - keep me\n');
    expect(await ensureDefaultConfig(path)).toBe(false);
    expect(await readFile(path, 'utf8')).toBe('hourly:\n  - keep me\n');
  });
});
