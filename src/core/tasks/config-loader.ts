/**
 * Task list loader: YAML file -> normalized TaskConfig.
 *
 * Accepted entry forms under each cadence key:
 *   - "cmd"               -> no requirements
 *   - cmd:                -> no requirements
 *   - cmd: internet       -> single requirement
 *   - cmd: [a, b, c]      -> several requirements (may include rerun_onfail)
 *
 * Unknown cadences and malformed entries are dropped without complaint.
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { TickrunError, isErrnoException } from '../errors.js';
import { getLogger } from '../logger.js';
import { DEFAULT_CONFIG_CONTENTS } from '../paths.js';
import { isCadence } from '../scheduler/cadence.js';
import { safeReadFile } from '../../store/atomic.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Cadence, TaskConfig, TaskDefinition } from '../../types/task.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Normalize one mapping value into a requirement list.
 * Returns null for shapes that are not accepted.
 */
function normalizeRequirements(value: unknown): string[] | null {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string') return [value.toLowerCase()];
  if (Array.isArray(value)) return value.map((r) => String(r).toLowerCase());
  return null;
}

function normalizeEntries(cadence: Cadence, items: readonly unknown[]): TaskDefinition[] {
  const tasks: TaskDefinition[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      tasks.push({ cadence, command: item, requires: [] });
    } else if (isPlainObject(item)) {
      for (const [command, value] of Object.entries(item)) {
        const requires = normalizeRequirements(value);
        if (requires) {
          tasks.push({ cadence, command, requires });
        }
      }
    }
  }
  return tasks;
}

/**
 * Normalize a parsed YAML document. Anything that is not a mapping is an
 * empty config.
 */
export function normalizeTaskConfig(data: unknown): TaskConfig {
  const config: TaskConfig = {};
  if (!isPlainObject(data)) return config;

  for (const [key, value] of Object.entries(data)) {
    const cadence = key.toLowerCase();
    if (!isCadence(cadence) || !Array.isArray(value)) continue;
    config[cadence] = normalizeEntries(cadence, value);
  }
  return config;
}

/**
 * Parse YAML text into a normalized TaskConfig.
 * A syntax error is a CONFIG_ERROR; an empty document is an empty config.
 */
export function parseTaskConfig(text: string, source = '<config>'): TaskConfig {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    throw new TickrunError(
      ExitCode.CONFIG_ERROR,
      `Invalid YAML in: ${source}`,
      { fix: 'Each cadence key must hold a list of commands.', cause: err },
    );
  }
  return normalizeTaskConfig(data ?? {});
}

/**
 * Read and normalize the task config file.
 */
export async function loadTaskConfig(filePath: string): Promise<TaskConfig> {
  const text = await safeReadFile(filePath, 'config');
  if (text === null) {
    throw new TickrunError(ExitCode.NOT_FOUND, `Config not found: ${filePath}`);
  }
  return parseTaskConfig(text, filePath);
}

/**
 * Create the default config file if it does not exist yet.
 *
 * @returns true when the file was created by this call
 */
export async function ensureDefaultConfig(filePath: string): Promise<boolean> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, DEFAULT_CONFIG_CONTENTS, { encoding: 'utf8', flag: 'wx' });
    getLogger('config').info({ filePath }, 'created default config');
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') {
      return false;
    }
    throw new TickrunError(
      ExitCode.FILE_ERROR,
      `Cannot create default config: ${filePath}`,
      { cause: err },
    );
  }
}

/** Flatten a config into cadence-major, declaration-ordered tasks. */
export function listTasks(config: TaskConfig): TaskDefinition[] {
  return Object.values(config).flatMap((tasks) => tasks ?? []);
}
