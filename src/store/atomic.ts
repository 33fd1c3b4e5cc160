/**
 * File primitives for the state snapshot and the task list.
 *
 * The state file is rewritten in full after every pass. write-file-atomic
 * writes a temp file beside it and renames it over the old one, so a crash
 * or a concurrent reader sees either the previous pass or the new one,
 * never a torn file. An existing file's mode is kept.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TickrunError, isErrnoException } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Replace a file atomically, creating its directory first.
 * Failure is a FILE_ERROR naming the file by `label` ("state file").
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { label?: string; fix?: string },
): Promise<void> {
  const label = options?.label ?? 'file';
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, { encoding: 'utf8' });
  } catch (err) {
    throw new TickrunError(ExitCode.FILE_ERROR, `Cannot write ${label}: ${filePath}`, {
      fix: options?.fix,
      cause: err,
    });
  }
}

/**
 * Read a UTF-8 file. A missing file is null, which callers treat as "no
 * prior state" or "no config"; any other failure is a FILE_ERROR.
 */
export async function safeReadFile(filePath: string, label: string = 'file'): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    throw new TickrunError(ExitCode.FILE_ERROR, `Cannot read ${label}: ${filePath}`, { cause: err });
  }
}

/**
 * Recursively copy a JSON value with object keys in sorted order, so the
 * serialized file is stable and diffs cleanly.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number; sortKeys?: boolean; label?: string; fix?: string },
): Promise<void> {
  const payload = options?.sortKeys ? sortKeysDeep(data) : data;
  const json = JSON.stringify(payload, null, options?.indent ?? 2) + '\n';
  await atomicWrite(filePath, json, { label: options?.label, fix: options?.fix });
}
