/**
 * Power-supply detection.
 *
 * Each OS family has its own probe; all of them collapse to one tri-state
 * signal. A probe that cannot decide, or fails, reports 'unknown', and
 * both the `ac_power` and `battery` requirements treat 'unknown' as unmet.
 */

import { execFile } from 'node:child_process';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { PLATFORM, type Platform } from '../platform.js';

const execFileAsync = promisify(execFile);

export type PowerStatus = 'ac' | 'battery' | 'unknown';

/** Capability interface implemented once per platform. */
export type PowerStatusProbe = () => Promise<PowerStatus>;

/** Runs an external utility and returns its stdout. */
export type UtilityRunner = (file: string, args: readonly string[], timeoutMs: number) => Promise<string>;

const UTILITY_TIMEOUT_MS = 3_000;

export const defaultUtilityRunner: UtilityRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, [...args], {
    timeout: timeoutMs,
    encoding: 'utf8',
    windowsHide: true,
  });
  return stdout;
};

/** Read a sysfs attribute, lower-cased; null if it does not exist. */
async function readAttribute(dir: string, name: string): Promise<string | null> {
  try {
    return (await readFile(join(dir, name), 'utf8')).trim().toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Linux: inspect /sys/class/power_supply.
 *
 * A `Mains` supply with an `online` attribute decides outright. Otherwise a
 * battery reporting `charging` or `full` implies external power.
 */
export function createLinuxPowerProbe(baseDir = '/sys/class/power_supply'): PowerStatusProbe {
  return async () => {
    let names: string[];
    try {
      names = (await readdir(baseDir)).sort();
    } catch {
      return 'unknown';
    }

    for (const name of names) {
      const dir = join(baseDir, name);
      if ((await readAttribute(dir, 'type')) !== 'mains') continue;
      const online = await readAttribute(dir, 'online');
      if (online !== null) {
        return online === '1' ? 'ac' : 'battery';
      }
    }

    for (const name of names) {
      const status = await readAttribute(join(baseDir, name), 'status');
      if (status === 'charging' || status === 'full') {
        return 'ac';
      }
    }

    return 'unknown';
  };
}

/**
 * macOS: first line of `pmset -g batt`, e.g. "Now drawing from 'AC Power'".
 */
export function createMacosPowerProbe(run: UtilityRunner = defaultUtilityRunner): PowerStatusProbe {
  return async () => {
    try {
      const out = await run('pmset', ['-g', 'batt'], UTILITY_TIMEOUT_MS);
      const first = (out.split(/\r?\n/)[0] ?? '').toLowerCase();
      if (first.includes('ac power')) return 'ac';
      if (first.includes('battery power')) return 'battery';
      return 'unknown';
    } catch {
      return 'unknown';
    }
  };
}

const WINDOWS_POWER_QUERY =
  'Add-Type -AssemblyName System.Windows.Forms; ' +
  '[System.Windows.Forms.SystemInformation]::PowerStatus.PowerLineStatus';

/**
 * Windows: PowerLineStatus from the system power status API, via PowerShell.
 * Prints Online, Offline or Unknown.
 */
export function createWindowsPowerProbe(run: UtilityRunner = defaultUtilityRunner): PowerStatusProbe {
  return async () => {
    try {
      const out = await run(
        'powershell.exe',
        ['-NoProfile', '-NonInteractive', '-Command', WINDOWS_POWER_QUERY],
        UTILITY_TIMEOUT_MS,
      );
      const line = out.trim().toLowerCase();
      if (line === 'online') return 'ac';
      if (line === 'offline') return 'battery';
      return 'unknown';
    } catch {
      return 'unknown';
    }
  };
}

/** Select the probe for a platform. Unsupported platforms always report 'unknown'. */
export function selectPowerProbe(platform: Platform = PLATFORM): PowerStatusProbe {
  switch (platform) {
    case 'linux': return createLinuxPowerProbe();
    case 'macos': return createMacosPowerProbe();
    case 'windows': return createWindowsPowerProbe();
    default: return async () => 'unknown';
  }
}
