/**
 * XDG-compliant path resolution for tickrun.
 *
 * Environment variables:
 *   TICKRUN_HOME       - Directory of the default config file (default: ~)
 *   TICKRUN_STATE_DIR  - Directory of default state files
 *                        (default: $XDG_STATE_HOME/tickrun, else ~/.local/state/tickrun)
 */

import { basename, extname, isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';

/** File name of the per-user default config. */
export const DEFAULT_CONFIG_NAME = '.tickrun.yaml';

/** Contents written when the default config is bootstrapped. */
export const DEFAULT_CONFIG_CONTENTS = 'daily:\n';

/** Suffix of the single-instance marker beside a state file. */
export const LOCK_SUFFIX = '.lock';

/**
 * Get the tickrun home directory (where the default config lives).
 * Respects TICKRUN_HOME, defaults to the user's home directory.
 */
export function getTickrunHome(env: NodeJS.ProcessEnv = process.env): string {
  return env['TICKRUN_HOME'] ?? homedir();
}

/**
 * Get the directory holding default state files.
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env['TICKRUN_STATE_DIR'];
  if (explicit) return explicit;
  const xdg = env['XDG_STATE_HOME'];
  if (xdg && isAbsolute(xdg)) return join(xdg, 'tickrun');
  return join(homedir(), '.local', 'state', 'tickrun');
}

/**
 * Get the path of the per-user default config file.
 */
export function getDefaultConfigPath(home: string): string {
  return join(home, DEFAULT_CONFIG_NAME);
}

/**
 * Derive the default state file path from a config file's base name.
 * `~/jobs/backup.yaml` maps to `<stateDir>/backup.state.json`.
 */
export function getDefaultStatePath(configPath: string, stateDir: string): string {
  const file = basename(configPath);
  const base = file.slice(0, file.length - extname(file).length);
  return join(stateDir, `${base}.state.json`);
}

/**
 * Get the lock marker path for a state file.
 */
export function getLockPath(statePath: string): string {
  return `${statePath}${LOCK_SUFFIX}`;
}

/**
 * Resolve a user-supplied path, expanding a leading tilde.
 */
export function resolveUserPath(path: string, cwd: string = process.cwd()): string {
  if (path === '~' || path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(cwd, path);
}
