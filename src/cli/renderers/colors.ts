/**
 * Terminal color utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when color is not supported.
 */

/** Whether ANSI color escape codes should be used for a stream. */
export function colorsEnabled(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true,
): boolean {
  if (env['NO_COLOR'] !== undefined) return false;
  if (env['FORCE_COLOR'] !== undefined) return true;
  return isTTY;
}

export interface Palette {
  BOLD: string;
  DIM: string;
  NC: string;
  RED: string;
  GREEN: string;
  YELLOW: string;
}

/** ANSI codes, or empty strings when color is off. */
export function palette(enabled: boolean): Palette {
  const ansi = (code: string): string => (enabled ? code : '');
  return {
    BOLD: ansi('\x1b[1m'),
    DIM: ansi('\x1b[2m'),
    NC: ansi('\x1b[0m'),
    RED: ansi('\x1b[0;31m'),
    GREEN: ansi('\x1b[0;32m'),
    YELLOW: ansi('\x1b[1;33m'),
  };
}
