/**
 * Human-readable rendering of a run report.
 *
 * Non-verbose output (used for --dry-run) lists only tasks that were due;
 * verbose output also lists tasks skipped as not due or duplicated.
 */

import type { RunSummary } from '../../core/runner.js';
import type { TaskReport } from '../../core/scheduler/dispatcher.js';
import { palette, type Palette } from './colors.js';

function renderEntry(entry: TaskReport, c: Palette, verbose: boolean): string | null {
  const label = `[${entry.cadence}] ${entry.command}`;
  switch (entry.outcome) {
    case 'not-due':
      return verbose ? `${c.DIM}SKIP (not due): ${label}${c.NC}` : null;
    case 'duplicate':
      return verbose ? `${c.DIM}SKIP (duplicate): ${label}${c.NC}` : null;
    case 'unmet':
      return `${c.YELLOW}SKIP (requirements not met: ${(entry.unmet ?? []).join(', ')}): ${label}${c.NC}`;
    case 'would-run':
      return `DRY-RUN (would run): ${label}`;
    case 'ran':
      return entry.code === 0
        ? `${c.GREEN}DONE${c.NC} ${label} -> OK`
        : `${c.RED}DONE${c.NC} ${label} -> FAIL(${entry.code ?? '?'})`;
  }
}

export function renderRunReport(
  summary: RunSummary,
  opts: { verbose: boolean; color: boolean },
): string {
  const c = palette(opts.color);

  if (summary.locked) {
    return opts.verbose ? 'Another instance appears to be running. Exiting.' : '';
  }

  const report = summary.outcome?.report ?? [];
  const lines: string[] = [];
  if (opts.verbose) {
    lines.push(`State: ${summary.statePath}`);
  }
  for (const entry of report) {
    const line = renderEntry(entry, c, opts.verbose);
    if (line !== null) lines.push(line);
  }

  const due = report.filter((e) => e.outcome === 'ran' || e.outcome === 'would-run').length;
  lines.push(`${c.BOLD}Due tasks: ${due}${c.NC}`);
  return lines.join('\n');
}
