/**
 * Command executor: runs one shell command and resolves to its result code.
 *
 * The dispatcher only depends on the CommandExecutor signature, so tests
 * and embedders can substitute their own.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { getLogger } from '../logger.js';

export type CommandExecutor = (command: string) => Promise<number>;

/** Exit code a shell reports for a command it could not start. */
export const SPAWN_FAILURE_CODE = 127;

/** Map a terminating signal to the conventional 128 + signo code. */
export function signalExitCode(signal: NodeJS.Signals): number {
  const signo = constants.signals[signal];
  return 128 + (typeof signo === 'number' ? signo : 0);
}

/** Where a command's output goes: inherited, or an open file descriptor. */
export type OutputTarget = 'inherit' | number;

/**
 * Build the default executor. Commands run through the platform shell with
 * tickrun's own stdin, stdout and stderr, so whatever runs tickrun (cron, a
 * systemd timer) captures their output.
 */
export function createShellExecutor(opts?: {
  cwd?: string;
  stdout?: OutputTarget;
  stderr?: OutputTarget;
}): CommandExecutor {
  const stdio: ['inherit', OutputTarget, OutputTarget] = [
    'inherit',
    opts?.stdout ?? 'inherit',
    opts?.stderr ?? 'inherit',
  ];
  const log = getLogger('executor');

  return (command) =>
    new Promise<number>((resolve) => {
      const child = spawn(command, {
        shell: true,
        stdio,
        cwd: opts?.cwd,
        windowsHide: true,
      });
      child.once('error', (err) => {
        log.error({ err, command }, 'failed to start command');
        resolve(SPAWN_FAILURE_CODE);
      });
      child.once('close', (code, signal) => {
        if (code !== null) {
          resolve(code);
        } else if (signal !== null) {
          resolve(signalExitCode(signal));
        } else {
          resolve(1);
        }
      });
    });
}
