/**
 * tickrun exit codes.
 * 0 = success (including "nothing to do" and lock contention).
 *
 * Task result codes are passed through unchanged as the process exit code,
 * so these only describe failures raised before any task runs.
 */

export enum ExitCode {
  SUCCESS = 0,

  GENERAL_ERROR = 1,
  /** Bad command-line usage: unknown option, invalid option value. */
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  CONFIG_ERROR = 8,
}
