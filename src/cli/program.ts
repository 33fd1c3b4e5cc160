/**
 * tickrun command-line program.
 *
 *   tickrun [config] [--state PATH] [--dry-run] [-v|--verbose] [--max-workers N]
 *
 * runCli() returns the process exit code instead of exiting, so the whole
 * surface can be driven from tests.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadSettings, parseNonNegativeInt } from '../core/config.js';
import { TickrunError } from '../core/errors.js';
import { closeLogger, initLogger } from '../core/logger.js';
import { getDefaultConfigPath, resolveUserPath } from '../core/paths.js';
import type { Clock } from '../core/platform.js';
import type { RequirementRegistry } from '../core/requirements/registry.js';
import { runTasks } from '../core/runner.js';
import type { CommandExecutor } from '../core/scheduler/executor.js';
import { ensureDefaultConfig } from '../core/tasks/config-loader.js';
import { ExitCode } from '../types/exit-codes.js';
import { colorsEnabled } from './renderers/colors.js';
import { renderRunReport } from './renderers/run.js';

/** Parsed command-line options. */
export interface CliOptions {
  state?: string;
  dryRun?: boolean;
  verbose?: boolean;
  maxWorkers?: number;
}

/** Seams for tests and embedders. */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  executor?: CommandExecutor;
  requirements?: RequirementRegistry;
  clock?: Clock;
}

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/** Commander argument parser for --max-workers. */
export function parseMaxWorkers(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === null) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Build the program. `onExit` receives the exit code computed by the action.
 */
export function createProgram(
  deps: CliDependencies,
  onExit: (code: number) => void,
): Command {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const program = new Command();

  program
    .name('tickrun')
    .description('Run hourly/daily/weekly/monthly commands that are due, once per invocation')
    .version(getPackageVersion())
    .argument('[config]', 'Path to YAML task list (default: ~/.tickrun.yaml, created if missing)')
    .option('--state <path>', 'Path to JSON state file')
    .option('--dry-run', 'Print what would run; do NOT change state')
    .option('-v, --verbose', 'Verbose output')
    .option('--max-workers <n>', 'Max parallel jobs (default: number of due tasks, cap 32)', parseMaxWorkers)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text),
      writeErr: (text) => stderr(text),
    })
    .action(async (configArg: string | undefined, options: CliOptions) => {
      const settings = loadSettings(env);
      const verbose = options.verbose === true;
      const dryRun = options.dryRun === true;
      initLogger({ ...settings.logging, level: verbose ? 'debug' : settings.logging.level });

      try {
        let configPath: string;
        if (configArg === undefined) {
          configPath = getDefaultConfigPath(settings.home);
          await ensureDefaultConfig(configPath);
        } else {
          configPath = resolveUserPath(configArg, deps.cwd);
        }

        const summary = await runTasks({
          configPath,
          statePath: options.state ? resolveUserPath(options.state, deps.cwd) : undefined,
          stateDir: settings.stateDir,
          dryRun,
          maxWorkers: options.maxWorkers ?? settings.maxWorkers,
          executor: deps.executor,
          requirements: deps.requirements,
          clock: deps.clock,
        });

        if (verbose || dryRun) {
          const text = renderRunReport(summary, {
            verbose,
            color: colorsEnabled(env, deps.stdout ? false : process.stdout.isTTY === true),
          });
          if (text) stdout(`${text}\n`);
        }
        onExit(summary.exitCode);
      } catch (err) {
        if (err instanceof TickrunError) {
          stderr(`Error: ${err.message}\n`);
          if (err.fix) stderr(`Fix: ${err.fix}\n`);
          onExit(err.code);
        } else {
          stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
          onExit(ExitCode.GENERAL_ERROR);
        }
      } finally {
        closeLogger();
      }
    });

  return program;
}

/**
 * Parse arguments (without the node/script prefix) and run.
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  let exitCode: number = ExitCode.SUCCESS;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version exit 0; every other commander exit is a usage error
      return err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_INPUT;
    }
    throw err;
  }
  return exitCode;
}
