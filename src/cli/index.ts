#!/usr/bin/env node
/**
 * tickrun CLI entry point.
 */

import { getNodeVersionInfo, MINIMUM_NODE_MAJOR } from '../core/platform.js';
import { runCli } from './program.js';

// Startup guard: fail fast if Node.js version is below minimum
const nodeInfo = getNodeVersionInfo();
if (!nodeInfo.meetsMinimum) {
  process.stderr.write(
    `Error: tickrun requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${nodeInfo.version}\n`,
  );
  process.exit(1);
}

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
