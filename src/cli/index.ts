#!/usr/bin/env node
/**
 * plotline CLI entry point.
 */

import { closeLogger } from '../core/logger.js';
import { getNodeVersionInfo, MINIMUM_NODE_MAJOR } from '../core/platform.js';
import { ExitCode } from '../types/exit-codes.js';
import { createProgram } from './program.js';

// Startup guard: fail fast if Node.js version is below minimum
const nodeInfo = getNodeVersionInfo();
if (!nodeInfo.meetsMinimum) {
  process.stderr.write(
    `\nError: plotline requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${nodeInfo.version}\n\n`,
  );
  process.exit(ExitCode.GENERAL_ERROR);
}

createProgram()
  .parseAsync()
  .then(() => closeLogger())
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(ExitCode.GENERAL_ERROR);
  });
