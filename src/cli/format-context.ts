/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { OutputFormat } from '../types/config.js';

/** Where the resolved format came from. */
export type FormatSource = 'flag' | 'config' | 'default';

export interface FormatResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
}

/**
 * Current resolved format for this CLI invocation.
 * Human until resolved by the preAction hook.
 */
let currentResolution: FormatResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
};

/**
 * Set the resolved format for this CLI invocation.
 * Called once from the preAction hook in src/cli/index.ts.
 */
export function setFormatContext(resolution: FormatResolution): void {
  currentResolution = resolution;
}

/**
 * Get the current resolved format.
 */
export function getFormatContext(): FormatResolution {
  return currentResolution;
}

/**
 * Check if output should be JSON format.
 */
export function isJsonFormat(): boolean {
  return currentResolution.format === 'json';
}

/**
 * Check if quiet mode is enabled (suppress non-essential output).
 */
export function isQuiet(): boolean {
  return currentResolution.quiet;
}
