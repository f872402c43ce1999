/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 */

import { ExitCode } from '../../types/exit-codes.js';
import type { OutputFormat } from '../../types/config.js';
import { PlotlineError } from '../../core/errors.js';
import type { FormatResolution } from '../format-context.js';

export type { FormatResolution };

/**
 * Resolve output format from Commander.js option values.
 *
 * An explicit flag wins, then the configured default, then human.
 *
 * @throws PlotlineError (INVALID_INPUT) when both --json and --human are given
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault?: OutputFormat,
): FormatResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (json && human) {
    throw new PlotlineError(ExitCode.INVALID_INPUT, '--json and --human are mutually exclusive');
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'human', source: 'default', quiet };
}
