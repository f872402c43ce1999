/**
 * CLI config command - configuration management.
 */

import { Command } from 'commander';
import { ExitCode } from '../../types/exit-codes.js';
import { PlotlineError } from '../../core/errors.js';
import { getConfigValue, setConfigValue } from '../../core/config.js';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError } from '../session.js';
import { optBool } from '../options.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value and the layer it came from')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key);
        if (resolved.value === undefined) {
          throw new PlotlineError(ExitCode.NOT_FOUND, `Unknown config key '${key}'`);
        }
        cliOutput({ key, value: resolved.value, source: resolved.source }, { command: 'config get' });
      } catch (err) {
        handleCommandError(err, 'config get');
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .option('--global', 'Set in global config instead of workspace config')
    .action(async (key: string, value: string, opts: Record<string, unknown>) => {
      try {
        const result = await setConfigValue(key, value, undefined, { global: optBool(opts, 'global') });
        cliOutput(result, { command: 'config set' });
      } catch (err) {
        handleCommandError(err, 'config set');
      }
    });
}
