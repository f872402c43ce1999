/**
 * CLI includes command - show the #include tree of a file.
 */

import { Command } from 'commander';
import { showIncludeStructure } from '../../store/includes.js';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError, openWorkspace } from '../session.js';
import { optBool } from '../options.js';

export function registerIncludesCommand(program: Command): void {
  program
    .command('includes [file]')
    .description('Show the include tree of a file (default: the workspace items file)')
    .option('--no-recursive', 'Only show direct includes')
    .action(async (file: string | undefined, opts: Record<string, unknown>) => {
      try {
        const path = file ?? (await openWorkspace()).paths.items;
        const tree = await showIncludeStructure(path, { recursive: optBool(opts, 'recursive') });
        cliOutput({ tree }, { command: 'includes' });
      } catch (err) {
        handleCommandError(err, 'includes');
      }
    });
}
