/**
 * CLI init command - create the workspace files.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { WORKSPACE_DIR_NAME } from '../../core/paths.js';
import { initWorkspace } from '../../store/workspace.js';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError } from '../session.js';
import { optString } from '../options.js';

/**
 * Register the init command. Without --dir the workspace is created in
 * `.plotline` under the working directory, or at PLOTLINE_DIR when set.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a workspace (existing files are kept)')
    .option('--dir <path>', 'Workspace directory to create')
    .action(async (opts: Record<string, unknown>) => {
      try {
        const dir = resolve(optString(opts, 'dir') ?? process.env['PLOTLINE_DIR'] ?? WORKSPACE_DIR_NAME);
        const { created } = await initWorkspace(dir);
        cliOutput({ dir, created }, { command: 'init' });
      } catch (err) {
        handleCommandError(err, 'init');
      }
    });
}
