/**
 * CLI remove command.
 */

import { Command } from 'commander';
import { cliOutput } from '../renderers/index.js';
import { commitItems, handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';
import { optBool } from '../options.js';

/**
 * Register the remove command. Without --cascade, relations naming the
 * removed item stay behind as dangling references for `doctor`.
 */
export function registerRemoveCommand(program: Command): void {
  program
    .command('remove <query>')
    .alias('rm')
    .description('Remove an item')
    .option('--cascade', 'Also remove every relation that names the item')
    .action(async (query: string, opts: Record<string, unknown>) => {
      try {
        const cascade = optBool(opts, 'cascade');
        const session = await openWorkspace();
        const graph = await loadItems(session);
        const target = resolveItem(graph, query);
        const removed = graph.removeItem(target.id, { cascade }) ?? target;
        await commitItems(session, graph);
        cliOutput({ removed, cascade }, { command: 'remove' });
      } catch (err) {
        handleCommandError(err, 'remove');
      }
    });
}
