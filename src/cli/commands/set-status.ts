/**
 * CLI set-status command.
 */

import { Command } from 'commander';
import { cliOutput } from '../renderers/index.js';
import { commitItems, handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';
import { parseStatus } from '../options.js';

export function registerSetStatusCommand(program: Command): void {
  program
    .command('set-status <query> <status>')
    .description('Change the status of an item (not-started, in-progress, blocked, completed, or a glyph)')
    .action(async (query: string, status: string) => {
      try {
        const next = parseStatus(status);
        const session = await openWorkspace();
        const graph = await loadItems(session);
        const item = graph.updateItem(resolveItem(graph, query).id, { status: next });
        await commitItems(session, graph);
        cliOutput({ item }, { command: 'set-status' });
      } catch (err) {
        handleCommandError(err, 'set-status');
      }
    });
}
