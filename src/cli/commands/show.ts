/**
 * CLI show command.
 */

import { Command } from 'commander';
import { serializeItem } from '../../core/notation/serializer.js';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';

export function registerShowCommand(program: Command): void {
  program
    .command('show <query>')
    .description('Show one item by id, or by a unique id/title substring')
    .action(async (query: string) => {
      try {
        const graph = await loadItems(await openWorkspace());
        const item = resolveItem(graph, query);
        cliOutput({ item, line: serializeItem(item) }, { command: 'show' });
      } catch (err) {
        handleCommandError(err, 'show');
      }
    });
}
