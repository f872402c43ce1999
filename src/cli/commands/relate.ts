/**
 * CLI relate / unrelate commands - relation management between items.
 * Both write the mirror relation on the other item.
 */

import { Command } from 'commander';
import { cliOutput } from '../renderers/index.js';
import { commitItems, handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';
import { parseRelationType } from '../options.js';

const TYPE_HELP = 'requires, anyof, supercharges, indicates, together, conflicts, blocks, sufficient, or a glyph';

export function registerRelateCommand(program: Command): void {
  program
    .command('relate <from> <type> <to>')
    .description(`Add a relation (${TYPE_HELP})`)
    .action(async (fromQuery: string, typeName: string, toQuery: string) => {
      try {
        const type = parseRelationType(typeName);
        const session = await openWorkspace();
        const graph = await loadItems(session);
        const from = resolveItem(graph, fromQuery).id;
        const to = resolveItem(graph, toQuery).id;
        graph.addRelation(from, type, to);
        await commitItems(session, graph);
        cliOutput({ from, type, to }, { command: 'relate' });
      } catch (err) {
        handleCommandError(err, 'relate');
      }
    });
}

export function registerUnrelateCommand(program: Command): void {
  program
    .command('unrelate <from> <type> <to>')
    .description('Remove a relation and its mirror')
    .action(async (fromQuery: string, typeName: string, toQuery: string) => {
      try {
        const type = parseRelationType(typeName);
        const session = await openWorkspace();
        const graph = await loadItems(session);
        const from = resolveItem(graph, fromQuery).id;
        const to = resolveItem(graph, toQuery).id;
        graph.removeRelation(from, type, to);
        await commitItems(session, graph);
        cliOutput({ from, type, to }, { command: 'unrelate' });
      } catch (err) {
        handleCommandError(err, 'unrelate');
      }
    });
}
