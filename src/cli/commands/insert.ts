/**
 * CLI insert command - splice a new item into a REQUIRES chain.
 */

import { Command } from 'commander';
import { createItem } from '../../core/model/item.js';
import { zeroDuration } from '../../core/model/duration.js';
import { ExitCode } from '../../types/exit-codes.js';
import { PlotlineError } from '../../core/errors.js';
import { cliOutput } from '../renderers/index.js';
import { commitItems, handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';
import { optString, parseDurationOption, parseItemId, parsePriority, parseTags } from '../options.js';

/**
 * Register the insert command: `before ⊢ after` becomes
 * `before ⊢ <id> ⊢ after`.
 */
export function registerInsertCommand(program: Command): void {
  program
    .command('insert <id> <title>')
    .description('Insert a new item between an item and one of its prerequisites')
    .requiredOption('--before <query>', 'The dependent item (currently requires --after)')
    .requiredOption('--after <query>', 'The prerequisite item')
    .option('-p, --priority <priority>', 'Priority name or glyph')
    .option('-d, --duration <duration>', 'Estimated duration')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .action(async (id: string, title: string, opts: Record<string, unknown>) => {
      try {
        const beforeQuery = optString(opts, 'before');
        const afterQuery = optString(opts, 'after');
        if (beforeQuery === undefined || afterQuery === undefined) {
          throw new PlotlineError(ExitCode.INVALID_INPUT, '--before and --after are required');
        }
        const priority = optString(opts, 'priority');
        const duration = optString(opts, 'duration');
        const item = createItem({
          id: parseItemId(id),
          title,
          priority: priority !== undefined ? parsePriority(priority) : 'NEUTRAL',
          duration: duration ? parseDurationOption(duration) : zeroDuration(),
          tags: parseTags(optString(opts, 'tags')),
        });

        const session = await openWorkspace();
        const graph = await loadItems(session);
        const before = resolveItem(graph, beforeQuery).id;
        const after = resolveItem(graph, afterQuery).id;
        graph.insertBetween(item, before, after);
        await commitItems(session, graph);
        cliOutput({ item: graph.get(item.id) ?? item, before, after }, { command: 'insert' });
      } catch (err) {
        handleCommandError(err, 'insert');
      }
    });
}
