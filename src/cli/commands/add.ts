/**
 * CLI add command.
 */

import { Command } from 'commander';
import { createItem } from '../../core/model/item.js';
import { zeroDuration } from '../../core/model/duration.js';
import { GraphOperationError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput } from '../renderers/index.js';
import { commitItems, handleCommandError, loadItems, openWorkspace } from '../session.js';
import {
  optArray, optString, parseConstraintOptions, parseDurationOption, parseItemId,
  parsePriority, parseStatus, parseTags, splitList,
} from '../options.js';

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add <id> <title>')
    .description('Create a new item')
    .option('-s, --status <status>', 'Status: not-started, in-progress, blocked, completed')
    .option('-p, --priority <priority>', 'Priority name or glyph: lowest, low, neutral, unsure, medium, high, critical')
    .option('-d, --duration <duration>', 'Estimated duration, e.g. "2h30min" or "3 days"')
    .option('--charts <names>', 'Comma-separated chart names')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .option('-r, --requires <ids>', 'Comma-separated ids this item requires')
    .option('-b, --blocks <ids>', 'Comma-separated ids this item blocks')
    .option('-c, --constraint <constraints...>', 'Time constraints, e.g. "due(2025-06-01,warn)"')
    .option('--comment <text>', 'User comment')
    .action(async (id: string, title: string, opts: Record<string, unknown>) => {
      try {
        const status = optString(opts, 'status');
        const priority = optString(opts, 'priority');
        const duration = optString(opts, 'duration');
        const comment = optString(opts, 'comment');
        const item = createItem({
          id: parseItemId(id),
          title,
          status: status ? parseStatus(status) : 'NOT_STARTED',
          priority: priority !== undefined ? parsePriority(priority) : 'NEUTRAL',
          duration: duration ? parseDurationOption(duration) : zeroDuration(),
          charts: splitList(optString(opts, 'charts')),
          tags: parseTags(optString(opts, 'tags')),
          timeConstraints: parseConstraintOptions(optArray(opts, 'constraint')),
          ...(comment !== undefined && { userComment: comment }),
        });

        const session = await openWorkspace();
        const graph = await loadItems(session);
        if (graph.has(item.id)) {
          throw new GraphOperationError(`Item '${item.id}' already exists`, {
            code: ExitCode.ID_COLLISION,
            fix: 'Choose another id',
          });
        }

        graph.addItem(item);
        for (const target of splitList(optString(opts, 'requires'))) {
          graph.addRelation(item.id, 'REQUIRES', target);
        }
        for (const target of splitList(optString(opts, 'blocks'))) {
          graph.addRelation(item.id, 'BLOCKS', target);
        }

        await commitItems(session, graph);
        const added = graph.get(item.id) ?? item;
        cliOutput({ item: added }, { command: 'add' });
      } catch (err) {
        handleCommandError(err, 'add');
      }
    });
}
