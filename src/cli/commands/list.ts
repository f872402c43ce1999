/**
 * CLI list command - items in dependency order.
 */

import { Command } from 'commander';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError, loadItems, openWorkspace } from '../session.js';
import { optBool, optString, parseStatus, parseTags } from '../options.js';

/**
 * Register the list command. Items are listed prerequisites first.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List items in dependency order')
    .option('--occluded', 'List occluded items instead of included ones')
    .option('--tag <tags>', 'Only items carrying any of these comma-separated tags')
    .option('-s, --status <status>', 'Only items with this status')
    .action(async (opts: Record<string, unknown>) => {
      try {
        const graph = await loadItems(await openWorkspace());
        const occluded = optBool(opts, 'occluded');
        const tags = parseTags(optString(opts, 'tag'));
        const statusOpt = optString(opts, 'status');
        const status = statusOpt ? parseStatus(statusOpt) : undefined;

        const items = graph.topologicalSort().filter((item) =>
          item.occlude === occluded
          && (tags.length === 0 || tags.some((tag) => item.tags.includes(tag)))
          && (status === undefined || item.status === status));

        cliOutput({ items, total: graph.size, occluded }, { command: 'list' });
      } catch (err) {
        handleCommandError(err, 'list');
      }
    });
}
