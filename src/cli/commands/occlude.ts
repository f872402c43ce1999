/**
 * CLI occlude / include commands - move items between the include and
 * occlude files.
 */

import { Command } from 'commander';
import { ExitCode } from '../../types/exit-codes.js';
import { PlotlineError } from '../../core/errors.js';
import { includeItems, occludeItems, occludeItemsByTags, type OcclusionResult } from '../../core/graph/occlusion.js';
import type { ItemGraph } from '../../core/graph/item-graph.js';
import { cliOutput } from '../renderers/index.js';
import { commitItems, handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';
import { optBool, optString, parseTags } from '../options.js';

function resolveIds(graph: ItemGraph, queries: readonly string[]): string[] {
  return queries.map((query) => resolveItem(graph, query).id);
}

export function registerOccludeCommand(program: Command): void {
  program
    .command('occlude [queries...]')
    .description('Occlude items by id/substring, or every included item carrying a tag')
    .option('--tag <tags>', 'Occlude items carrying any of these comma-separated tags')
    .option('--dry-run', 'Show what would be occluded without making changes')
    .action(async (queries: string[], opts: Record<string, unknown>) => {
      try {
        const tags = parseTags(optString(opts, 'tag'));
        if (queries.length === 0 && tags.length === 0) {
          throw new PlotlineError(ExitCode.INVALID_INPUT, 'Nothing to occlude', { fix: 'Name items or pass --tag' });
        }
        const dryRun = optBool(opts, 'dryRun');
        const session = await openWorkspace();
        const graph = await loadItems(session);

        let result: OcclusionResult = occludeItems(graph, resolveIds(graph, queries), { dryRun });
        const affected = result.affected.map((item) => item.id);
        if (tags.length > 0) {
          result = occludeItemsByTags(result.graph, tags, { dryRun });
          for (const item of result.affected) {
            if (!affected.includes(item.id)) affected.push(item.id);
          }
        }

        if (!dryRun && affected.length > 0) await commitItems(session, result.graph);
        cliOutput({ affected, dryRun, occlude: true }, { command: 'occlude' });
      } catch (err) {
        handleCommandError(err, 'occlude');
      }
    });
}

export function registerIncludeCommand(program: Command): void {
  program
    .command('include <queries...>')
    .description('Move occluded items back to the include file')
    .option('--dry-run', 'Show what would be included without making changes')
    .action(async (queries: string[], opts: Record<string, unknown>) => {
      try {
        const dryRun = optBool(opts, 'dryRun');
        const session = await openWorkspace();
        const graph = await loadItems(session);
        const result = includeItems(graph, resolveIds(graph, queries), { dryRun });
        const affected = result.affected.map((item) => item.id);
        if (!dryRun && affected.length > 0) await commitItems(session, result.graph);
        cliOutput({ affected, dryRun, occlude: false }, { command: 'include' });
      } catch (err) {
        handleCommandError(err, 'include');
      }
    });
}
