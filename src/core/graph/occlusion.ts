/**
 * Occlusion: archive items without deleting them. An occluded item keeps
 * its id and relations but is written to the occlude file on save.
 */

import type { Item } from '../../types/item.js';
import { GraphOperationError } from '../errors.js';
import type { ItemGraph } from './item-graph.js';

export interface OcclusionOptions {
  /** Report what would change, leave the graph alone. */
  dryRun?: boolean;
}

export interface OcclusionResult {
  /** The updated graph; the input graph itself on a dry run. */
  graph: ItemGraph;
  /** Items whose flag changed (or would change), as they were before. */
  affected: Item[];
  dryRun: boolean;
}

function setOcclusion(
  graph: ItemGraph,
  ids: readonly string[],
  occlude: boolean,
  options: OcclusionOptions,
): OcclusionResult {
  const missing = ids.filter((id) => !graph.has(id));
  if (missing.length > 0) {
    throw new GraphOperationError(`Unknown item id(s): ${missing.join(', ')}`);
  }

  const affected = [...new Set(ids)]
    .map((id) => graph.get(id))
    .filter((item): item is Item => item !== undefined && item.occlude !== occlude);

  const dryRun = options.dryRun ?? false;
  if (dryRun || affected.length === 0) {
    return { graph, affected, dryRun };
  }

  const next = graph.copy();
  for (const item of affected) next.updateItem(item.id, { occlude });
  return { graph: next, affected, dryRun };
}

/** Move the given items to the occlude set. */
export function occludeItems(graph: ItemGraph, ids: readonly string[], options: OcclusionOptions = {}): OcclusionResult {
  return setOcclusion(graph, ids, true, options);
}

/** Move the given items back to the include set. */
export function includeItems(graph: ItemGraph, ids: readonly string[], options: OcclusionOptions = {}): OcclusionResult {
  return setOcclusion(graph, ids, false, options);
}

/** Occlude every included item carrying at least one of `tags`. */
export function occludeItemsByTags(
  graph: ItemGraph,
  tags: readonly string[],
  options: OcclusionOptions = {},
): OcclusionResult {
  const ids = graph
    .includedItems()
    .filter((item) => item.tags.some((tag) => tags.includes(tag)))
    .map((item) => item.id);
  return setOcclusion(graph, ids, true, options);
}
