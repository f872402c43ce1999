/**
 * Strict-edge adjacency and cycle detection.
 *
 * Only REQUIRES and ANYOF edges order items. Edges whose target is not in
 * the item map are ignored here; the doctor reports them instead.
 */

import type { Item } from '../../types/item.js';
import { relationTargets } from '../model/item.js';

/** item id -> ids it strictly depends on. */
export type Adjacency = ReadonlyMap<string, readonly string[]>;

const GRAY = 1;
const BLACK = 2;

/**
 * Build the strict adjacency of an item map: each item points at its
 * existing REQUIRES then ANYOF targets, without duplicates.
 */
export function strictAdjacency(items: ReadonlyMap<string, Item>): Map<string, string[]> {
  const adjacency = new Map<string, string[]>();
  for (const [id, item] of items) {
    const targets: string[] = [];
    for (const target of [...relationTargets(item, 'REQUIRES'), ...relationTargets(item, 'ANYOF')]) {
      if (items.has(target) && !targets.includes(target)) targets.push(target);
    }
    adjacency.set(id, targets);
  }
  return adjacency;
}

/**
 * Three-colour depth-first search for a cycle.
 *
 * Returns the ids along the first cycle found, starting and ending with the
 * same id, or null when the graph is acyclic. With `within`, nodes outside
 * the set are treated as absent. Iterative so deep chains cannot exhaust
 * the call stack.
 */
export function findCycle(adjacency: Adjacency, within?: ReadonlySet<string>): string[] | null {
  const colour = new Map<string, number>();
  const included = (id: string): boolean => adjacency.has(id) && (!within || within.has(id));

  for (const start of adjacency.keys()) {
    if (!included(start) || colour.has(start)) continue;

    const path: string[] = [start];
    const cursors: number[] = [0];
    colour.set(start, GRAY);

    while (path.length > 0) {
      const depth = path.length - 1;
      const node = path[depth];
      const cursor = cursors[depth];
      const neighbours = adjacency.get(node) ?? [];

      if (cursor >= neighbours.length) {
        colour.set(node, BLACK);
        path.pop();
        cursors.pop();
        continue;
      }

      cursors[depth] = cursor + 1;
      const next = neighbours[cursor];
      if (!included(next)) continue;

      const state = colour.get(next);
      if (state === GRAY) {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (state === undefined) {
        colour.set(next, GRAY);
        path.push(next);
        cursors.push(0);
      }
    }
  }

  return null;
}
