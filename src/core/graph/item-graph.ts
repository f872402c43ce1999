/**
 * In-memory dependency graph of items.
 *
 * Invariants kept by the mutation methods:
 * - ids are unique (the map key is the item id);
 * - every relation write also writes its mirror on the other item;
 * - REQUIRES/ANYOF edges never form a cycle. Mutations that add strict
 *   edges are checked on a scratch copy first and only then committed.
 *
 * Dangling targets and one-sided pairs can still appear through addItem or
 * removeItem; GraphDoctor reports them.
 */

import type { Item, ItemPatch, RelationType } from '../../types/item.js';
import { ExitCode } from '../../types/exit-codes.js';
import { CycleDetectedError, GraphOperationError, ItemLookupError } from '../errors.js';
import { RELATION_MIRRORS, isStrictRelation } from '../model/registry.js';
import {
  cloneItem,
  relationEntries,
  relationTargets,
  replaceRelationTarget,
  updateItem as patchItem,
  withRelationTarget,
  withoutRelationTarget,
} from '../model/item.js';
import { findCycle, strictAdjacency } from './cycles.js';

export interface RemoveItemOptions {
  /** Also drop every relation entry elsewhere that names the removed id. */
  cascade?: boolean;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export class ItemGraph {
  private readonly byId = new Map<string, Item>();

  constructor(items: Iterable<Item> = []) {
    for (const item of items) this.byId.set(item.id, item);
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): Item | undefined {
    return this.byId.get(id);
  }

  /** All items in insertion order. */
  all(): Item[] {
    return [...this.byId.values()];
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  includedItems(): Item[] {
    return this.all().filter((item) => !item.occlude);
  }

  occludedItems(): Item[] {
    return this.all().filter((item) => item.occlude);
  }

  private require(id: string, role: string): Item {
    const item = this.byId.get(id);
    if (!item) {
      throw new GraphOperationError(`${role} item '${id}' does not exist`);
    }
    return item;
  }

  private commit(items: Item[]): void {
    for (const item of items) this.byId.set(item.id, item);
  }

  /** Reject `changes` if applying them would leave a strict cycle. */
  private assertAcyclic(changes: Item[]): void {
    const scratch = new Map(this.byId);
    for (const item of changes) scratch.set(item.id, item);
    const cycle = findCycle(strictAdjacency(scratch));
    if (cycle) throw new CycleDetectedError(cycle);
  }

  // ==========================================================================
  // Items
  // ==========================================================================

  /** Insert or replace an item. Relations are stored as given. */
  addItem(item: Item): void {
    this.byId.set(item.id, item);
  }

  /** Delete an item. Returns it, or undefined when it was absent. */
  removeItem(id: string, options: RemoveItemOptions = {}): Item | undefined {
    const removed = this.byId.get(id);
    if (!removed) return undefined;
    this.byId.delete(id);

    if (options.cascade) {
      for (const item of this.byId.values()) {
        let next = item;
        for (const [type, targets] of relationEntries(item)) {
          if (targets.includes(id)) next = withoutRelationTarget(next, type, id);
        }
        if (next !== item) this.byId.set(next.id, next);
      }
    }
    return removed;
  }

  /** Copy-on-write field update. */
  updateItem(id: string, patch: ItemPatch): Item {
    const next = patchItem(this.require(id, 'Updated'), patch);
    this.byId.set(id, next);
    return next;
  }

  // ==========================================================================
  // Relations
  // ==========================================================================

  /**
   * Add `from -type-> to` and its mirror `to -mirror-> from`.
   * @throws GraphOperationError if either item is missing
   * @throws CycleDetectedError if a strict cycle would result; nothing changes
   */
  addRelation(fromId: string, type: RelationType, toId: string): void {
    const from = this.require(fromId, 'Source');
    const to = this.require(toId, 'Target');
    const mirror = RELATION_MIRRORS[type];

    const nextFrom = withRelationTarget(from, type, toId);
    const changes = fromId === toId
      ? [withRelationTarget(nextFrom, mirror, fromId)]
      : [nextFrom, withRelationTarget(to, mirror, fromId)];

    if (isStrictRelation(type) || isStrictRelation(mirror)) {
      this.assertAcyclic(changes);
    }
    this.commit(changes);
  }

  /**
   * Remove `from -type-> to` and its mirror. Missing items or edges are a no-op.
   */
  removeRelation(fromId: string, type: RelationType, toId: string): void {
    const from = this.byId.get(fromId);
    const to = this.byId.get(toId);
    if (!from || !to) return;
    const mirror = RELATION_MIRRORS[type];

    const nextFrom = withoutRelationTarget(from, type, toId);
    const changes = fromId === toId
      ? [withoutRelationTarget(nextFrom, mirror, fromId)]
      : [nextFrom, withoutRelationTarget(to, mirror, fromId)];
    this.commit(changes);
  }

  /**
   * Drop one target from one bucket of one item, without touching the
   * target. Returns false when there was nothing to drop.
   */
  pruneReference(itemId: string, type: RelationType, targetId: string): boolean {
    const item = this.byId.get(itemId);
    if (!item || !relationTargets(item, type).includes(targetId)) return false;
    this.byId.set(itemId, withoutRelationTarget(item, type, targetId));
    return true;
  }

  /**
   * Splice `newItem` into the chain `before ⊢ after`, giving
   * `before ⊢ newItem ⊢ after`.
   * @throws GraphOperationError if an anchor is missing or the id is taken
   * @throws CycleDetectedError if the splice would close a cycle; nothing changes
   */
  insertBetween(newItem: Item, beforeId: string, afterId: string): void {
    const before = this.require(beforeId, 'Before');
    const after = this.require(afterId, 'After');
    if (this.byId.has(newItem.id)) {
      throw new GraphOperationError(`Item '${newItem.id}' already exists`, { code: ExitCode.ID_COLLISION });
    }

    const inserted = withRelationTarget(
      { ...newItem, relations: { ...newItem.relations, REQUIRES: [afterId] } },
      'BLOCKS',
      beforeId,
    );
    const nextBefore = replaceRelationTarget(before, 'REQUIRES', afterId, newItem.id);
    const nextAfter = replaceRelationTarget(
      beforeId === afterId ? nextBefore : after,
      'BLOCKS',
      beforeId,
      newItem.id,
    );
    const changes = beforeId === afterId ? [inserted, nextAfter] : [inserted, nextBefore, nextAfter];

    this.assertAcyclic(changes);
    this.commit(changes);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Find the single item whose id equals `query` or whose title contains it,
   * ignoring case.
   * @throws ItemLookupError with reason 'not_found' or 'ambiguous'
   */
  findBySubstring(query: string): Item {
    const needle = query.toLowerCase();
    const matches = this.all().filter(
      (item) => item.id.toLowerCase() === needle || item.title.toLowerCase().includes(needle),
    );
    const [only] = matches;
    if (only && matches.length === 1) return only;
    throw new ItemLookupError(query, matches.map((item) => item.id));
  }

  /** First strict cycle found, first id repeated at the end, or null. */
  detectCycle(): string[] | null {
    return findCycle(strictAdjacency(this.byId));
  }

  /**
   * Longest chain of existing REQUIRES targets below each item, memoized.
   * An item met again while its own depth is being computed counts as 0.
   */
  private depths(): (id: string) => number {
    const memo = new Map<string, number>();
    const active = new Set<string>();
    const depthOf = (id: string): number => {
      const known = memo.get(id);
      if (known !== undefined) return known;
      const item = this.byId.get(id);
      if (!item || active.has(id)) return 0;
      active.add(id);
      let depth = 0;
      for (const target of relationTargets(item, 'REQUIRES')) {
        if (this.byId.has(target)) depth = Math.max(depth, depthOf(target) + 1);
      }
      active.delete(id);
      memo.set(id, depth);
      return depth;
    };
    return depthOf;
  }

  /**
   * Order items so that every strict target precedes the items depending
   * on it (Kahn's algorithm). Ready items are taken by ascending depth,
   * then ascending id.
   * @throws CycleDetectedError if the strict edges contain a cycle
   */
  topologicalSort(): Item[] {
    const adjacency = strictAdjacency(this.byId);
    const pending = new Map<string, number>();
    const dependents = new Map<string, string[]>();
    for (const [id, targets] of adjacency) {
      pending.set(id, targets.length);
      for (const target of targets) {
        const list = dependents.get(target);
        if (list) list.push(id);
        else dependents.set(target, [id]);
      }
    }

    const depthOf = this.depths();
    const compare = (a: string, b: string): number => depthOf(a) - depthOf(b) || compareIds(a, b);
    const ready = [...pending].filter(([, count]) => count === 0).map(([id]) => id).sort(compare);

    const order: Item[] = [];
    const emitted = new Set<string>();
    for (let id = ready.shift(); id !== undefined; id = ready.shift()) {
      const item = this.byId.get(id);
      if (item) order.push(item);
      emitted.add(id);
      for (const dependent of dependents.get(id) ?? []) {
        const remaining = (pending.get(dependent) ?? 0) - 1;
        pending.set(dependent, remaining);
        if (remaining === 0) {
          const at = ready.findIndex((other) => compare(dependent, other) < 0);
          ready.splice(at === -1 ? ready.length : at, 0, dependent);
        }
      }
    }

    if (order.length < this.byId.size) {
      const unvisited = new Set(this.ids().filter((id) => !emitted.has(id)));
      throw new CycleDetectedError(findCycle(adjacency, unvisited) ?? [...unvisited]);
    }
    return order;
  }

  // ==========================================================================
  // Whole-graph values
  // ==========================================================================

  /** Deep value copy; the copy shares nothing with this graph. */
  copy(): ItemGraph {
    return new ItemGraph(this.all().map(cloneItem));
  }

  /** New graph holding this graph's items overlaid with `other`'s (other wins on id). */
  merge(other: ItemGraph): ItemGraph {
    const merged = this.copy();
    for (const item of other.all()) merged.byId.set(item.id, cloneItem(item));
    return merged;
  }
}
