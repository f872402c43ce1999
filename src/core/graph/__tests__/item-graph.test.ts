/**
 * Tests for ItemGraph: mirrored relations, acyclicity and ordering.
 */

import { describe, it, expect } from 'vitest';
import { ItemGraph } from '../item-graph.js';
import { createItem } from '../../model/item.js';
import { CycleDetectedError, GraphOperationError, ItemLookupError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';

function graphOf(...ids: string[]): ItemGraph {
  return new ItemGraph(ids.map((id) => createItem({ id, title: `Title ${id}` })));
}

function sortedIds(graph: ItemGraph): string[] {
  return graph.topologicalSort().map((item) => item.id);
}

describe('ItemGraph relations', () => {
  it('writes the mirror relation on the target', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'REQUIRES', 'B');
    expect(graph.get('A')?.relations).toEqual({ REQUIRES: ['B'] });
    expect(graph.get('B')?.relations).toEqual({ BLOCKS: ['A'] });
  });

  it('mirrors symmetric relations with the same type', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'CONFLICTS', 'B');
    expect(graph.get('B')?.relations).toEqual({ CONFLICTS: ['A'] });
  });

  it('mirrors ANYOF as SUFFICIENT', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'ANYOF', 'B');
    expect(graph.get('B')?.relations).toEqual({ SUFFICIENT: ['A'] });
  });

  it('removes both sides and drops emptied buckets', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'REQUIRES', 'B');
    graph.removeRelation('A', 'REQUIRES', 'B');
    expect(graph.get('A')?.relations).toEqual({});
    expect(graph.get('B')?.relations).toEqual({});
  });

  it('ignores removal when an item is missing', () => {
    const graph = graphOf('A');
    expect(() => graph.removeRelation('A', 'REQUIRES', 'ghost')).not.toThrow();
  });

  it('rejects relations to missing items', () => {
    const graph = graphOf('A');
    expect(() => graph.addRelation('A', 'REQUIRES', 'ghost')).toThrow(GraphOperationError);
    expect(graph.get('A')?.relations).toEqual({});
  });

  it('rejects a cycle and leaves the graph unchanged', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'REQUIRES', 'B');

    let caught: unknown;
    try {
      graph.addRelation('B', 'REQUIRES', 'A');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CycleDetectedError);
    if (caught instanceof CycleDetectedError) {
      expect(caught.cycle).toEqual(['A', 'B', 'A']);
      expect(caught.code).toBe(ExitCode.CIRCULAR_REFERENCE);
    }
    expect(graph.get('A')?.relations).toEqual({ REQUIRES: ['B'] });
    expect(graph.get('B')?.relations).toEqual({ BLOCKS: ['A'] });
  });

  it('treats BLOCKS as a reversed strict edge', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'REQUIRES', 'B');
    expect(() => graph.addRelation('A', 'BLOCKS', 'B')).toThrow(CycleDetectedError);
  });

  it('allows cycles of non-strict relations', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'SUPERCHARGES', 'B');
    graph.addRelation('B', 'INDICATES', 'A');
    expect(graph.detectCycle()).toBeNull();
  });

  it('rejects a self-requirement', () => {
    const graph = graphOf('A');
    expect(() => graph.addRelation('A', 'REQUIRES', 'A')).toThrow(CycleDetectedError);
  });
});

describe('ItemGraph.topologicalSort', () => {
  it('puts prerequisites first', () => {
    const graph = graphOf('A', 'B', 'C');
    graph.addRelation('A', 'REQUIRES', 'B');
    graph.addRelation('B', 'REQUIRES', 'C');
    expect(sortedIds(graph)).toEqual(['C', 'B', 'A']);
  });

  it('breaks ties by depth, then id', () => {
    const graph = graphOf('z', 'y', 'x', 'w');
    graph.addRelation('x', 'REQUIRES', 'w');
    expect(sortedIds(graph)).toEqual(['w', 'y', 'z', 'x']);
  });

  it('orders ANYOF targets before the item', () => {
    const graph = graphOf('a', 'b');
    graph.addRelation('a', 'ANYOF', 'b');
    expect(sortedIds(graph)).toEqual(['b', 'a']);
  });

  it('ignores dangling targets', () => {
    const graph = new ItemGraph([createItem({ id: 'a', title: 'a', relations: { REQUIRES: ['missing'] } })]);
    expect(sortedIds(graph)).toEqual(['a']);
  });

  it('is stable across repeated sorts', () => {
    const graph = graphOf('d', 'c', 'b', 'a');
    graph.addRelation('a', 'REQUIRES', 'c');
    graph.addRelation('b', 'REQUIRES', 'd');
    expect(sortedIds(graph)).toEqual(sortedIds(graph));
  });

  it('reports a cycle loaded from disk', () => {
    const graph = new ItemGraph([
      createItem({ id: 'a', title: 'a', relations: { REQUIRES: ['b'] } }),
      createItem({ id: 'b', title: 'b', relations: { REQUIRES: ['a'] } }),
    ]);
    expect(graph.detectCycle()).toEqual(['a', 'b', 'a']);
    expect(() => graph.topologicalSort()).toThrow(CycleDetectedError);
  });
});

describe('ItemGraph.insertBetween', () => {
  it('splices the new item into the chain', () => {
    const graph = graphOf('A', 'C');
    graph.addRelation('A', 'REQUIRES', 'C');
    graph.insertBetween(createItem({ id: 'B', title: 'middle' }), 'A', 'C');

    expect(graph.get('A')?.relations).toEqual({ REQUIRES: ['B'] });
    expect(graph.get('B')?.relations).toEqual({ REQUIRES: ['C'], BLOCKS: ['A'] });
    expect(graph.get('C')?.relations).toEqual({ BLOCKS: ['B'] });
    expect(sortedIds(graph)).toEqual(['C', 'B', 'A']);
  });

  it('rejects an existing id', () => {
    const graph = graphOf('A', 'B', 'C');
    let caught: unknown;
    try {
      graph.insertBetween(createItem({ id: 'B', title: 'again' }), 'A', 'C');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GraphOperationError);
    if (caught instanceof GraphOperationError) expect(caught.code).toBe(ExitCode.ID_COLLISION);
  });

  it('rejects a missing anchor', () => {
    const graph = graphOf('A');
    expect(() => graph.insertBetween(createItem({ id: 'B', title: 'b' }), 'A', 'nope')).toThrow("After item 'nope' does not exist");
  });

  it('rejects an insert that would close a cycle and leaves the graph unchanged', () => {
    // Q already requires P, so X requiring Q while P requires X loops.
    const graph = graphOf('P', 'Q');
    graph.addRelation('Q', 'REQUIRES', 'P');

    expect(() => graph.insertBetween(createItem({ id: 'X', title: 'x' }), 'P', 'Q')).toThrow(CycleDetectedError);
    expect(graph.has('X')).toBe(false);
    expect(graph.get('P')?.relations).toEqual({ BLOCKS: ['Q'] });
    expect(graph.get('Q')?.relations).toEqual({ REQUIRES: ['P'] });
    expect(sortedIds(graph)).toEqual(['P', 'Q']);
  });
});

describe('ItemGraph.removeItem', () => {
  it('leaves references behind without cascade', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'REQUIRES', 'B');
    expect(graph.removeItem('B')?.id).toBe('B');
    expect(graph.get('A')?.relations).toEqual({ REQUIRES: ['B'] });
  });

  it('removes references with cascade', () => {
    const graph = graphOf('A', 'B');
    graph.addRelation('A', 'REQUIRES', 'B');
    graph.removeItem('B', { cascade: true });
    expect(graph.get('A')?.relations).toEqual({});
  });

  it('returns undefined for a missing item', () => {
    expect(graphOf('A').removeItem('nope')).toBeUndefined();
  });
});

describe('ItemGraph.findBySubstring', () => {
  const graph = new ItemGraph([
    createItem({ id: 'git_basics', title: 'Learn git' }),
    createItem({ id: 'learn_python', title: 'Finally learn Python' }),
    createItem({ id: 'cook', title: 'Cook dinner' }),
  ]);

  it('matches an exact id ignoring case', () => {
    expect(graph.findBySubstring('COOK').id).toBe('cook');
  });

  it('matches a unique title substring', () => {
    expect(graph.findBySubstring('python').id).toBe('learn_python');
  });

  it('reports ambiguous matches', () => {
    let caught: unknown;
    try {
      graph.findBySubstring('learn');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ItemLookupError);
    if (caught instanceof ItemLookupError) {
      expect(caught.reason).toBe('ambiguous');
      expect(caught.matches).toEqual(['git_basics', 'learn_python']);
      expect(caught.code).toBe(ExitCode.AMBIGUOUS_MATCH);
    }
  });

  it('reports no match', () => {
    expect(() => graph.findBySubstring('swim')).toThrow("No item matches 'swim'");
  });
});

describe('ItemGraph values', () => {
  it('copies deeply', () => {
    const graph = graphOf('A', 'B');
    const copy = graph.copy();
    copy.addRelation('A', 'REQUIRES', 'B');
    expect(graph.get('A')?.relations).toEqual({});
  });

  it('merges with the other graph winning', () => {
    const left = new ItemGraph([createItem({ id: 'a', title: 'old' }), createItem({ id: 'b', title: 'b' })]);
    const right = new ItemGraph([createItem({ id: 'a', title: 'new' }), createItem({ id: 'c', title: 'c' })]);
    const merged = left.merge(right);
    expect(merged.ids()).toEqual(['a', 'b', 'c']);
    expect(merged.get('a')?.title).toBe('new');
    expect(left.get('a')?.title).toBe('old');
  });

  it('updates fields copy-on-write', () => {
    const graph = graphOf('A');
    const before = graph.get('A');
    graph.updateItem('A', { status: 'COMPLETED' });
    expect(graph.get('A')?.status).toBe('COMPLETED');
    expect(before?.status).toBe('NOT_STARTED');
  });

  it('rejects a comment update that would not survive a save', () => {
    const graph = graphOf('A');
    expect(() => graph.updateItem('A', { userComment: 'first ### second' })).toThrow(
      "User comment of 'A' contains the auto comment marker '###'",
    );
    expect(graph.get('A')?.userComment).toBeUndefined();
  });
});
