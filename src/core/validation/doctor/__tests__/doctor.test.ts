/**
 * Tests for GraphDoctor diagnosis and repair.
 */

import { describe, it, expect } from 'vitest';
import { GraphDoctor } from '../index.js';
import { matchesFilter } from '../checks.js';
import { ItemGraph } from '../../../graph/item-graph.js';
import { createItem } from '../../../model/item.js';

function brokenGraph(): ItemGraph {
  return new ItemGraph([
    createItem({ id: 'X', title: 'x', relations: { REQUIRES: ['missing'], TOGETHER: ['Y'] } }),
    createItem({ id: 'Y', title: 'y', relations: { BLOCKS: ['Z'] } }),
    createItem({ id: 'Z', title: 'z' }),
  ]);
}

describe('GraphDoctor', () => {
  it('reports a dangling reference', () => {
    const graph = new ItemGraph([createItem({ id: 'X', title: 'x', relations: { REQUIRES: ['missing'] } })]);
    const issues = new GraphDoctor(graph).fullDiagnosis();
    expect(issues).toEqual([
      {
        type: 'dangling_reference',
        itemId: 'X',
        relationType: 'REQUIRES',
        relatedId: 'missing',
        missingId: 'missing',
        message: "X REQUIRES 'missing', which does not exist",
        suggestedFix: "Remove 'missing' from X's REQUIRES relations",
      },
    ]);
  });

  it('removes the dangling target and its emptied bucket', () => {
    const graph = new ItemGraph([createItem({ id: 'X', title: 'x', relations: { REQUIRES: ['missing'] } })]);
    const fixed = new GraphDoctor(graph).fixIssues();
    expect(fixed.map((issue) => issue.missingId)).toEqual(['missing']);
    expect(graph.get('X')?.relations).toEqual({});
    expect(new GraphDoctor(graph).fullDiagnosis()).toEqual([]);
  });

  it('reports incomplete chains but never fixes them', () => {
    const graph = brokenGraph();
    const doctor = new GraphDoctor(graph);
    const before = doctor.fullDiagnosis();
    expect(before.map((issue) => [issue.type, issue.itemId, issue.relatedId])).toEqual([
      ['dangling_reference', 'X', 'missing'],
      ['incomplete_chain', 'Y', 'Z'],
    ]);

    doctor.fixIssues();
    const after = doctor.fullDiagnosis();
    expect(after).toHaveLength(1);
    expect(after[0]?.type).toBe('incomplete_chain');
    expect(after[0]?.message).toBe('Y BLOCKS Z, but Z has no REQUIRES entry for Y');
  });

  it('does not check the mirror of non-chained relations', () => {
    const graph = new ItemGraph([
      createItem({ id: 'A', title: 'a', relations: { TOGETHER: ['B'] } }),
      createItem({ id: 'B', title: 'b' }),
    ]);
    expect(new GraphDoctor(graph).quickCheck()).toBe(0);
  });

  it('counts issues without building them', () => {
    expect(new GraphDoctor(brokenGraph()).quickCheck()).toBe(2);
  });

  it('limits fixes to the filter', () => {
    const graph = new ItemGraph([
      createItem({ id: 'A', title: 'a', relations: { REQUIRES: ['gone'] } }),
      createItem({ id: 'B', title: 'b', relations: { ANYOF: ['gone'] } }),
    ]);
    const fixed = new GraphDoctor(graph).fixIssues({ itemId: 'B' });
    expect(fixed.map((issue) => issue.itemId)).toEqual(['B']);
    expect(graph.get('A')?.relations).toEqual({ REQUIRES: ['gone'] });
    expect(graph.get('B')?.relations).toEqual({});
  });
});

describe('matchesFilter', () => {
  const [issue] = new GraphDoctor(brokenGraph()).fullDiagnosis();

  it('matches everything with an empty filter', () => {
    expect(issue && matchesFilter(issue)).toBe(true);
  });

  it('filters by type and item', () => {
    expect(issue && matchesFilter(issue, { type: 'incomplete_chain' })).toBe(false);
    expect(issue && matchesFilter(issue, { type: 'dangling_reference', itemId: 'X' })).toBe(true);
    expect(issue && matchesFilter(issue, { itemId: 'Y' })).toBe(false);
  });
});
