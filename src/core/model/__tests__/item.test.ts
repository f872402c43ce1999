/**
 * Tests for item value helpers and comment checks.
 */

import { describe, it, expect } from 'vitest';
import {
  createItem,
  relationEntries,
  replaceRelationTarget,
  updateItem,
  withRelationTarget,
  withoutRelationTarget,
} from '../item.js';
import { PlotlineError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';

function rejection(fn: () => unknown): PlotlineError | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof PlotlineError ? err : undefined;
  }
  return undefined;
}

describe('createItem', () => {
  it('fills every field not given', () => {
    expect(createItem({ id: 'a', title: 'A' })).toEqual({
      id: 'a',
      title: 'A',
      description: '',
      status: 'NOT_STARTED',
      priority: 'NEUTRAL',
      duration: { parts: [] },
      charts: [],
      tags: [],
      relations: {},
      timeConstraints: [],
      occlude: false,
    });
  });

  it('trims comments and drops blank ones', () => {
    const item = createItem({ id: 'a', title: 'A', userComment: '  spaced  ', autoComment: '   ' });
    expect(item.userComment).toBe('spaced');
    expect('autoComment' in item).toBe(false);
  });

  it('rejects the auto comment marker inside a user comment', () => {
    const error = rejection(() => createItem({ id: 'a', title: 'A', userComment: 'see ### here' }));
    expect(error?.code).toBe(ExitCode.INVALID_INPUT);
    expect(error?.message).toBe("User comment of 'a' contains the auto comment marker '###'");
  });

  it('rejects a user comment that starts with the marker', () => {
    expect(rejection(() => createItem({ id: 'a', title: 'A', userComment: '### note' }))?.code)
      .toBe(ExitCode.INVALID_INPUT);
  });

  it('accepts ### glued to a word', () => {
    expect(createItem({ id: 'a', title: 'A', userComment: 'a###b' }).userComment).toBe('a###b');
  });

  it('accepts ### inside the auto comment', () => {
    expect(createItem({ id: 'a', title: 'A', autoComment: 'moved ### twice' }).autoComment).toBe('moved ### twice');
  });

  it('rejects line breaks in either comment', () => {
    const user = rejection(() => createItem({ id: 'a', title: 'A', userComment: 'one\ntwo' }));
    expect(user?.message).toBe("Comment of 'a' contains a line break");
    const auto = rejection(() => createItem({ id: 'a', title: 'A', autoComment: 'one\rtwo' }));
    expect(auto?.code).toBe(ExitCode.INVALID_INPUT);
  });
});

describe('updateItem', () => {
  it('returns a new item and leaves the original alone', () => {
    const original = createItem({ id: 'a', title: 'A' });
    const next = updateItem(original, { status: 'COMPLETED', userComment: 'done ' });
    expect(next.status).toBe('COMPLETED');
    expect(next.userComment).toBe('done');
    expect(original.status).toBe('NOT_STARTED');
  });

  it('checks patched comments', () => {
    const original = createItem({ id: 'a', title: 'A' });
    expect(rejection(() => updateItem(original, { userComment: 'x\ny' }))?.code).toBe(ExitCode.INVALID_INPUT);
  });
});

describe('relation buckets', () => {
  it('appends without duplicates and drops emptied buckets', () => {
    let item = createItem({ id: 'a', title: 'A' });
    item = withRelationTarget(item, 'REQUIRES', 'b');
    item = withRelationTarget(item, 'REQUIRES', 'b');
    expect(item.relations).toEqual({ REQUIRES: ['b'] });
    item = withoutRelationTarget(item, 'REQUIRES', 'b');
    expect(item.relations).toEqual({});
  });

  it('replaces a target in place', () => {
    const item = createItem({ id: 'a', title: 'A', relations: { REQUIRES: ['b', 'c'] } });
    expect(replaceRelationTarget(item, 'REQUIRES', 'b', 'x').relations).toEqual({ REQUIRES: ['x', 'c'] });
    expect(replaceRelationTarget(item, 'REQUIRES', 'b', 'c').relations).toEqual({ REQUIRES: ['c'] });
    expect(replaceRelationTarget(item, 'REQUIRES', 'zz', 'x').relations).toEqual({ REQUIRES: ['b', 'c', 'x'] });
  });

  it('lists non-empty buckets in creation order', () => {
    const item = createItem({ id: 'a', title: 'A', relations: { BLOCKS: ['z'], REQUIRES: ['b'], ANYOF: [] } });
    expect(relationEntries(item)).toEqual([['BLOCKS', ['z']], ['REQUIRES', ['b']]]);
  });
});
