/**
 * Tests for loading and saving item graphs.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadGraph, parseItemLines, saveGraph } from '../graph-store.js';
import { ItemGraph } from '../../core/graph/item-graph.js';
import { createItem } from '../../core/model/item.js';
import { serializeItem } from '../../core/notation/serializer.js';
import { ParseError } from '../../core/errors.js';

function itemLines(content: string): string[] {
  return content.split('\n').filter((line) => line !== '' && !line.startsWith('#'));
}

describe('parseItemLines', () => {
  const content = ['# banner', '', '○ a 0s "A" {}', 'garbage', '● b 0s "B" {}'].join('\n');

  it('names the file and line of a malformed item when strict', () => {
    let caught: unknown;
    try {
      parseItemLines(content, 'items.txt');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    if (caught instanceof ParseError) {
      expect(caught.message.startsWith('Invalid item at items.txt:4 (')).toBe(true);
    }
  });

  it('skips malformed lines when lenient', () => {
    const items = parseItemLines(content, 'items.txt', { strict: false, occlude: true });
    expect(items.map((item) => [item.id, item.occlude])).toEqual([['a', true], ['b', true]]);
  });
});

describe('graph files', () => {
  let tempDir: string;
  let includePath: string;
  let occludePath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'plotline-test-'));
    includePath = join(tempDir, 'include', 'items.txt');
    occludePath = join(tempDir, 'occlude', 'items.txt');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function sampleGraph(): ItemGraph {
    const graph = new ItemGraph([
      createItem({ id: 'app', title: 'Ship the app', priority: 'HIGH', tags: ['work'] }),
      createItem({ id: 'design', title: 'Design it', status: 'COMPLETED' }),
      createItem({ id: 'old_idea', title: 'Old idea', occlude: true }),
    ]);
    graph.addRelation('app', 'REQUIRES', 'design');
    return graph;
  }

  it('loads nothing when both files are missing', async () => {
    const graph = await loadGraph(includePath, occludePath);
    expect(graph.size).toBe(0);
  });

  it('writes active and occluded items to separate files in topological order', async () => {
    await saveGraph(includePath, occludePath, sampleGraph());

    expect(itemLines(await readFile(includePath, 'utf8'))).toEqual([
      '● design 0s "Design it" {} >>> ►[app]',
      '○ app!! 0s "Ship the app" {} work >>> ⊢[design]',
    ]);
    expect(itemLines(await readFile(occludePath, 'utf8'))).toEqual(['○ old_idea 0s "Old idea" {}']);
  });

  it('reads back what it wrote', async () => {
    const original = sampleGraph();
    await saveGraph(includePath, occludePath, original);
    const loaded = await loadGraph(includePath, occludePath);

    expect(loaded.topologicalSort().map(serializeItem)).toEqual(original.topologicalSort().map(serializeItem));
    expect(loaded.get('old_idea')?.occlude).toBe(true);
    expect(loaded.get('app')?.occlude).toBe(false);
  });

  it('rewrites nothing when saving an unchanged graph', async () => {
    await saveGraph(includePath, occludePath, sampleGraph());
    const loaded = await loadGraph(includePath, occludePath);
    const result = await saveGraph(includePath, occludePath, loaded);
    expect(result.written).toEqual([]);
    expect(result.unchanged).toEqual([includePath, occludePath]);
  });

  it('keeps include directives and does not repeat inherited items', async () => {
    await saveGraph(includePath, occludePath, new ItemGraph());
    await writeFile(join(tempDir, 'include', 'base.txt'), '○ shared 0s "Shared" {}\n');
    const banner = (await readFile(includePath, 'utf8')).trimEnd();
    await writeFile(includePath, `${banner}\n#include base.txt\n○ own 0s "Own" {}\n`);

    const graph = await loadGraph(includePath, occludePath);
    expect(graph.has('shared')).toBe(true);
    graph.updateItem('own', { status: 'IN_PROGRESS' });
    await saveGraph(includePath, occludePath, graph);

    const content = await readFile(includePath, 'utf8');
    expect(content).toContain('\n#include base.txt\n');
    expect(itemLines(content)).toEqual(['◑ own 0s "Own" {}']);
  });
});
