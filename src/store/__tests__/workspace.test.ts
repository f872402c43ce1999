/**
 * Tests for workspace initialization, metadata and log persistence.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  initWorkspace,
  isWorkspaceInitialized,
  loadWorkspaceGraph,
  loadWorkspaceLogs,
  readMetadata,
  saveWorkspaceGraph,
  saveWorkspaceLogs,
  validateWorkspace,
} from '../workspace.js';
import { ItemGraph } from '../../core/graph/item-graph.js';
import { LogCollection } from '../../core/logs/collection.js';
import { createItem } from '../../core/model/item.js';
import { createLogEntry } from '../../core/model/log-entry.js';
import { GraphException } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('workspace', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(await mkdtemp(join(tmpdir(), 'plotline-test-')), '.plotline');
  });

  afterEach(async () => {
    await rm(join(dir, '..'), { recursive: true, force: true });
  });

  it('creates all six files once', async () => {
    const first = await initWorkspace(dir);
    expect(first.created.length).toBe(6);
    expect(isWorkspaceInitialized(dir)).toBe(true);

    const second = await initWorkspace(dir);
    expect(second.created).toEqual([]);
  });

  it('recreates only missing files', async () => {
    const { paths } = await initWorkspace(dir);
    await writeFile(paths.items, 'kept\n');
    await unlink(paths.occludeLogs);

    const again = await initWorkspace(dir);
    expect(again.created).toEqual([paths.occludeLogs]);
    expect(await readFile(paths.items, 'utf8')).toBe('kept\n');
  });

  it('reports the missing files of an incomplete workspace', async () => {
    const { paths } = await initWorkspace(dir);
    await unlink(paths.metadata);

    let caught: unknown;
    try {
      validateWorkspace(dir);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GraphException);
    if (caught instanceof GraphException) {
      expect(caught.code).toBe(ExitCode.WORKSPACE_NOT_INITIALIZED);
      expect(caught.message).toBe(`Workspace at ${dir} is incomplete, missing: ${paths.metadata}`);
    }
  });

  it('starts with empty metadata', async () => {
    const { paths } = await initWorkspace(dir);
    const metadata = await readMetadata(paths.metadata);
    expect(metadata?.schemaVersion).toBe(1);
    expect(metadata?.itemCount).toBe(0);
  });

  it('rejects malformed metadata', async () => {
    const { paths } = await initWorkspace(dir);
    await writeFile(paths.metadata, '{"schemaVersion": "one"}');
    await expect(readMetadata(paths.metadata)).rejects.toBeInstanceOf(GraphException);
  });

  it('updates item counts and keeps the creation time on save', async () => {
    const { paths } = await initWorkspace(dir);
    const createdAt = (await readMetadata(paths.metadata))?.createdAt;

    const graph = new ItemGraph([
      createItem({ id: 'a', title: 'A' }),
      createItem({ id: 'b', title: 'B' }),
      createItem({ id: 'c', title: 'C', occlude: true }),
    ]);
    await saveWorkspaceGraph(paths, graph);

    const active = await readMetadata(paths.metadata);
    const archived = await readMetadata(paths.occludeMetadata);
    expect(active?.itemCount).toBe(2);
    expect(active?.createdAt).toBe(createdAt);
    expect(archived?.itemCount).toBe(1);

    const loaded = await loadWorkspaceGraph(paths);
    expect(loaded.ids().sort()).toEqual(['a', 'b', 'c']);
  });

  it('stores occluded log entries in the occlude file', async () => {
    const { paths } = await initWorkspace(dir);
    const logs = new LogCollection([
      createLogEntry({ session: 's1', message: 'active', timestamp: new Date('2025-03-01T08:00:00.000Z') }),
      createLogEntry({
        session: 's1',
        message: 'archived',
        timestamp: new Date('2025-03-01T07:00:00.000Z'),
        occlude: true,
      }),
    ]);
    await saveWorkspaceLogs(paths, logs);

    const archivedLines = (await readFile(paths.occludeLogs, 'utf8')).split('\n').filter((l) => l.startsWith('{'));
    expect(archivedLines).toEqual([
      '{"s":"s1","t":"2025-03-01T07:00:00.000Z","m":"archived","tags":[],"meta":{}}',
    ]);

    const loaded = await loadWorkspaceLogs(paths);
    expect(loaded.all().map((entry) => [entry.message, entry.occlude])).toEqual([
      ['archived', true],
      ['active', false],
    ]);
  });

  it('skips malformed log lines only when lenient', async () => {
    const { paths } = await initWorkspace(dir);
    await writeFile(paths.logs, '{"s":"s1","t":"2025-03-01T08:00:00.000Z","m":"ok"}\nnot json\n');
    await expect(loadWorkspaceLogs(paths)).rejects.toThrow(`Invalid log entry at ${paths.logs}:2`);
    const lenient = await loadWorkspaceLogs(paths, { strict: false });
    expect(lenient.size).toBe(1);
  });
});
