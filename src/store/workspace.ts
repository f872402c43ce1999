/**
 * Workspace layout and lifecycle.
 *
 *   <workspace>/
 *     config.json
 *     include/{items.txt, metadata.json, logs.jsonl}
 *     occlude/{items.txt, metadata.json, logs.jsonl}
 */

import { existsSync } from 'node:fs';
import { z } from 'zod';
import { ExitCode } from '../types/exit-codes.js';
import { GraphException, errorMessage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { getWorkspacePaths, type WorkspacePaths } from '../core/paths.js';
import { computeChecksum, getIsoTimestamp } from '../core/platform.js';
import type { ItemGraph } from '../core/graph/item-graph.js';
import type { LogCollection } from '../core/logs/collection.js';
import { atomicWrite, safeReadFile, writeFiles, type FileWrite, type WriteFilesOptions, type WriteFilesResult } from './atomic.js';
import { FORMAT_VERSION, itemsBanner, logsBanner } from './banner.js';
import { loadGraph, renderGraphFiles, type LoadOptions } from './graph-store.js';
import { loadLogs, saveLogs } from './log-store.js';

export const WorkspaceMetadataSchema = z.object({
  schemaVersion: z.number().int().positive(),
  createdAt: z.string(),
  itemCount: z.number().int().min(0),
  checksum: z.string(),
});

export type WorkspaceMetadata = z.infer<typeof WorkspaceMetadataSchema>;

function requiredFiles(paths: WorkspacePaths): string[] {
  return [
    paths.items, paths.metadata, paths.logs,
    paths.occludeItems, paths.occludeMetadata, paths.occludeLogs,
  ];
}

function metadataJson(metadata: WorkspaceMetadata): string {
  return `${JSON.stringify(metadata, null, 2)}\n`;
}

/** Whether every workspace file exists under `dir`. */
export function isWorkspaceInitialized(dir: string): boolean {
  return requiredFiles(getWorkspacePaths(dir)).every((file) => existsSync(file));
}

/**
 * Create any missing workspace files under `dir`. Existing files are left
 * alone. Returns the paths created.
 */
export async function initWorkspace(dir: string): Promise<{ paths: WorkspacePaths; created: string[] }> {
  const paths = getWorkspacePaths(dir);
  const createdAt = getIsoTimestamp();
  const emptyMetadata = metadataJson({
    schemaVersion: FORMAT_VERSION,
    createdAt,
    itemCount: 0,
    checksum: computeChecksum(''),
  });

  const seeds: FileWrite[] = [
    { path: paths.items, content: `${itemsBanner('include', '').join('\n')}\n` },
    { path: paths.occludeItems, content: `${itemsBanner('occlude', '').join('\n')}\n` },
    { path: paths.logs, content: `${logsBanner('include', '').join('\n')}\n` },
    { path: paths.occludeLogs, content: `${logsBanner('occlude', '').join('\n')}\n` },
    { path: paths.metadata, content: emptyMetadata },
    { path: paths.occludeMetadata, content: emptyMetadata },
  ];

  const created: string[] = [];
  for (const seed of seeds) {
    if (existsSync(seed.path)) continue;
    await atomicWrite(seed.path, seed.content);
    created.push(seed.path);
  }
  getLogger('workspace').info({ dir, created: created.length }, 'Workspace initialized');
  return { paths, created };
}

/**
 * Check that the workspace under `dir` is complete.
 * @throws GraphException listing the missing files
 */
export function validateWorkspace(dir: string): WorkspacePaths {
  const paths = getWorkspacePaths(dir);
  const missing = requiredFiles(paths).filter((file) => !existsSync(file));
  if (missing.length > 0) {
    throw new GraphException(`Workspace at ${dir} is incomplete, missing: ${missing.join(', ')}`, {
      code: ExitCode.WORKSPACE_NOT_INITIALIZED,
      fix: 'Run `plotline init`',
    });
  }
  return paths;
}

/**
 * Read and validate a metadata file. Null when the file does not exist.
 * @throws GraphException if the file is not valid metadata
 */
export async function readMetadata(path: string): Promise<WorkspaceMetadata | null> {
  const raw = await safeReadFile(path);
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new GraphException(`Invalid metadata JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const result = WorkspaceMetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new GraphException(`Invalid metadata in ${path}: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

async function renderMetadata(path: string, itemFile: FileWrite | undefined, itemCount: number): Promise<FileWrite> {
  const previous = await readMetadata(path);
  return {
    path,
    content: metadataJson({
      schemaVersion: FORMAT_VERSION,
      createdAt: previous?.createdAt ?? getIsoTimestamp(),
      itemCount,
      checksum: computeChecksum(itemFile?.content ?? ''),
    }),
  };
}

/** Load the workspace graph. */
export async function loadWorkspaceGraph(paths: WorkspacePaths, options: LoadOptions = {}): Promise<ItemGraph> {
  return loadGraph(paths.items, paths.occludeItems, options);
}

/**
 * Save the workspace graph and both metadata files in one atomic batch.
 */
export async function saveWorkspaceGraph(
  paths: WorkspacePaths,
  graph: ItemGraph,
  options: LoadOptions & WriteFilesOptions = {},
): Promise<WriteFilesResult> {
  const [includeFile, occludeFile] = await renderGraphFiles(paths.items, paths.occludeItems, graph, options);
  const files: FileWrite[] = [
    ...(includeFile ? [includeFile] : []),
    ...(occludeFile ? [occludeFile] : []),
    await renderMetadata(paths.metadata, includeFile, graph.includedItems().length),
    await renderMetadata(paths.occludeMetadata, occludeFile, graph.occludedItems().length),
  ];
  return writeFiles(files, options);
}

export async function loadWorkspaceLogs(paths: WorkspacePaths, options: { strict?: boolean } = {}): Promise<LogCollection> {
  return loadLogs(paths.logs, paths.occludeLogs, options);
}

export async function saveWorkspaceLogs(
  paths: WorkspacePaths,
  logs: LogCollection,
  options: WriteFilesOptions = {},
): Promise<WriteFilesResult> {
  return saveLogs(paths.logs, paths.occludeLogs, logs, options);
}
