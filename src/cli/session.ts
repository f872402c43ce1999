/**
 * Per-invocation workspace access shared by the commands.
 *
 * Commands load what they need, mutate in memory, then commit once; a
 * failed mutation never reaches disk.
 */

import type { Item } from '../types/item.js';
import type { PlotlineConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { PlotlineError } from '../core/errors.js';
import { loadConfig } from '../core/config.js';
import { getWorkspaceDir, type WorkspacePaths } from '../core/paths.js';
import type { ItemGraph } from '../core/graph/item-graph.js';
import type { LogCollection } from '../core/logs/collection.js';
import {
  loadWorkspaceGraph,
  loadWorkspaceLogs,
  saveWorkspaceGraph,
  saveWorkspaceLogs,
  validateWorkspace,
} from '../store/workspace.js';
import type { WriteFilesResult } from '../store/atomic.js';
import { cliError } from './renderers/index.js';

export interface WorkspaceSession {
  paths: WorkspacePaths;
  config: PlotlineConfig;
}

/**
 * Resolve and validate the active workspace.
 * @throws GraphException (WORKSPACE_NOT_INITIALIZED) when files are missing
 */
export async function openWorkspace(cwd?: string): Promise<WorkspaceSession> {
  const config = await loadConfig(cwd);
  const paths = validateWorkspace(getWorkspaceDir(cwd));
  return { paths, config };
}

export async function loadItems(session: WorkspaceSession): Promise<ItemGraph> {
  return loadWorkspaceGraph(session.paths, { strict: session.config.storage.strictParsing });
}

export async function commitItems(session: WorkspaceSession, graph: ItemGraph): Promise<WriteFilesResult> {
  const { backup, storage } = session.config;
  return saveWorkspaceGraph(session.paths, graph, {
    strict: storage.strictParsing,
    backup: backup.enabled,
    keep: backup.keep,
  });
}

export async function loadLogEntries(session: WorkspaceSession): Promise<LogCollection> {
  return loadWorkspaceLogs(session.paths, { strict: session.config.storage.strictParsing });
}

export async function commitLogs(session: WorkspaceSession, logs: LogCollection): Promise<WriteFilesResult> {
  const { backup } = session.config;
  return saveWorkspaceLogs(session.paths, logs, { backup: backup.enabled, keep: backup.keep });
}

/**
 * Find an item by exact id first, then by unique id/title substring.
 * @throws ItemLookupError when the substring is missing or ambiguous
 */
export function resolveItem(graph: ItemGraph, query: string): Item {
  return graph.get(query) ?? graph.findBySubstring(query);
}

/**
 * Print a PlotlineError in the resolved format and exit with its code.
 * Anything else is rethrown to commander.
 */
export function handleCommandError(err: unknown, command: string): never {
  if (err instanceof PlotlineError) {
    cliError(err, command);
    process.exit(err.code);
  }
  throw err;
}

/** Exit with CANCELLED when a confirmation is declined. */
export function cancelled(command: string): never {
  handleCommandError(new PlotlineError(ExitCode.CANCELLED, 'Cancelled', { fix: 'Pass --yes to skip the prompt' }), command);
}
