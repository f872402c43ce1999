/**
 * Numbered backups for workspace files.
 *
 * `items.txt` is backed up as `items.txt.1.backup`, `items.txt.2.backup`, ...
 * Numbers only grow; retention deletes the lowest numbers first.
 */

import { copyFile, readdir, readFile, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { IOError, PlotlineError, isErrnoException } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

export const DEFAULT_BACKUP_KEEP = 3;

/** A numbered backup on disk. */
export interface BackupFile {
  path: string;
  number: number;
}

export interface BackupResult {
  /** Backup holding the current content: the new one, or the duplicate that made it unnecessary. */
  path: string | null;
  created: boolean;
  pruned: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function assertKeep(keep: number): void {
  if (!Number.isInteger(keep) || keep < 0) {
    throw new PlotlineError(ExitCode.INVALID_INPUT, `Backup retention must be a non-negative integer, got ${keep}`);
  }
}

/**
 * List existing backups of a file, oldest (lowest number) first.
 */
export async function listBackups(filePath: string): Promise<BackupFile[]> {
  const dir = dirname(filePath);
  const pattern = new RegExp(`^${escapeRegExp(basename(filePath))}\\.(\\d+)\\.backup$`);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw new IOError(`Cannot list backups in ${dir}`, dir, { cause: err });
  }

  const backups: BackupFile[] = [];
  for (const entry of entries) {
    const match = pattern.exec(entry);
    if (match?.[1]) {
      backups.push({ path: join(dir, entry), number: parseInt(match[1], 10) });
    }
  }
  return backups.sort((a, b) => a.number - b.number);
}

/**
 * Delete all but the `keep` most recent backups of a file.
 * Returns the deleted paths.
 */
export async function pruneBackups(filePath: string, keep: number = DEFAULT_BACKUP_KEEP): Promise<string[]> {
  const doomed = await backupsBeyond(filePath, keep);
  for (const backup of doomed) {
    try {
      await unlink(backup);
    } catch (err) {
      throw new IOError(`Cannot delete backup ${backup}`, backup, { cause: err });
    }
  }
  return doomed;
}

async function backupsBeyond(filePath: string, keep: number): Promise<string[]> {
  assertKeep(keep);
  const backups = await listBackups(filePath);
  const excess = backups.length - keep;
  return excess > 0 ? backups.slice(0, excess).map((b) => b.path) : [];
}

/**
 * Copy a file to its next numbered backup, then prune to `keep`.
 *
 * Nothing is copied when the file is byte-identical to the most recent
 * backup; the result then points at that backup with `created: false`.
 */
export async function createBackup(filePath: string, keep: number = DEFAULT_BACKUP_KEEP): Promise<BackupResult> {
  assertKeep(keep);
  const log = getLogger('backup');

  let current: Buffer;
  try {
    current = await readFile(filePath);
  } catch (err) {
    throw new IOError(`Cannot back up ${filePath}: source file unreadable`, filePath, { cause: err });
  }

  const backups = await listBackups(filePath);
  const latest = backups[backups.length - 1];

  if (latest) {
    const latestContent = await readFile(latest.path);
    if (latestContent.equals(current)) {
      log.debug({ filePath, backup: latest.path }, 'Backup skipped, content matches latest');
      return { path: latest.path, created: false, pruned: await pruneBackups(filePath, keep) };
    }
  }

  const next = (latest?.number ?? 0) + 1;
  const backupPath = `${filePath}.${next}.backup`;
  try {
    await copyFile(filePath, backupPath);
  } catch (err) {
    throw new IOError(`Backup failed for ${filePath}`, backupPath, { cause: err });
  }
  log.debug({ filePath, backupPath }, 'Backup created');

  const pruned = await pruneBackups(filePath, keep);
  return { path: keep > 0 ? backupPath : null, created: true, pruned };
}

/**
 * Remove old backups of several files down to `keep` each.
 * With `dryRun` nothing is deleted and the would-be deletions are returned.
 */
export async function cleanBackups(
  filePaths: readonly string[],
  keep: number = DEFAULT_BACKUP_KEEP,
  options: { dryRun?: boolean } = {},
): Promise<string[]> {
  const removed: string[] = [];
  for (const filePath of filePaths) {
    if (options.dryRun) {
      removed.push(...(await backupsBeyond(filePath, keep)));
    } else {
      removed.push(...(await pruneBackups(filePath, keep)));
    }
  }
  return removed;
}
