/**
 * Atomic file write operations.
 *
 * Single files go through write-file-atomic (temp file -> fsync -> rename).
 * Batches go through writeFiles(): every target is staged as a temp file in
 * its own directory first, and originals are replaced only once the whole
 * batch is staged. A failure at any step restores the originals.
 */

import writeFileAtomic from 'write-file-atomic';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { GraphException, IOError, errorMessage, isErrnoException } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { generateRandomHex } from '../core/platform.js';
import { ExitCode } from '../types/exit-codes.js';
import { createBackup, DEFAULT_BACKUP_KEEP } from './backup.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new IOError(`Atomic write failed: ${filePath}`, filePath, { cause: err });
  }
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number },
): Promise<void> {
  const json = JSON.stringify(data, null, options?.indent ?? 2) + '\n';
  await atomicWrite(filePath, json);
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    throw new IOError(`Failed to read: ${filePath}`, filePath, { cause: err });
  }
}

// ============================================================================
// Batch writes
// ============================================================================

/** One file of a batch. */
export interface FileWrite {
  path: string;
  content: string;
}

export interface WriteFilesOptions {
  /** Back up existing targets before replacing them (default true). */
  backup?: boolean;
  /** Backups retained per target. */
  keep?: number;
}

export interface WriteFilesResult {
  written: string[];
  /** Targets skipped because their content was already current. */
  unchanged: string[];
  backups: string[];
}

interface StagedWrite {
  path: string;
  tempPath: string;
  original: string | null;
}

/** Temp path in the same directory as the target so rename never crosses devices. */
function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${generateRandomHex(6)}.tmp`);
}

async function discardTemps(staged: StagedWrite[]): Promise<void> {
  const log = getLogger('store');
  for (const entry of staged) {
    try {
      await unlink(entry.tempPath);
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'ENOENT')) {
        log.error({ tempPath: entry.tempPath, err: errorMessage(err) }, 'Failed to remove temp file');
      }
    }
  }
}

async function restoreOriginals(replaced: StagedWrite[]): Promise<void> {
  const log = getLogger('store');
  for (const entry of replaced) {
    try {
      if (entry.original === null) {
        await unlink(entry.path);
      } else {
        await writeFile(entry.path, entry.original, 'utf8');
      }
    } catch (err) {
      log.error({ path: entry.path, err: errorMessage(err) }, 'Failed to restore original during rollback');
    }
  }
}

/**
 * Write several files as one all-or-nothing batch.
 *
 * 1. Targets whose current content already matches are skipped.
 * 2. Each remaining target is staged to a temp file beside it.
 * 3. Existing targets are backed up.
 * 4. Temps are renamed over the targets.
 *
 * If any step fails, staged temps are removed, targets replaced so far get
 * their original content back, and a GraphException is thrown.
 */
export async function writeFiles(
  files: readonly FileWrite[],
  options: WriteFilesOptions = {},
): Promise<WriteFilesResult> {
  const log = getLogger('store');
  const backupEnabled = options.backup ?? true;
  const keep = options.keep ?? DEFAULT_BACKUP_KEEP;
  const result: WriteFilesResult = { written: [], unchanged: [], backups: [] };
  const staged: StagedWrite[] = [];

  try {
    for (const file of files) {
      const original = await safeReadFile(file.path);
      if (original === file.content) {
        result.unchanged.push(file.path);
        continue;
      }
      await mkdir(dirname(file.path), { recursive: true });
      const entry: StagedWrite = { path: file.path, tempPath: tempPathFor(file.path), original };
      staged.push(entry);
      await writeFile(entry.tempPath, file.content, 'utf8');
    }

    if (backupEnabled) {
      for (const entry of staged) {
        if (entry.original === null) continue;
        const backup = await createBackup(entry.path, keep);
        if (backup.created && backup.path) result.backups.push(backup.path);
      }
    }
  } catch (err) {
    await discardTemps(staged);
    throw new GraphException(`Batch write failed before commit: ${errorMessage(err)}`, {
      code: ExitCode.WRITE_FAILED,
      cause: err,
    });
  }

  const replaced: StagedWrite[] = [];
  for (const entry of staged) {
    try {
      await rename(entry.tempPath, entry.path);
      replaced.push(entry);
    } catch (err) {
      await restoreOriginals(replaced);
      await discardTemps(staged.filter((s) => !replaced.includes(s)));
      throw new GraphException(`Batch write failed replacing ${entry.path}: ${errorMessage(err)}`, {
        code: ExitCode.WRITE_FAILED,
        cause: err,
      });
    }
  }

  result.written = replaced.map((entry) => entry.path);
  log.debug({ written: result.written, unchanged: result.unchanged, backups: result.backups }, 'Batch write committed');
  return result;
}
