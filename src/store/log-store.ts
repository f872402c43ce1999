/**
 * Loading and saving log collections (JSON Lines, one entry per line).
 */

import type { LogEntry } from '../types/log.js';
import { ParseError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { LogCollection } from '../core/logs/collection.js';
import { parseLogEntry, serializeLogEntry } from '../core/logs/serializer.js';
import { logsBanner, type FileScope } from './banner.js';
import { safeReadFile, writeFiles, type FileWrite, type WriteFilesOptions, type WriteFilesResult } from './atomic.js';

async function loadLogFile(path: string, occlude: boolean, strict: boolean): Promise<LogEntry[]> {
  const content = await safeReadFile(path);
  if (content === null) return [];

  const log = getLogger('store');
  const entries: LogEntry[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) return;
    try {
      entries.push(parseLogEntry(trimmed, { occlude }));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      if (strict) {
        throw new ParseError(`Invalid log entry at ${path}:${index + 1} (${err.message})`, line, { cause: err });
      }
      log.warn({ path, line: index + 1, err: err.message }, 'Skipping malformed log line');
    }
  });
  return entries;
}

/** Load both log files into one collection. */
export async function loadLogs(
  includePath: string,
  occludePath: string,
  options: { strict?: boolean } = {},
): Promise<LogCollection> {
  const strict = options.strict ?? true;
  return new LogCollection([
    ...(await loadLogFile(includePath, false, strict)),
    ...(await loadLogFile(occludePath, true, strict)),
  ]);
}

function renderLogFile(path: string, scope: FileScope, entries: LogEntry[]): FileWrite {
  const lines = entries.map(serializeLogEntry);
  const content = [...logsBanner(scope, lines.join('\n')), ...lines].join('\n');
  return { path, content: `${content}\n` };
}

/** Contents of both log files for `logs`, without writing. */
export function renderLogFiles(includePath: string, occludePath: string, logs: LogCollection): FileWrite[] {
  return [
    renderLogFile(includePath, 'include', logs.included()),
    renderLogFile(occludePath, 'occlude', logs.occluded()),
  ];
}

/** Write both log files as one atomic batch. */
export async function saveLogs(
  includePath: string,
  occludePath: string,
  logs: LogCollection,
  options: WriteFilesOptions = {},
): Promise<WriteFilesResult> {
  return writeFiles(renderLogFiles(includePath, occludePath, logs), options);
}
