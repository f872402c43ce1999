/**
 * JSON Lines codec for log entries:
 *
 *   {"s":"session_20250101T090000","t":"2025-01-01T09:00:00.000Z","m":"text","tags":["a","b"],"meta":{}}
 *
 * Tags are written sorted so equal entries serialize identically.
 */

import { z } from 'zod';
import type { LogEntry } from '../../types/log.js';
import { ParseError, errorMessage } from '../errors.js';
import { createLogEntry, sortedTags } from '../model/log-entry.js';

export const LogLineSchema = z.object({
  s: z.string(),
  t: z.string().refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' }),
  m: z.string(),
  tags: z.array(z.string()).default([]),
  meta: z.record(z.string()).default({}),
});

export type LogLine = z.infer<typeof LogLineSchema>;

export function serializeLogEntry(entry: LogEntry): string {
  const line: LogLine = {
    s: entry.session,
    t: entry.timestamp.toISOString(),
    m: entry.message,
    tags: sortedTags(entry),
    meta: entry.metadata,
  };
  return JSON.stringify(line);
}

/**
 * Parse one JSONL line.
 * @throws ParseError if the line is not JSON or does not match the schema
 */
export function parseLogEntry(line: string, options: { occlude?: boolean } = {}): LogEntry {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new ParseError(`Invalid log line JSON (${errorMessage(err)})`, line, { cause: err });
  }
  const result = LogLineSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || 'line'}: ${i.message}`).join('; ');
    throw new ParseError(`Invalid log entry (${detail})`, line);
  }
  const { s, t, m, tags, meta } = result.data;
  return createLogEntry({
    session: s,
    timestamp: new Date(t),
    message: m,
    tags,
    metadata: meta,
    occlude: options.occlude ?? false,
  });
}
