/**
 * Tests for log collections, the JSONL codec, occlusion and sessions.
 */

import { describe, it, expect } from 'vitest';
import { LogCollection } from '../collection.js';
import { parseLogEntry, serializeLogEntry } from '../serializer.js';
import { includeLogs, occludeByDateRange, occludeBySession, occludeByTags } from '../occluder.js';
import { generateSessionTag, sessionSummary } from '../sessions.js';
import { createLogEntry } from '../../model/log-entry.js';
import { ParseError } from '../../errors.js';

const at = (iso: string): Date => new Date(iso);

function sample(): LogCollection {
  const logs = new LogCollection();
  logs.create('s1', 'started parser', { tags: ['parser', 'work'], timestamp: at('2025-01-01T09:00:00.000Z') });
  logs.create('s1', 'fixed bug', { tags: ['bug'], timestamp: at('2025-01-01T10:00:00.000Z') });
  logs.create('s2', 'Wrote docs', { tags: ['docs', 'work'], timestamp: at('2025-01-02T09:00:00.000Z') });
  return logs;
}

describe('LogCollection', () => {
  it('keeps entries sorted by timestamp', () => {
    const logs = new LogCollection();
    logs.create('s', 'late', { timestamp: at('2025-01-02T00:00:00.000Z') });
    logs.create('s', 'early', { timestamp: at('2025-01-01T00:00:00.000Z') });
    logs.create('s', 'early too', { timestamp: at('2025-01-01T00:00:00.000Z') });
    expect(logs.all().map((entry) => entry.message)).toEqual(['early', 'early too', 'late']);
  });

  it('queries by session, tags, range and text', () => {
    const logs = sample();
    expect(logs.bySession('s1').map((e) => e.message)).toEqual(['started parser', 'fixed bug']);
    expect(logs.byTags(['bug', 'docs']).map((e) => e.message)).toEqual(['fixed bug', 'Wrote docs']);
    expect(logs.byTags(['parser', 'work'], { all: true }).map((e) => e.message)).toEqual(['started parser']);
    expect(logs.byDateRange(at('2025-01-01T09:30:00.000Z'), at('2025-01-02T09:00:00.000Z')).map((e) => e.message))
      .toEqual(['fixed bug', 'Wrote docs']);
    expect(logs.search('DOCS').map((e) => e.message)).toEqual(['Wrote docs']);
    expect(logs.sessions()).toEqual(['s1', 's2']);
  });
});

describe('log line codec', () => {
  it('writes tags sorted', () => {
    const entry = createLogEntry({
      session: 's1',
      message: 'hello',
      tags: ['b', 'a'],
      metadata: { k: 'v' },
      timestamp: at('2025-01-01T09:00:00.000Z'),
    });
    expect(serializeLogEntry(entry)).toBe(
      '{"s":"s1","t":"2025-01-01T09:00:00.000Z","m":"hello","tags":["a","b"],"meta":{"k":"v"}}',
    );
  });

  it('reads a line back', () => {
    const entry = parseLogEntry('{"s":"s1","t":"2025-01-01T09:00:00.000Z","m":"hello","tags":["x"],"meta":{}}', { occlude: true });
    expect(entry.session).toBe('s1');
    expect(entry.timestamp.toISOString()).toBe('2025-01-01T09:00:00.000Z');
    expect([...entry.tags]).toEqual(['x']);
    expect(entry.occlude).toBe(true);
  });

  it('defaults missing tags and metadata', () => {
    const entry = parseLogEntry('{"s":"s1","t":"2025-01-01T09:00:00.000Z","m":"hi"}');
    expect(entry.tags.size).toBe(0);
    expect(entry.metadata).toEqual({});
  });

  it('rejects malformed lines', () => {
    expect(() => parseLogEntry('not json')).toThrow(ParseError);
    expect(() => parseLogEntry('{"s":"s1","t":"yesterday","m":"hi"}')).toThrow('Invalid timestamp');
    expect(() => parseLogEntry('{"t":"2025-01-01T09:00:00.000Z","m":"hi"}')).toThrow(ParseError);
  });
});

describe('log occlusion', () => {
  it('occludes a session', () => {
    const result = occludeBySession(sample(), 's1');
    expect(result.affected.map((e) => e.message)).toEqual(['started parser', 'fixed bug']);
    expect(result.logs.included().map((e) => e.message)).toEqual(['Wrote docs']);
  });

  it('occludes by tag with any or all semantics', () => {
    expect(occludeByTags(sample(), ['work']).affected).toHaveLength(2);
    expect(occludeByTags(sample(), ['work', 'docs'], { all: true }).affected.map((e) => e.message)).toEqual(['Wrote docs']);
  });

  it('occludes an inclusive date range', () => {
    const result = occludeByDateRange(sample(), at('2025-01-01T10:00:00.000Z'), at('2025-01-02T09:00:00.000Z'));
    expect(result.affected.map((e) => e.message)).toEqual(['fixed bug', 'Wrote docs']);
  });

  it('leaves the collection alone on a dry run', () => {
    const logs = sample();
    const result = occludeBySession(logs, 's2', { dryRun: true });
    expect(result.logs).toBe(logs);
    expect(result.affected).toHaveLength(1);
    expect(logs.occluded()).toEqual([]);
  });

  it('includes occluded entries back', () => {
    const occluded = occludeBySession(sample(), 's1').logs;
    const result = includeLogs(occluded, { session: 's1' });
    expect(result.affected).toHaveLength(2);
    expect(result.logs.occluded()).toEqual([]);
  });
});

describe('sessions', () => {
  it('generates UTC session tags', () => {
    expect(generateSessionTag('session', at('2025-03-01T14:15:00.123Z'))).toBe('session_20250301T141500');
    expect(generateSessionTag('focus', at('2025-12-31T23:59:59.000Z'))).toBe('focus_20251231T235959');
  });

  it('summarizes a session', () => {
    expect(sessionSummary(sample(), 's1')).toEqual({
      session: 's1',
      entries: 2,
      first: at('2025-01-01T09:00:00.000Z'),
      last: at('2025-01-01T10:00:00.000Z'),
      tags: { parser: 1, work: 1, bug: 1 },
    });
    expect(sessionSummary(sample(), 'nope')).toBeNull();
  });
});
