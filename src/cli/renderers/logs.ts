/**
 * Human-readable renderers for the log commands.
 */

import type { LogEntry } from '../../types/log.js';
import { sortedTags } from '../../core/model/log-entry.js';
import { DIM, NC, CYAN, GREEN, YELLOW, shortTimestamp } from './colors.js';

/** Serializable form of a log entry. */
export interface LogView {
  session: string;
  timestamp: string;
  message: string;
  tags: string[];
  metadata: Record<string, string>;
  occlude: boolean;
}

export interface LogAddResult {
  entry: LogView;
}

export interface LogListResult {
  entries: LogView[];
  total: number;
}

export interface LogOcclusionChange {
  affected: number;
  dryRun: boolean;
  occlude: boolean;
}

export function toLogView(entry: LogEntry): LogView {
  return {
    session: entry.session,
    timestamp: entry.timestamp.toISOString(),
    message: entry.message,
    tags: sortedTags(entry),
    metadata: { ...entry.metadata },
    occlude: entry.occlude,
  };
}

function logLine(entry: LogView): string {
  const tags = entry.tags.length > 0 ? ` ${DIM}[${entry.tags.join(', ')}]${NC}` : '';
  return `${DIM}${shortTimestamp(entry.timestamp)}${NC} ${CYAN}${entry.session}${NC} ${entry.message}${tags}`;
}

export function renderLogAdd(data: LogAddResult, quiet: boolean): string {
  if (quiet) return data.entry.session;
  return `${GREEN}Logged${NC} ${logLine(data.entry)}`;
}

export function renderLogList(data: LogListResult, quiet: boolean): string {
  if (quiet) return data.entries.map((entry) => entry.message).join('\n');
  if (data.entries.length === 0) return 'No log entries.';
  return [...data.entries.map(logLine), '', `${DIM}${data.entries.length} of ${data.total} entr(ies)${NC}`].join('\n');
}

export function renderLogOcclusion(data: LogOcclusionChange, quiet: boolean): string {
  if (quiet) return String(data.affected);
  const verb = data.occlude ? 'occluded' : 'included';
  if (data.affected === 0) return `Nothing ${verb}.`;
  return data.dryRun
    ? `${YELLOW}Would be ${verb}:${NC} ${data.affected} entr(ies)`
    : `${data.occlude ? 'Occluded' : 'Included'} ${data.affected} entr(ies)`;
}

/** Serializable form of a session summary. */
export interface SessionView {
  session: string;
  entries: number;
  first: string;
  last: string;
  tags: Record<string, number>;
}

export interface SessionListResult {
  sessions: SessionView[];
}

export function renderSessions(data: SessionListResult, quiet: boolean): string {
  if (quiet) return data.sessions.map((s) => s.session).join('\n');
  if (data.sessions.length === 0) return 'No sessions.';
  return data.sessions
    .map((s) => {
      const tags = Object.keys(s.tags).sort();
      const tagText = tags.length > 0 ? ` ${DIM}[${tags.join(', ')}]${NC}` : '';
      return `${CYAN}${s.session}${NC} ${s.entries} entr(ies), ${shortTimestamp(s.first)} to ${shortTimestamp(s.last)}${tagText}`;
    })
    .join('\n');
}
