/**
 * CLI log / logs commands - session logs.
 */

import { Command } from 'commander';
import { ExitCode } from '../../types/exit-codes.js';
import { PlotlineError } from '../../core/errors.js';
import type { LogEntry } from '../../types/log.js';
import type { LogCollection } from '../../core/logs/collection.js';
import { includeLogs, occludeLogs, type LogOcclusionResult, type LogSelector } from '../../core/logs/occluder.js';
import { generateSessionTag, sessionSummary, type SessionSummary } from '../../core/logs/sessions.js';
import { cliOutput } from '../renderers/index.js';
import { toLogView, type SessionView } from '../renderers/logs.js';
import { commitLogs, handleCommandError, loadLogEntries, openWorkspace } from '../session.js';
import { optArray, optBool, optString, parseDate, parseTags, splitList } from '../options.js';

/** Session argument that starts a fresh, timestamped session. */
const NEW_SESSION = '-';

function parseMetadata(pairs: readonly string[]): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new PlotlineError(ExitCode.INVALID_INPUT, `Invalid metadata '${pair}'`, { fix: 'Use key=value' });
    }
    metadata[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return metadata;
}

/** Build an occlusion selector from --session, --tag/--all or --from/--to. */
function parseSelector(opts: Record<string, unknown>): LogSelector {
  const session = optString(opts, 'session');
  const tags = splitList(optString(opts, 'tag'));
  const from = optString(opts, 'from');
  const to = optString(opts, 'to');

  const given = [session !== undefined, tags.length > 0, from !== undefined || to !== undefined].filter(Boolean).length;
  if (given !== 1) {
    throw new PlotlineError(ExitCode.INVALID_INPUT, 'Select entries with exactly one of --session, --tag or --from/--to');
  }
  if (session !== undefined) return { session };
  if (tags.length > 0) return { tags, all: optBool(opts, 'all') };
  if (from === undefined || to === undefined) {
    throw new PlotlineError(ExitCode.INVALID_INPUT, '--from and --to must be given together');
  }
  return { from: parseDate(from, '--from'), to: parseDate(to, '--to') };
}

function toSessionView(summary: SessionSummary): SessionView {
  return {
    session: summary.session,
    entries: summary.entries,
    first: summary.first.toISOString(),
    last: summary.last.toISOString(),
    tags: summary.tags,
  };
}

function filterEntries(logs: LogCollection, opts: Record<string, unknown>): LogEntry[] {
  const session = optString(opts, 'session');
  const tags = splitList(optString(opts, 'tag'));
  const search = optString(opts, 'search');
  const occluded = optBool(opts, 'occluded');

  let entries = occluded ? logs.occluded() : logs.included();
  if (session !== undefined) entries = entries.filter((entry) => entry.session === session);
  if (tags.length > 0) {
    const tagged = new Set(logs.byTags(tags, { all: optBool(opts, 'all') }));
    entries = entries.filter((entry) => tagged.has(entry));
  }
  if (search !== undefined) {
    const matching = new Set(logs.search(search));
    entries = entries.filter((entry) => matching.has(entry));
  }
  return entries;
}

export function registerLogCommand(program: Command): void {
  program
    .command('log <session> <message>')
    .description(`Append a log entry to a session ('${NEW_SESSION}' starts a new session)`)
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .option('-m, --meta <pairs...>', 'Metadata as key=value')
    .action(async (session: string, message: string, opts: Record<string, unknown>) => {
      try {
        const tags = parseTags(optString(opts, 'tags'));
        const metadata = parseMetadata(optArray(opts, 'meta'));
        const ctx = await openWorkspace();
        const logs = await loadLogEntries(ctx);
        const entry = logs.create(session === NEW_SESSION ? generateSessionTag() : session, message, { tags, metadata });
        await commitLogs(ctx, logs);
        cliOutput({ entry: toLogView(entry) }, { command: 'log' });
      } catch (err) {
        handleCommandError(err, 'log');
      }
    });
}

export function registerLogsCommand(program: Command): void {
  const logs = program
    .command('logs')
    .description('List and manage session log entries')
    .enablePositionalOptions()
    .option('-s, --session <session>', 'Only entries of this session')
    .option('--tag <tags>', 'Only entries carrying any of these comma-separated tags')
    .option('--all', 'With --tag, require every tag')
    .option('--search <text>', 'Only entries whose message contains this text')
    .option('--occluded', 'List occluded entries instead of included ones')
    .action(async (opts: Record<string, unknown>) => {
      try {
        const collection = await loadLogEntries(await openWorkspace());
        const entries = filterEntries(collection, opts);
        cliOutput({ entries: entries.map(toLogView), total: collection.size }, { command: 'logs' });
      } catch (err) {
        handleCommandError(err, 'logs');
      }
    });

  logs
    .command('sessions')
    .description('Summarize every session')
    .action(async () => {
      try {
        const collection = await loadLogEntries(await openWorkspace());
        const sessions = collection
          .sessions()
          .map((session) => sessionSummary(collection, session))
          .filter((summary): summary is SessionSummary => summary !== null)
          .map(toSessionView);
        cliOutput({ sessions }, { command: 'logs sessions' });
      } catch (err) {
        handleCommandError(err, 'logs sessions');
      }
    });

  const registerOcclusion = (name: 'occlude' | 'include'): void => {
    const command = name === 'occlude' ? 'logs occlude' : 'logs include';
    logs
      .command(name)
      .description(name === 'occlude'
        ? 'Move matching entries to the occlude log file'
        : 'Move matching occluded entries back to the include log file')
      .option('-s, --session <session>', 'Entries of this session')
      .option('--tag <tags>', 'Entries carrying any of these comma-separated tags')
      .option('--all', 'With --tag, require every tag')
      .option('--from <date>', 'Entries at or after this ISO date')
      .option('--to <date>', 'Entries at or before this ISO date')
      .option('--dry-run', 'Count matching entries without making changes')
      .action(async (opts: Record<string, unknown>) => {
        try {
          const selector = parseSelector(opts);
          const dryRun = optBool(opts, 'dryRun');
          const ctx = await openWorkspace();
          const collection = await loadLogEntries(ctx);
          const result: LogOcclusionResult = name === 'occlude'
            ? occludeLogs(collection, selector, { dryRun })
            : includeLogs(collection, selector, { dryRun });
          if (!dryRun && result.affected.length > 0) await commitLogs(ctx, result.logs);
          cliOutput({ affected: result.affected.length, dryRun, occlude: name === 'occlude' }, { command });
        } catch (err) {
          handleCommandError(err, command);
        }
      });
  };
  registerOcclusion('occlude');
  registerOcclusion('include');
}
