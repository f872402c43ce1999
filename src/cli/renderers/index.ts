/**
 * Central output dispatch for CLI commands.
 *
 * Provides cliOutput() which replaces `console.log(formatSuccess(data))`.
 * Checks the resolved format (JSON/human/quiet) and dispatches to either
 * the JSON envelope (formatSuccess) or a human-readable renderer.
 *
 * Commands call:
 *   cliOutput(data, { command: 'show', message })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import type { PlotlineError } from '../../core/errors.js';

import {
  renderAdd, renderShow, renderList, renderStatus, renderRelate, renderUnrelate,
  renderInsert, renderRemove, renderOcclusion,
  type ItemResult, type ShowResult, type ListResult, type RelationResult,
  type InsertResult, type RemoveResult, type OcclusionChange,
} from './items.js';
import {
  renderInit, renderDoctor, renderIncludes, renderClean, renderConfigGet, renderConfigSet, renderVersion,
  type InitResult, type DoctorResult, type IncludesResult, type CleanResult,
  type ConfigGetResult, type ConfigSetResult, type VersionResult,
} from './system.js';
import {
  renderLogAdd, renderLogList, renderLogOcclusion, renderSessions,
  type LogAddResult, type LogListResult, type LogOcclusionChange, type SessionListResult,
} from './logs.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to its result shape and human renderer
// ---------------------------------------------------------------------------

/** Result payload of every command, keyed by command name. */
export interface CommandResults {
  'init': InitResult;
  'add': ItemResult;
  'show': ShowResult;
  'list': ListResult;
  'set-status': ItemResult;
  'relate': RelationResult;
  'unrelate': RelationResult;
  'insert': InsertResult;
  'remove': RemoveResult;
  'occlude': OcclusionChange;
  'include': OcclusionChange;
  'doctor': DoctorResult;
  'includes': IncludesResult;
  'clean': CleanResult;
  'log': LogAddResult;
  'logs': LogListResult;
  'logs occlude': LogOcclusionChange;
  'logs include': LogOcclusionChange;
  'logs sessions': SessionListResult;
  'config get': ConfigGetResult;
  'config set': ConfigSetResult;
  'version': VersionResult;
}

export type CommandName = keyof CommandResults;

type HumanRenderer<T> = (data: T, quiet: boolean) => string;

const renderers: { [K in CommandName]: HumanRenderer<CommandResults[K]> } = {
  'init': renderInit,
  'add': renderAdd,
  'show': renderShow,
  'list': renderList,
  'set-status': renderStatus,
  'relate': renderRelate,
  'unrelate': renderUnrelate,
  'insert': renderInsert,
  'remove': renderRemove,
  'occlude': renderOcclusion,
  'include': renderOcclusion,
  'doctor': renderDoctor,
  'includes': renderIncludes,
  'clean': renderClean,
  'log': renderLogAdd,
  'logs': renderLogList,
  'logs occlude': renderLogOcclusion,
  'logs include': renderLogOcclusion,
  'logs sessions': renderSessions,
  'config get': renderConfigGet,
  'config set': renderConfigSet,
  'version': renderVersion,
};

// ---------------------------------------------------------------------------
// Options for cliOutput
// ---------------------------------------------------------------------------

export interface CliOutputOptions<K extends CommandName> {
  /** Command name (used to pick the correct human renderer). */
  command: K;
  /** Optional success message for JSON envelope. */
  message?: string;
}

// ---------------------------------------------------------------------------
// Main output functions
// ---------------------------------------------------------------------------

/**
 * Render a command result in the resolved format, without printing it.
 * Human output may be empty in quiet mode.
 */
export function renderOutput<K extends CommandName>(data: CommandResults[K], opts: CliOutputOptions<K>): string {
  const ctx = getFormatContext();
  if (ctx.format === 'human') {
    const renderer: HumanRenderer<CommandResults[K]> = renderers[opts.command];
    return renderer(data, ctx.quiet);
  }
  return formatSuccess(data, opts.message, opts.command);
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<K extends CommandName>(data: CommandResults[K], opts: CliOutputOptions<K>): void {
  const text = renderOutput(data, opts);
  if (text) {
    console.log(text);
  }
}

/**
 * Output an error in the resolved format on stderr.
 * JSON mode prints the error envelope; human mode a plain message and fix.
 */
export function cliError(error: PlotlineError, command?: string): void {
  const ctx = getFormatContext();
  if (ctx.format === 'json') {
    console.error(formatError(error, command));
    return;
  }
  console.error(`Error: ${error.message} (${error.code})`);
  if (error.fix) {
    console.error(`  Fix: ${error.fix}`);
  }
}
