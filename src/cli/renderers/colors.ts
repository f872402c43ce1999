/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when the locale cannot show the notation glyphs.
 */
import {
  STATUS_SYMBOLS,
  type ItemStatus,
  type Priority,
} from '../../core/model/registry.js';

/** Whether the environment allows ANSI color escape codes. */
function detectColor(): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
}

/** Whether Unicode glyphs are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

export let BOLD = '';
export let DIM = '';
export let NC = '';  // reset
export let RED = '';
export let GREEN = '';
export let YELLOW = '';
export let BLUE = '';
export let MAGENTA = '';
export let CYAN = '';

function applyColors(enabled: boolean): void {
  const ansi = (code: string): string => (enabled ? code : '');
  BOLD = ansi('\x1b[1m');
  DIM = ansi('\x1b[2m');
  NC = ansi('\x1b[0m');
  RED = ansi('\x1b[0;31m');
  GREEN = ansi('\x1b[0;32m');
  YELLOW = ansi('\x1b[1;33m');
  BLUE = ansi('\x1b[0;34m');
  MAGENTA = ansi('\x1b[0;35m');
  CYAN = ansi('\x1b[0;36m');
}

applyColors(detectColor());

/**
 * Apply the `output.showColor` setting. Color stays off whenever the
 * environment rules it out.
 */
export function configureColors(showColor: boolean): void {
  applyColors(showColor && detectColor());
}

// ---------------------------------------------------------------------------
// Status symbols and colors
// ---------------------------------------------------------------------------

const STATUS_SYMBOLS_ASCII: Record<ItemStatus, string> = {
  NOT_STARTED: '[ ]',
  IN_PROGRESS: '[~]',
  BLOCKED: '[x]',
  COMPLETED: '[*]',
};

/** Map item status to a display symbol. */
export function statusSymbol(status: ItemStatus): string {
  return unicodeEnabled ? STATUS_SYMBOLS[status] : STATUS_SYMBOLS_ASCII[status];
}

/** Map item status to a color escape. */
export function statusColor(status: ItemStatus): string {
  switch (status) {
    case 'NOT_STARTED': return CYAN;
    case 'IN_PROGRESS': return GREEN;
    case 'BLOCKED':     return RED;
    case 'COMPLETED':   return DIM;
  }
}

/** Map item priority to a color escape. */
export function priorityColor(priority: Priority): string {
  switch (priority) {
    case 'CRITICAL': return RED;
    case 'HIGH':     return YELLOW;
    case 'MEDIUM':   return BLUE;
    case 'UNSURE':   return MAGENTA;
    case 'LOW':
    case 'LOWEST':   return DIM;
    case 'NEUTRAL':  return '';
  }
}

// ---------------------------------------------------------------------------
// Box drawing
// ---------------------------------------------------------------------------

/** Create a horizontal rule. */
export function hRule(width: number = 65): string {
  return (unicodeEnabled ? '─' : '-').repeat(width);
}

/** Format an ISO timestamp as YYYY-MM-DD HH:MM. */
export function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}
