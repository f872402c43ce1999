/**
 * Time-constraint notation:
 *
 *   window(D[:G],cons)
 *   due(YYYY-MM-DD[:G],cons)
 *   every(D[:G],cons[,stack])
 *
 * where `cons` is `severe`, `warn` or `escalate:<rate>` and `<rate>` is a
 * priority glyph (empty for NEUTRAL).
 */

import type { Consequence, Duration, Priority, TimeConstraint } from '../../types/item.js';
import { PRIORITY_SYMBOLS } from '../model/registry.js';
import { formatDuration } from '../model/duration.js';
import { Scanner } from './scanner.js';
import { scanDuration } from './duration.js';

/** Non-empty rate glyphs, longest first so `!!!` wins over `!`. */
const RATE_GLYPHS: Array<[string, Priority]> = [
  ['!!!', 'CRITICAL'],
  ['!!', 'HIGH'],
  ['!', 'MEDIUM'],
  [',,,', 'LOWEST'],
  ['...', 'LOW'],
  ['?', 'UNSURE'],
];

const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(text: string): boolean {
  const match = DATE.exec(text);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function scanGrace(scanner: Scanner): Duration | undefined {
  return scanner.consume(':') ? scanDuration(scanner) : undefined;
}

function scanConsequence(scanner: Scanner): Consequence {
  if (scanner.consume('severe')) return { kind: 'severe' };
  if (scanner.consume('warn')) return { kind: 'warn' };
  if (scanner.consume('escalate:')) {
    for (const [glyph, rate] of RATE_GLYPHS) {
      if (scanner.consume(glyph)) return { kind: 'escalating', rate };
    }
    return { kind: 'escalating', rate: 'NEUTRAL' };
  }
  return scanner.fail('Expected consequence severe, warn or escalate:<rate>');
}

/** Scan one constraint expression at the scanner's position. */
export function scanTimeConstraint(scanner: Scanner): TimeConstraint {
  const name = scanner.readWhile((ch) => /[a-z]/.test(ch));
  if (name !== 'window' && name !== 'due' && name !== 'every') {
    scanner.fail(name ? `Unknown time constraint '${name}'` : 'Expected a time constraint');
  }
  scanner.expect('(', `'(' after ${name}`);

  let constraint: TimeConstraint;
  if (name === 'due') {
    const dueDate = scanner.readWhile((ch) => /[0-9-]/.test(ch));
    if (!isCalendarDate(dueDate)) scanner.fail(`Invalid due date '${dueDate}'`);
    const grace = scanGrace(scanner);
    scanner.expect(',', "',' before consequence");
    constraint = { kind: 'deadline', dueDate, ...(grace && { grace }), consequence: scanConsequence(scanner) };
  } else if (name === 'window') {
    const duration = scanDuration(scanner);
    const grace = scanGrace(scanner);
    scanner.expect(',', "',' before consequence");
    constraint = { kind: 'window', duration, ...(grace && { grace }), consequence: scanConsequence(scanner) };
  } else {
    const interval = scanDuration(scanner);
    const grace = scanGrace(scanner);
    scanner.expect(',', "',' before consequence");
    const consequence = scanConsequence(scanner);
    const stack = scanner.consume(',stack');
    constraint = { kind: 'recurring', interval, ...(grace && { grace }), consequence, stack };
  }

  scanner.expect(')', `')' closing ${name}`);
  return constraint;
}

/** Parse a single constraint expression such as `due(2025-01-31,severe)`. */
export function parseTimeConstraint(text: string): TimeConstraint {
  const scanner = new Scanner(text.trim());
  const constraint = scanTimeConstraint(scanner);
  if (!scanner.done) scanner.fail('Unexpected text after time constraint');
  return constraint;
}

export function formatConsequence(consequence: Consequence): string {
  switch (consequence.kind) {
    case 'severe': return 'severe';
    case 'warn': return 'warn';
    case 'escalating': return `escalate:${PRIORITY_SYMBOLS[consequence.rate]}`;
  }
}

export function formatTimeConstraint(constraint: TimeConstraint): string {
  const grace = constraint.grace ? `:${formatDuration(constraint.grace)}` : '';
  const consequence = formatConsequence(constraint.consequence);
  switch (constraint.kind) {
    case 'window':
      return `window(${formatDuration(constraint.duration)}${grace},${consequence})`;
    case 'deadline':
      return `due(${constraint.dueDate}${grace},${consequence})`;
    case 'recurring':
      return `every(${formatDuration(constraint.interval)}${grace},${consequence}${constraint.stack ? ',stack' : ''})`;
  }
}
