/**
 * Duration notation: one or more `<number><unit>` pairs with no separator,
 * e.g. `3mo`, `1w2d`, `1.5h`.
 */

import type { Duration, DurationPart } from '../../types/item.js';
import { isDurationUnit } from '../model/registry.js';
import { Scanner } from './scanner.js';

const NUMBER_CHAR = /[0-9.]/;
const UNIT_CHAR = /[a-z]/;
const NUMBER = /^\d+(?:\.\d+)?$/;

/** Characters a duration may contain; anything else ends it. */
export function isDurationChar(ch: string): boolean {
  return NUMBER_CHAR.test(ch) || UNIT_CHAR.test(ch);
}

/**
 * Scan a duration at the scanner's position. Stops at the first character
 * that cannot belong to a duration (whitespace, `:`, `,`, `)`).
 */
export function scanDuration(scanner: Scanner): Duration {
  const parts: DurationPart[] = [];
  while (!scanner.done && isDurationChar(scanner.peek())) {
    const amountText = scanner.readWhile((ch) => NUMBER_CHAR.test(ch));
    if (!NUMBER.test(amountText)) {
      scanner.fail(amountText ? `Invalid duration amount '${amountText}'` : 'Expected a duration amount');
    }
    const unit = scanner.readWhile((ch) => UNIT_CHAR.test(ch));
    if (!unit) scanner.fail(`Missing duration unit after '${amountText}'`);
    if (!isDurationUnit(unit)) scanner.fail(`Invalid duration unit '${unit}'`);
    parts.push({ amount: Number(amountText), unit });
  }
  if (parts.length === 0) scanner.fail('Missing duration');

  const only = parts[0];
  if (parts.length === 1 && only && only.amount === 0 && only.unit === 's') {
    return { parts: [] };
  }
  return { parts };
}

/** Parse a complete duration string such as `2w3d`. */
export function parseDuration(text: string): Duration {
  const scanner = new Scanner(text.trim());
  const duration = scanDuration(scanner);
  if (!scanner.done) scanner.fail('Unexpected text after duration');
  return duration;
}

const UNIT_ALIASES: Record<string, string> = {
  sec: 's', secs: 's', second: 's', seconds: 's',
  m: 'min', mins: 'min', minute: 'min', minutes: 'min',
  hr: 'h', hrs: 'h', hour: 'h', hours: 'h',
  day: 'd', days: 'd',
  week: 'w', weeks: 'w',
  month: 'mo', months: 'mo',
  year: 'y', years: 'y', yr: 'y', yrs: 'y',
};

/**
 * Parse user-typed duration input. Accepts spelled-out units and spaces
 * (`2 days 3 hours`) on top of the notation form.
 */
export function parseDurationInput(text: string): Duration {
  const normalized = text
    .toLowerCase()
    .replace(/(\d+(?:\.\d+)?)\s*([a-z]+)/g, (_match, amount: string, unit: string) =>
      `${amount}${UNIT_ALIASES[unit] ?? unit}`)
    .replace(/\s+/g, '');
  return parseDuration(normalized);
}
