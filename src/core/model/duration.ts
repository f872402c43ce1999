/**
 * Compound duration arithmetic. Months and years are fixed-length
 * (30 and 365 days); there is no calendar awareness.
 */

import type { Duration, DurationPart } from '../../types/item.js';
import { UNIT_SECONDS } from './registry.js';

/** The zero duration. Written as `0s`. */
export function zeroDuration(): Duration {
  return { parts: [] };
}

export function isZeroDuration(duration: Duration): boolean {
  return totalSeconds(duration) === 0;
}

/** Sum of all parts in seconds. */
export function totalSeconds(duration: Duration): number {
  return duration.parts.reduce((sum, part) => sum + part.amount * UNIT_SECONDS[part.unit], 0);
}

/** Ordering by total length: negative, zero or positive. */
export function compareDurations(a: Duration, b: Duration): number {
  return totalSeconds(a) - totalSeconds(b);
}

/**
 * Add two durations. Amounts of a unit present in both are summed; units
 * keep the order in which they first appear.
 */
export function addDurations(a: Duration, b: Duration): Duration {
  const parts: DurationPart[] = a.parts.map((part) => ({ ...part }));
  for (const part of b.parts) {
    const existing = parts.find((p) => p.unit === part.unit);
    if (existing) {
      existing.amount += part.amount;
    } else {
      parts.push({ ...part });
    }
  }
  return { parts };
}

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/** Rewrite `1e-7` or `1.5e+21` as plain decimal digits. */
function expandExponent(text: string): string {
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;
  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Shortest decimal form of an amount, never in exponent notation. */
export function formatAmount(amount: number): string {
  return expandExponent(String(amount));
}

/** Notation form, e.g. `1w2d3.5h`; `0s` when there are no parts. */
export function formatDuration(duration: Duration): string {
  if (duration.parts.length === 0) return '0s';
  return duration.parts.map((part) => `${formatAmount(part.amount)}${part.unit}`).join('');
}
