/**
 * Header banners written at the top of every workspace file.
 *
 * A banner is a `#`-bordered box regenerated on each save. It carries the
 * schema name, format version and a checksum of the body so that saving
 * unchanged content yields byte-identical files.
 */

import { computeChecksum } from '../core/platform.js';

export const FORMAT_VERSION = 1;

export interface BannerOptions {
  /** Spaces between the border and the text (default 5). */
  paddingH?: number;
  /** Empty rows above and below the text (default 1). */
  paddingV?: number;
}

/** Box `lines` in `#` characters, sized to the longest line. */
export function createBanner(lines: readonly string[], options: BannerOptions = {}): string[] {
  const paddingH = options.paddingH ?? 5;
  const paddingV = options.paddingV ?? 1;
  const width = Math.max(0, ...lines.map((line) => line.length));
  const inner = width + paddingH * 2;
  const pad = ' '.repeat(paddingH);

  const border = '#'.repeat(inner + 2);
  const blank = `#${' '.repeat(inner)}#`;
  const spacer = Array.from({ length: paddingV }, () => blank);

  return [
    border,
    ...spacer,
    ...lines.map((line) => `#${pad}${line.padEnd(width)}${pad}#`),
    ...spacer,
    border,
  ];
}

export type FileScope = 'include' | 'occlude';

function scopeLabel(scope: FileScope): string {
  return scope === 'include' ? 'active' : 'occluded';
}

/** Banner for an items file whose item lines are `body`. */
export function itemsBanner(scope: FileScope, body: string): string[] {
  return createBanner([
    `Plotline items (${scopeLabel(scope)})`,
    'Schema: plotline-items',
    `Format version: ${FORMAT_VERSION}`,
    `Checksum: ${computeChecksum(body)}`,
    '',
    'One item per line. Lines starting with # are ignored,',
    'except #include directives directly below this banner.',
  ]);
}

/** Banner for a JSONL log file whose entry lines are `body`. */
export function logsBanner(scope: FileScope, body: string): string[] {
  return createBanner([
    `Plotline logs (${scopeLabel(scope)})`,
    'Schema: plotline-logs',
    `Format version: ${FORMAT_VERSION}`,
    `Checksum: ${computeChecksum(body)}`,
  ]);
}
