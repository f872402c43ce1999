/**
 * Item line parser.
 *
 *   status id<priority> duration "title" {charts} [tags] [>>> rel[targets]...] [@@@ constraint...] [# comment] [### autocomment]
 *
 * Recursive descent over a Scanner; each section has its own scan function.
 */

import type { Item, Relations, TimeConstraint } from '../../types/item.js';
import {
  priorityFromSymbol,
  relationFromSymbol,
  statusFromSymbol,
} from '../model/registry.js';
import { isValidItemId, isValidTag } from '../model/item.js';
import { Scanner } from './scanner.js';
import { scanDuration } from './duration.js';
import { scanTimeConstraint } from './constraint.js';

export const RELATIONS_MARKER = '>>>';
export const CONSTRAINTS_MARKER = '@@@';
export const AUTO_COMMENT_MARKER = '###';

export interface ParseOptions {
  /** Value of the `occlude` flag on the parsed item (default false). */
  occlude?: boolean;
}

const ID_CHAR = /[A-Za-z0-9_]/;
const TAG_START = /[a-z0-9_]/;
const WHITESPACE = /\s/;

function scanCharts(scanner: Scanner): string[] {
  scanner.expect('{', "'{' opening charts");
  const charts: string[] = [];
  scanner.skipWhitespace();
  if (scanner.consume('}')) return charts;
  for (;;) {
    scanner.skipWhitespace();
    const chart = scanner.readJsonString('chart name');
    if (chart !== '') charts.push(chart);
    scanner.skipWhitespace();
    if (scanner.consume(',')) continue;
    scanner.expect('}', "',' or '}' in charts");
    return charts;
  }
}

function scanTags(scanner: Scanner): string[] {
  const start = scanner.pos;
  const tags = scanner.readToken().split(',');
  for (const tag of tags) {
    if (!isValidTag(tag)) {
      scanner.pos = start;
      scanner.fail(`Invalid tag '${tag}' (lowercase letters, digits and underscores only)`);
    }
  }
  return tags;
}

function scanRelations(scanner: Scanner): Relations {
  const relations: Relations = {};
  for (;;) {
    const mark = scanner.pos;
    scanner.skipWhitespace();
    if (scanner.done || scanner.startsWith(CONSTRAINTS_MARKER) || scanner.startsWith('#')) {
      scanner.pos = mark;
      return relations;
    }
    const symbol = scanner.next();
    const type = relationFromSymbol(symbol);
    if (!type) {
      scanner.pos -= symbol.length;
      scanner.fail(`Unknown relation symbol '${symbol}'`);
    }
    scanner.expect('[', `'[' after relation symbol ${symbol}`);
    const body = scanner.readWhile((ch) => ch !== ']');
    scanner.expect(']', "']' closing relation targets");

    const bucket = relations[type] ?? [];
    for (const raw of body.split(',')) {
      const target = raw.trim();
      if (target === '') continue;
      if (!isValidItemId(target)) scanner.fail(`Invalid relation target '${target}'`);
      if (!bucket.includes(target)) bucket.push(target);
    }
    if (bucket.length > 0) relations[type] = bucket;
  }
}

function scanConstraints(scanner: Scanner): TimeConstraint[] {
  const constraints: TimeConstraint[] = [];
  for (;;) {
    const mark = scanner.pos;
    scanner.skipWhitespace();
    if (scanner.done || scanner.startsWith('#')) {
      scanner.pos = mark;
      return constraints;
    }
    constraints.push(scanTimeConstraint(scanner));
  }
}

function scanComments(scanner: Scanner): { userComment?: string; autoComment?: string } {
  const text = scanner.rest();
  let user: string;
  let auto: string | undefined;
  if (text.startsWith(AUTO_COMMENT_MARKER)) {
    user = '';
    auto = text.slice(AUTO_COMMENT_MARKER.length);
  } else {
    const body = text.slice(1);
    const split = /\s###/.exec(body);
    user = split ? body.slice(0, split.index) : body;
    auto = split ? body.slice(split.index + split[0].length) : undefined;
  }
  const userComment = user.trim();
  const autoComment = auto?.trim();
  return {
    ...(userComment && { userComment }),
    ...(autoComment && { autoComment }),
  };
}

/**
 * Parse one item line.
 * @throws ParseError on any structural mismatch
 */
export function parseItem(line: string, options: ParseOptions = {}): Item {
  const scanner: Scanner = new Scanner(line.trim());

  const statusSymbol = scanner.next();
  const status = statusFromSymbol(statusSymbol);
  if (!status) {
    scanner.pos = 0;
    scanner.fail(statusSymbol ? `Unknown status symbol '${statusSymbol}'` : 'Missing status');
  }
  scanner.requireWhitespace('item id');

  const id = scanner.readWhile((ch) => ID_CHAR.test(ch));
  if (!id) scanner.fail('Missing item id');
  const prioritySymbol = scanner.readToken();
  const priority = priorityFromSymbol(prioritySymbol);
  if (priority === undefined) {
    scanner.pos -= prioritySymbol.length;
    scanner.fail(`Unknown priority symbol '${prioritySymbol}'`);
  }
  scanner.requireWhitespace('duration');

  const duration = scanDuration(scanner);
  if (!scanner.done && !WHITESPACE.test(scanner.peek())) {
    scanner.fail('Unexpected character in duration');
  }
  scanner.requireWhitespace('title');

  const title = scanner.readJsonString('title');
  scanner.skipWhitespace();
  const charts = scanCharts(scanner);

  const item: Item = {
    id,
    title,
    description: '',
    status,
    priority,
    duration,
    charts,
    tags: [],
    relations: {},
    timeConstraints: [],
    occlude: options.occlude ?? false,
  };

  // Optional sections, each allowed once and in grammar order.
  let stage = 0;
  for (;;) {
    const gap = scanner.skipWhitespace();
    if (scanner.done) break;
    if (gap === 0) scanner.fail('Expected whitespace between sections');

    if (stage < 1 && TAG_START.test(scanner.peek())) {
      item.tags = scanTags(scanner);
      stage = 1;
    } else if (stage < 2 && scanner.consume(RELATIONS_MARKER)) {
      item.relations = scanRelations(scanner);
      stage = 2;
    } else if (stage < 3 && scanner.consume(CONSTRAINTS_MARKER)) {
      item.timeConstraints = scanConstraints(scanner);
      stage = 3;
    } else if (scanner.peek() === '#') {
      Object.assign(item, scanComments(scanner));
      break;
    } else {
      scanner.fail('Unexpected text');
    }
  }

  return item;
}

/** Whether a raw file line is a candidate item line (not blank, not a `#` line). */
export function isItemLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== '' && !trimmed.startsWith('#');
}
