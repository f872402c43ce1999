/**
 * Loading and saving item graphs.
 *
 * A graph lives in two files sharing one notation: the include file
 * (active items) and the occlude file (archived items, loaded with
 * `occlude: true`). Each may pull in further files through `#include`.
 */

import type { Item } from '../types/item.js';
import { ParseError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ItemGraph } from '../core/graph/item-graph.js';
import { isItemLine, parseItem } from '../core/notation/parser.js';
import { serializeItem } from '../core/notation/serializer.js';
import { itemsBanner, type FileScope } from './banner.js';
import { extractIncludeDirectives, resolveIncludes } from './includes.js';
import { safeReadFile, writeFiles, type FileWrite, type WriteFilesOptions, type WriteFilesResult } from './atomic.js';

export interface LoadOptions {
  /** Abort on a malformed item line (default) instead of skipping it with a warning. */
  strict?: boolean;
}

/**
 * Parse every item line of a file's content. Banner, comment, directive
 * and blank lines are skipped.
 */
export function parseItemLines(
  content: string,
  source: string,
  options: { occlude?: boolean; strict?: boolean } = {},
): Item[] {
  const log = getLogger('store');
  const items: Item[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (!isItemLine(line)) return;
    try {
      items.push(parseItem(line, { occlude: options.occlude }));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      if (options.strict ?? true) {
        throw new ParseError(`Invalid item at ${source}:${index + 1} (${err.message})`, line, {
          column: err.column,
          cause: err,
        });
      }
      log.warn({ source, line: index + 1, err: err.message }, 'Skipping malformed item line');
    }
  });
  return items;
}

/** Items of one top-level file and everything it includes. A missing file holds none. */
async function loadItemFile(path: string, occlude: boolean, strict: boolean): Promise<Item[]> {
  if ((await safeReadFile(path)) === null) return [];
  const items: Item[] = [];
  for (const file of await resolveIncludes(path)) {
    items.push(...parseItemLines(file.content, file.path, { occlude, strict }));
  }
  return items;
}

/**
 * Load the graph held by an include/occlude file pair.
 * Occluded items win over included ones with the same id.
 *
 * @throws GraphException on a missing or circular include
 * @throws ParseError on a malformed line when `strict`
 */
export async function loadGraph(
  includePath: string,
  occludePath: string,
  options: LoadOptions = {},
): Promise<ItemGraph> {
  const strict = options.strict ?? true;
  const included = await loadItemFile(includePath, false, strict);
  const occluded = await loadItemFile(occludePath, true, strict);
  getLogger('store').debug({ included: included.length, occluded: occluded.length }, 'Graph loaded');
  return new ItemGraph([...included, ...occluded]);
}

/**
 * Serialized lines of the items a file inherits through its includes, by id.
 */
async function inheritedLines(path: string, strict: boolean): Promise<Map<string, string>> {
  const lines = new Map<string, string>();
  if ((await safeReadFile(path)) === null) return lines;
  const files = await resolveIncludes(path);
  for (const file of files.slice(0, -1)) {
    for (const item of parseItemLines(file.content, file.path, { strict })) {
      lines.set(item.id, serializeItem(item));
    }
  }
  return lines;
}

async function renderItemFile(path: string, scope: FileScope, items: Item[], strict: boolean): Promise<FileWrite> {
  const existing = await safeReadFile(path);
  const directives = existing === null ? [] : extractIncludeDirectives(existing);
  const inherited = await inheritedLines(path, strict);

  const lines = items
    .map((item) => ({ id: item.id, line: serializeItem(item) }))
    .filter(({ id, line }) => inherited.get(id) !== line)
    .map(({ line }) => line);

  const content = [
    ...itemsBanner(scope, lines.join('\n')),
    ...directives.map((target) => `#include ${target}`),
    ...lines,
  ].join('\n');
  return { path, content: `${content}\n` };
}

/**
 * Contents of the include and occlude files for `graph`, without writing.
 *
 * Items appear in topological order. A file's own `#include` directives are
 * kept, and an item already defined identically by an included file is not
 * repeated.
 *
 * @throws CycleDetectedError if the graph's strict edges are cyclic
 */
export async function renderGraphFiles(
  includePath: string,
  occludePath: string,
  graph: ItemGraph,
  options: LoadOptions = {},
): Promise<FileWrite[]> {
  const strict = options.strict ?? true;
  const ordered = graph.topologicalSort();
  return [
    await renderItemFile(includePath, 'include', ordered.filter((item) => !item.occlude), strict),
    await renderItemFile(occludePath, 'occlude', ordered.filter((item) => item.occlude), strict),
  ];
}

/**
 * Write `graph` to its include/occlude file pair as one atomic batch,
 * backing up the files it replaces.
 */
export async function saveGraph(
  includePath: string,
  occludePath: string,
  graph: ItemGraph,
  options: LoadOptions & WriteFilesOptions = {},
): Promise<WriteFilesResult> {
  const files = await renderGraphFiles(includePath, occludePath, graph, options);
  return writeFiles(files, options);
}
