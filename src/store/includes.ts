/**
 * `#include <path>` directives.
 *
 * Directives sit at the top of an items file (after the banner, before the
 * first item line). Paths are relative to the including file's directory
 * unless absolute. Resolution is recursive; a missing file or a cycle
 * aborts the load.
 */

import { dirname, resolve } from 'node:path';
import { ExitCode } from '../types/exit-codes.js';
import { GraphException } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { relativePath, resolveFrom } from '../core/paths.js';
import { isItemLine } from '../core/notation/parser.js';
import { safeReadFile } from './atomic.js';

const INCLUDE_DIRECTIVE = /^#include\s+(.+?)\s*$/;

/**
 * Raw directive paths of a file's content, in order.
 * Directives after the first item line are ignored.
 */
export function extractIncludeDirectives(content: string): string[] {
  const paths: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    if (isItemLine(line)) break;
    const match = INCLUDE_DIRECTIVE.exec(line.trim());
    if (match?.[1]) paths.push(match[1]);
  }
  return paths;
}

/**
 * Absolute paths a file includes directly. A missing file includes nothing.
 */
export async function parseIncludeDirectives(filePath: string): Promise<string[]> {
  const content = await safeReadFile(filePath);
  if (content === null) return [];
  return extractIncludeDirectives(content).map((target) => resolveFrom(filePath, target));
}

/** A file taking part in a load, with its content. */
export interface ResolvedFile {
  path: string;
  content: string;
}

/**
 * Read `rootPath` and everything it includes, recursively.
 *
 * Files come back dependencies first: an included file precedes the file
 * including it, so later definitions of an id override earlier ones. A file
 * reached twice through different routes is read once.
 *
 * @throws GraphException on a missing file or a circular include
 */
export async function resolveIncludes(rootPath: string): Promise<ResolvedFile[]> {
  const log = getLogger('includes');
  const ordered: ResolvedFile[] = [];
  const done = new Set<string>();

  const visit = async (path: string, chain: string[], from?: string): Promise<void> => {
    if (chain.includes(path)) {
      const cycle = [...chain.slice(chain.indexOf(path)), path];
      throw new GraphException(`Circular include: ${cycle.join(' -> ')}`, {
        code: ExitCode.CIRCULAR_INCLUDE,
        fix: 'Remove one of the #include directives along the cycle',
      });
    }
    if (done.has(path)) return;

    const content = await safeReadFile(path);
    if (content === null) {
      throw new GraphException(
        from ? `Included file not found: ${path} (included from ${from})` : `File not found: ${path}`,
        { code: ExitCode.INCLUDE_NOT_FOUND },
      );
    }

    for (const target of extractIncludeDirectives(content)) {
      await visit(resolveFrom(path, target), [...chain, path], path);
    }
    done.add(path);
    ordered.push({ path, content });
  };

  await visit(resolve(rootPath), []);
  log.debug({ rootPath, files: ordered.length }, 'Includes resolved');
  return ordered;
}

// ============================================================================
// Structure display
// ============================================================================

export interface IncludeNode {
  path: string;
  exists: boolean;
  /** The path already appears higher up this branch. */
  circular: boolean;
  children: IncludeNode[];
}

/**
 * Include tree rooted at `filePath`. Unlike resolveIncludes this never
 * throws for missing or circular files; it marks them instead.
 */
export async function showIncludeStructure(
  filePath: string,
  options: { recursive?: boolean } = {},
): Promise<IncludeNode> {
  const recursive = options.recursive ?? true;

  const build = async (path: string, chain: string[], depth: number): Promise<IncludeNode> => {
    if (chain.includes(path)) {
      return { path, exists: true, circular: true, children: [] };
    }
    const content = await safeReadFile(path);
    if (content === null) {
      return { path, exists: false, circular: false, children: [] };
    }
    const children: IncludeNode[] = [];
    if (depth === 0 || recursive) {
      for (const target of extractIncludeDirectives(content)) {
        children.push(await build(resolveFrom(path, target), [...chain, path], depth + 1));
      }
    }
    return { path, exists: true, circular: false, children };
  };

  return build(resolve(filePath), [], 0);
}

/** Render an include tree as indented lines, paths relative to the root's directory. */
export function formatIncludeTree(root: IncludeNode): string[] {
  const base = dirname(root.path);
  const label = (node: IncludeNode): string => {
    const marks = [!node.exists && 'missing', node.circular && 'circular'].filter(Boolean);
    const shown = node === root ? node.path : relativePath(base, node.path);
    return marks.length > 0 ? `${shown} (${marks.join(', ')})` : shown;
  };

  const lines = [label(root)];
  const walk = (node: IncludeNode, prefix: string): void => {
    node.children.forEach((child, index) => {
      const last = index === node.children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${label(child)}`);
      walk(child, `${prefix}${last ? '    ' : '│   '}`);
    });
  };
  walk(root, '');
  return lines;
}
