/**
 * Path resolution for plotline workspaces.
 *
 * Environment variables:
 *   PLOTLINE_HOME - Global directory, also the fallback workspace (default: ~/.plotline)
 *   PLOTLINE_DIR  - Explicit workspace directory, absolute or relative to cwd
 */

import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, posix, resolve, win32 } from 'node:path';

/** Name of the workspace directory searched for from the working directory upwards. */
export const WORKSPACE_DIR_NAME = '.plotline';

/**
 * Get the global plotline home directory.
 * Respects PLOTLINE_HOME env var, defaults to ~/.plotline.
 */
export function getPlotlineHome(): string {
  return process.env['PLOTLINE_HOME'] ?? join(homedir(), WORKSPACE_DIR_NAME);
}

/** Path of the global config file. */
export function getGlobalConfigPath(): string {
  return join(getPlotlineHome(), 'config.json');
}

/**
 * Walk up from `startDir` looking for a workspace directory.
 * Returns its absolute path, or null once the filesystem root is passed.
 */
export function findNearestWorkspace(startDir: string = process.cwd()): string | null {
  let current = resolve(startDir);
  for (;;) {
    const candidate = join(current, WORKSPACE_DIR_NAME);
    if (existsSync(candidate) && statSync(candidate).isDirectory()) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Resolve the active workspace directory.
 * Order: PLOTLINE_DIR, nearest workspace above cwd, PLOTLINE_HOME.
 */
export function getWorkspaceDir(cwd?: string): string {
  const explicit = process.env['PLOTLINE_DIR'];
  if (explicit) {
    return isAbsolutePath(explicit) ? explicit : resolve(cwd ?? process.cwd(), explicit);
  }
  return findNearestWorkspace(cwd) ?? getPlotlineHome();
}

/** Every file of a workspace. */
export interface WorkspacePaths {
  dir: string;
  includeDir: string;
  occludeDir: string;
  items: string;
  occludeItems: string;
  metadata: string;
  occludeMetadata: string;
  logs: string;
  occludeLogs: string;
  config: string;
}

/** Lay out the workspace files under `dir`. */
export function getWorkspacePaths(dir: string): WorkspacePaths {
  const includeDir = join(dir, 'include');
  const occludeDir = join(dir, 'occlude');
  return {
    dir,
    includeDir,
    occludeDir,
    items: join(includeDir, 'items.txt'),
    occludeItems: join(occludeDir, 'items.txt'),
    metadata: join(includeDir, 'metadata.json'),
    occludeMetadata: join(occludeDir, 'metadata.json'),
    logs: join(includeDir, 'logs.jsonl'),
    occludeLogs: join(occludeDir, 'logs.jsonl'),
    config: join(dir, 'config.json'),
  };
}

/** Path of the workspace config file. */
export function getConfigPath(cwd?: string): string {
  return getWorkspacePaths(getWorkspaceDir(cwd)).config;
}

// ============================================================================
// Platform-aware path helpers
// ============================================================================

/** Path convention to apply. */
export type PathPlatform = 'posix' | 'win32';

/** Path convention of the running host. */
export function hostPathPlatform(): PathPlatform {
  return process.platform === 'win32' ? 'win32' : 'posix';
}

function pathApi(platform: PathPlatform): typeof posix {
  return platform === 'win32' ? win32 : posix;
}

/**
 * Normalize separators and `.`/`..` segments for a platform.
 * On win32 forward slashes become backslashes; on posix backslashes are kept.
 */
export function normalizePath(path: string, platform: PathPlatform = hostPathPlatform()): string {
  return pathApi(platform).normalize(path);
}

/**
 * Whether `path` is absolute under the platform's conventions.
 * win32 accepts drive-letter (`C:\`, `C:/`) and UNC (`\\server\share`) roots.
 */
export function isAbsolutePath(path: string, platform: PathPlatform = hostPathPlatform()): boolean {
  if (platform === 'win32') {
    return /^[A-Za-z]:[\\/]/.test(path) || path.startsWith('\\\\') || path.startsWith('//');
  }
  return path.startsWith('/');
}

/** Relative path from one directory to another, '.' when they are the same. */
export function relativePath(from: string, to: string, platform: PathPlatform = hostPathPlatform()): string {
  return pathApi(platform).relative(from, to) || '.';
}

/**
 * Make an arbitrary string safe as a file name by stripping reserved
 * characters (`<>:"/\|?*`) and control characters. Everything else is kept.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, '');
}

/**
 * Resolve `target` against the directory containing `fromFile`,
 * leaving absolute targets as they are.
 */
export function resolveFrom(fromFile: string, target: string): string {
  if (isAbsolutePath(target)) return normalizePath(target);
  return resolve(dirname(fromFile), target);
}
