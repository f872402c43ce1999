/**
 * Tests for workspace path resolution and platform path helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  findNearestWorkspace,
  getWorkspaceDir,
  getWorkspacePaths,
  isAbsolutePath,
  normalizePath,
  relativePath,
  resolveFrom,
  sanitizeFilename,
} from '../paths.js';

describe('workspace location', () => {
  let tempDir: string;
  const origHome = process.env['PLOTLINE_HOME'];
  const origDir = process.env['PLOTLINE_DIR'];

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'plotline-paths-test-'));
    delete process.env['PLOTLINE_DIR'];
    process.env['PLOTLINE_HOME'] = join(tempDir, 'home');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    if (origHome !== undefined) process.env['PLOTLINE_HOME'] = origHome;
    else delete process.env['PLOTLINE_HOME'];
    if (origDir !== undefined) process.env['PLOTLINE_DIR'] = origDir;
    else delete process.env['PLOTLINE_DIR'];
  });

  it('finds the nearest workspace walking up', async () => {
    await mkdir(join(tempDir, 'project', '.plotline'), { recursive: true });
    await mkdir(join(tempDir, 'project', 'src', 'deep'), { recursive: true });
    expect(findNearestWorkspace(join(tempDir, 'project', 'src', 'deep'))).toBe(join(tempDir, 'project', '.plotline'));
    expect(getWorkspaceDir(join(tempDir, 'project', 'src'))).toBe(join(tempDir, 'project', '.plotline'));
  });

  it('falls back to the home directory', async () => {
    await mkdir(join(tempDir, 'bare'), { recursive: true });
    // tmpdir itself may sit below a workspace on some hosts; only assert when it does not.
    if (findNearestWorkspace(join(tempDir, 'bare')) === null) {
      expect(getWorkspaceDir(join(tempDir, 'bare'))).toBe(join(tempDir, 'home'));
    }
  });

  it('prefers PLOTLINE_DIR, resolving relative values against cwd', async () => {
    await mkdir(join(tempDir, 'project', '.plotline'), { recursive: true });
    process.env['PLOTLINE_DIR'] = 'elsewhere';
    expect(getWorkspaceDir(join(tempDir, 'project'))).toBe(join(tempDir, 'project', 'elsewhere'));
    process.env['PLOTLINE_DIR'] = '/abs/ws';
    expect(getWorkspaceDir(join(tempDir, 'project'))).toBe('/abs/ws');
  });

  it('lays out the workspace files', () => {
    const paths = getWorkspacePaths('/w');
    expect(paths.items).toBe(join('/w', 'include', 'items.txt'));
    expect(paths.occludeLogs).toBe(join('/w', 'occlude', 'logs.jsonl'));
    expect(paths.config).toBe(join('/w', 'config.json'));
  });
});

describe('platform path helpers', () => {
  it('recognises absolute paths per platform', () => {
    expect(isAbsolutePath('/home/u', 'posix')).toBe(true);
    expect(isAbsolutePath('C:\\Users', 'posix')).toBe(false);
    expect(isAbsolutePath('C:\\Users', 'win32')).toBe(true);
    expect(isAbsolutePath('C:/Users', 'win32')).toBe(true);
    expect(isAbsolutePath('\\\\server\\share', 'win32')).toBe(true);
    expect(isAbsolutePath('notes\\a.txt', 'win32')).toBe(false);
  });

  it('normalizes separators and dot segments', () => {
    expect(normalizePath('a/./b/../c', 'posix')).toBe('a/c');
    expect(normalizePath('a/b/../c', 'win32')).toBe('a\\c');
  });

  it('returns a dot for identical directories', () => {
    expect(relativePath('/a/b', '/a/b', 'posix')).toBe('.');
    expect(relativePath('/a/b', '/a/c/d.txt', 'posix')).toBe('../c/d.txt');
  });

  it('strips reserved filename characters', () => {
    expect(sanitizeFilename('a<b>:c"d/e\\f|g?h*i\u0001j')).toBe('abcdefghij');
  });

  it('resolves include targets against the including file', () => {
    expect(resolveFrom('/w/include/items.txt', 'extra/more.txt')).toBe('/w/include/extra/more.txt');
    expect(resolveFrom('/w/include/items.txt', '/shared/base.txt')).toBe('/shared/base.txt');
  });
});
