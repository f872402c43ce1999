/**
 * Human-readable renderers for workspace and maintenance commands.
 *
 * Covers: init, doctor, includes, clean, config, version.
 */

import type { ConfigSource } from '../../types/config.js';
import type { DanglingReference, Issue } from '../../core/validation/doctor/index.js';
import { formatIncludeTree, type IncludeNode } from '../../store/includes.js';
import { BOLD, DIM, NC, RED, GREEN, YELLOW } from './colors.js';

export interface InitResult {
  dir: string;
  created: string[];
}

export interface DoctorResult {
  issues: Issue[];
  /** Present when --fix ran (or would run, on a dry run). */
  fixed?: DanglingReference[];
  dryRun: boolean;
}

export interface IncludesResult {
  tree: IncludeNode;
}

export interface CleanResult {
  removed: string[];
  keep: number;
  dryRun: boolean;
}

export interface ConfigGetResult {
  key: string;
  value: unknown;
  source: ConfigSource;
}

export interface ConfigSetResult {
  key: string;
  value: unknown;
  scope: 'global' | 'workspace';
}

export interface VersionResult {
  version: string;
}

export function renderInit(data: InitResult, quiet: boolean): string {
  if (quiet) return data.dir;
  if (data.created.length === 0) return `Workspace already initialized at ${data.dir}`;
  return `${GREEN}Initialized${NC} workspace at ${data.dir} (${data.created.length} file(s) created)`;
}

// ---------------------------------------------------------------------------
// doctor: graph diagnosis
// ---------------------------------------------------------------------------

export function renderDoctor(data: DoctorResult, quiet: boolean): string {
  if (quiet) return String(data.issues.length);

  const lines: string[] = [];
  if (data.issues.length === 0) {
    lines.push(`Graph Status: ${GREEN}${BOLD}HEALTHY${NC}`);
  } else {
    lines.push(`Graph Status: ${RED}${BOLD}${data.issues.length} ISSUE(S)${NC}`);
    lines.push('');
    for (const issue of data.issues) {
      const icon = issue.type === 'dangling_reference' ? `${RED}✗${NC}` : `${YELLOW}⚠${NC}`;
      lines.push(`  ${icon} ${issue.message}`);
      lines.push(`    ${DIM}Fix: ${issue.suggestedFix}${NC}`);
    }
  }

  if (data.fixed) {
    lines.push('');
    const verb = data.dryRun ? 'Would fix' : 'Fixed';
    lines.push(`${verb} ${data.fixed.length} dangling reference(s)`);
  }
  return lines.join('\n');
}

export function renderIncludes(data: IncludesResult, quiet: boolean): string {
  if (quiet) return data.tree.path;
  return formatIncludeTree(data.tree).join('\n');
}

export function renderClean(data: CleanResult, quiet: boolean): string {
  if (quiet) return data.removed.join('\n');
  if (data.removed.length === 0) return `No backups beyond the newest ${data.keep}.`;
  const verb = data.dryRun ? 'Would remove' : 'Removed';
  return [`${verb} ${data.removed.length} backup(s):`, ...data.removed.map((path) => `  ${DIM}${path}${NC}`)].join('\n');
}

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

export function renderConfigGet(data: ConfigGetResult, quiet: boolean): string {
  if (quiet) return formatValue(data.value);
  return `${BOLD}${data.key}${NC} = ${formatValue(data.value)} ${DIM}(${data.source})${NC}`;
}

export function renderConfigSet(data: ConfigSetResult, quiet: boolean): string {
  if (quiet) return '';
  return `${GREEN}Set${NC} ${data.key} = ${formatValue(data.value)} ${DIM}(${data.scope})${NC}`;
}

export function renderVersion(data: VersionResult): string {
  return data.version;
}
