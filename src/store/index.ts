/**
 * Unified store interface for workspace data access.
 */

export { atomicWrite, atomicWriteJson, safeReadFile, writeFiles } from './atomic.js';
export type { FileWrite, WriteFilesOptions, WriteFilesResult } from './atomic.js';
export { createBackup, listBackups, pruneBackups, cleanBackups, DEFAULT_BACKUP_KEEP } from './backup.js';
export type { BackupFile, BackupResult } from './backup.js';
export { createBanner, itemsBanner, logsBanner, FORMAT_VERSION } from './banner.js';
export type { BannerOptions, FileScope } from './banner.js';
export {
  extractIncludeDirectives,
  parseIncludeDirectives,
  resolveIncludes,
  showIncludeStructure,
  formatIncludeTree,
} from './includes.js';
export type { IncludeNode, ResolvedFile } from './includes.js';
export { loadGraph, saveGraph, renderGraphFiles, parseItemLines } from './graph-store.js';
export type { LoadOptions } from './graph-store.js';
export { loadLogs, saveLogs, renderLogFiles } from './log-store.js';
export {
  initWorkspace,
  isWorkspaceInitialized,
  validateWorkspace,
  readMetadata,
  loadWorkspaceGraph,
  saveWorkspaceGraph,
  loadWorkspaceLogs,
  saveWorkspaceLogs,
  WorkspaceMetadataSchema,
} from './workspace.js';
export type { WorkspaceMetadata } from './workspace.js';
