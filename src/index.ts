/**
 * plotline - plain-text dependency graph planner.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type * from './types/item.js';
export type { LogEntry } from './types/log.js';
export type { PlotlineConfig } from './types/config.js';

// Errors
export {
  PlotlineError,
  ParseError,
  CycleDetectedError,
  GraphOperationError,
  ItemLookupError,
  GraphException,
  IOError,
} from './core/errors.js';

// Model
export * from './core/model/registry.js';
export {
  zeroDuration,
  totalSeconds,
  compareDurations,
  addDurations,
  formatDuration,
} from './core/model/duration.js';
export {
  createItem,
  cloneItem,
  updateItem,
  relationTargets,
  isValidItemId,
  isValidTag,
} from './core/model/item.js';
export { createLogEntry } from './core/model/log-entry.js';

// Notation
export * from './core/notation/index.js';

// Graph
export { ItemGraph, type RemoveItemOptions } from './core/graph/item-graph.js';
export { findCycle, strictAdjacency } from './core/graph/cycles.js';
export {
  occludeItems,
  occludeItemsByTags,
  includeItems,
  type OcclusionResult,
} from './core/graph/occlusion.js';

// Doctor
export * from './core/validation/doctor/index.js';

// Logs
export { LogCollection } from './core/logs/collection.js';
export { parseLogEntry, serializeLogEntry } from './core/logs/serializer.js';
export {
  occludeLogs,
  includeLogs,
  occludeBySession,
  occludeByTags,
  occludeByDateRange,
  type LogSelector,
  type LogOcclusionResult,
} from './core/logs/occluder.js';
export { generateSessionTag, sessionSummary, type SessionSummary } from './core/logs/sessions.js';

// Paths and config
export {
  findNearestWorkspace,
  getWorkspaceDir,
  getWorkspacePaths,
  normalizePath,
  isAbsolutePath,
  relativePath,
  sanitizeFilename,
  type WorkspacePaths,
  type PathPlatform,
} from './core/paths.js';
export { loadConfig, getConfigValue, setConfigValue } from './core/config.js';

// Storage
export * from './store/index.js';
