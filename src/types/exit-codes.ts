/**
 * plotline exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  CONFIG_ERROR = 8,

  // === NOTATION ERRORS (10-13) ===
  PARSE_ERROR = 10,

  // === GRAPH ERRORS (14-19) ===
  CIRCULAR_REFERENCE = 14,
  AMBIGUOUS_MATCH = 15,
  ID_COLLISION = 16,

  // === STORAGE ERRORS (20-29) ===
  GRAPH_ERROR = 20,
  WORKSPACE_NOT_INITIALIZED = 21,
  CIRCULAR_INCLUDE = 22,
  INCLUDE_NOT_FOUND = 23,
  WRITE_FAILED = 24,

  // === SPECIAL CODES (100+) - NOT errors ===
  CANCELLED = 103,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
