/**
 * plotline error types with exit code integration.
 *
 * Every failure raised by the core is a PlotlineError; the CLI maps `code`
 * straight to the process exit status.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** Serialized form of a PlotlineError inside an error envelope. */
export interface ErrorDetails {
  code: ExitCode;
  name: string;
  message: string;
  fix?: string;
}

/**
 * Structured error class for plotline operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class PlotlineError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'PlotlineError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      name: getExitCodeName(this.code),
      message: this.message,
      ...(this.fix !== undefined && { fix: this.fix }),
    };
  }
}

/** Malformed item line, duration, constraint or log line. */
export class ParseError extends PlotlineError {
  /** The offending text. */
  readonly input: string;
  /** Zero-based column where parsing stopped, when known. */
  readonly column?: number;

  constructor(message: string, input: string, options?: { column?: number; cause?: unknown }) {
    const where = options?.column !== undefined ? ` at column ${options.column + 1}` : '';
    super(ExitCode.PARSE_ERROR, `${message}${where}: ${input}`, { cause: options?.cause });
    this.name = 'ParseError';
    this.input = input;
    this.column = options?.column;
  }
}

/** A mutation would close a cycle of strict edges. */
export class CycleDetectedError extends PlotlineError {
  /** Ids along the cycle, first id repeated at the end. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(ExitCode.CIRCULAR_REFERENCE, `Cycle detected: ${cycle.join(' -> ')}`, {
      fix: 'Remove one of the REQUIRES/ANYOF relations along the cycle',
    });
    this.name = 'CycleDetectedError';
    this.cycle = cycle;
  }
}

/** A mutation references an item that does not exist. */
export class GraphOperationError extends PlotlineError {
  constructor(message: string, options?: { code?: ExitCode; fix?: string }) {
    super(options?.code ?? ExitCode.NOT_FOUND, message, { fix: options?.fix });
    this.name = 'GraphOperationError';
  }
}

/** `findBySubstring` found nothing, or more than one item. */
export class ItemLookupError extends GraphOperationError {
  readonly query: string;
  readonly reason: 'not_found' | 'ambiguous';
  readonly matches: string[];

  constructor(query: string, matches: string[]) {
    const ambiguous = matches.length > 1;
    super(
      ambiguous
        ? `Ambiguous query '${query}' matches: ${matches.join(', ')}`
        : `No item matches '${query}'`,
      {
        code: ambiguous ? ExitCode.AMBIGUOUS_MATCH : ExitCode.NOT_FOUND,
        fix: ambiguous ? 'Use the exact item id' : undefined,
      },
    );
    this.name = 'ItemLookupError';
    this.query = query;
    this.reason = ambiguous ? 'ambiguous' : 'not_found';
    this.matches = matches;
  }
}

/** Storage-level structural failure: includes, workspace layout, batch writes. */
export class GraphException extends PlotlineError {
  constructor(message: string, options?: { code?: ExitCode; fix?: string; cause?: unknown }) {
    super(options?.code ?? ExitCode.GRAPH_ERROR, message, options);
    this.name = 'GraphException';
  }
}

/** Filesystem failure. */
export class IOError extends PlotlineError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(ExitCode.FILE_ERROR, message, { cause: options?.cause });
    this.name = 'IOError';
    this.path = path;
  }
}

/** Narrow an unknown thrown value to a Node.js errno error. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
