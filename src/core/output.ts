/**
 * JSON output envelopes for the CLI.
 *
 * Every command prints exactly one envelope on stdout in JSON mode:
 *   { success: true, result, message?, _meta }
 *   { success: false, error: { code, name, message, fix? }, _meta }
 */

import type { ErrorDetails, PlotlineError } from './errors.js';
import { getIsoTimestamp } from './platform.js';

/** Envelope metadata. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

export type { ErrorDetails };

export interface ErrorEnvelope {
  success: false;
  error: ErrorDetails;
  _meta: EnvelopeMeta;
}

export type Envelope<T> = SuccessEnvelope<T> | ErrorEnvelope;

function createMeta(operation: string): EnvelopeMeta {
  return { operation, timestamp: getIsoTimestamp() };
}

/** Build a success envelope. */
export function successEnvelope<T>(data: T, message?: string, operation: string = 'cli.output'): SuccessEnvelope<T> {
  return {
    success: true,
    result: data,
    ...(message !== undefined && { message }),
    _meta: createMeta(operation),
  };
}

/** Build an error envelope. */
export function errorEnvelope(error: PlotlineError, operation: string = 'cli.output'): ErrorEnvelope {
  return {
    success: false,
    error: error.toJSON(),
    _meta: createMeta(operation),
  };
}

/** Format a successful result as a JSON envelope string. */
export function formatSuccess<T>(data: T, message?: string, operation?: string): string {
  return JSON.stringify(successEnvelope(data, message, operation));
}

/** Format an error as a JSON envelope string. */
export function formatError(error: PlotlineError, operation?: string): string {
  return JSON.stringify(errorEnvelope(error, operation));
}
