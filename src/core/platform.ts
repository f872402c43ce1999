/**
 * Platform compatibility layer.
 *
 * Timestamp, checksum and random-name helpers the storage layer shares,
 * plus the Node.js version guard.
 */

import { createHash, randomBytes } from 'node:crypto';

/** Get ISO 8601 UTC timestamp without milliseconds. */
export function getIsoTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** Generate random hex characters (two per byte). */
export function generateRandomHex(bytes: number = 6): string {
  return randomBytes(bytes).toString('hex');
}

/** Compute SHA-256 checksum of a string. */
export function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Truncated SHA-256 used in banners and metadata. */
export function computeChecksum(data: string): string {
  return sha256(data).slice(0, 16);
}

/** Minimum required Node.js major version. */
export const MINIMUM_NODE_MAJOR = 20;

/** Get Node.js version info. */
export function getNodeVersionInfo(): { version: string; major: number; meetsMinimum: boolean } {
  const version = process.version.replace('v', '');
  const major = Number(version.split('.')[0] ?? 0);
  return { version, major, meetsMinimum: major >= MINIMUM_NODE_MAJOR };
}
