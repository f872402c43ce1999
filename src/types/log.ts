/**
 * Log entry type definitions.
 */

/** A timestamped, tagged record. Identity is structural. */
export interface LogEntry {
  session: string;
  timestamp: Date;
  message: string;
  tags: ReadonlySet<string>;
  metadata: Record<string, string>;
  occlude: boolean;
}
