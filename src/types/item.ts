/**
 * Item and time-constraint type definitions.
 * Enum unions come from the symbol registry.
 */

import type { DurationUnit, ItemStatus, Priority, RelationType } from '../core/model/registry.js';

export type { DurationUnit, ItemStatus, Priority, RelationType };

/** One `<amount><unit>` segment of a compound duration. */
export interface DurationPart {
  amount: number;
  unit: DurationUnit;
}

/** Compound duration. No parts means zero. */
export interface Duration {
  parts: DurationPart[];
}

/** What happens when a time constraint is missed. */
export type Consequence =
  | { kind: 'severe' }
  | { kind: 'warn' }
  | { kind: 'escalating'; rate: Priority };

export interface WindowConstraint {
  kind: 'window';
  duration: Duration;
  grace?: Duration;
  consequence: Consequence;
}

export interface DeadlineConstraint {
  kind: 'deadline';
  /** Calendar date, YYYY-MM-DD. */
  dueDate: string;
  grace?: Duration;
  consequence: Consequence;
}

export interface RecurringConstraint {
  kind: 'recurring';
  interval: Duration;
  grace?: Duration;
  consequence: Consequence;
  /** Missed occurrences accumulate instead of replacing each other. */
  stack: boolean;
}

export type TimeConstraint = WindowConstraint | DeadlineConstraint | RecurringConstraint;

/** Relation buckets. A present key always holds at least one id. */
export type Relations = Partial<Record<RelationType, string[]>>;

/** A node of the dependency graph. */
export interface Item {
  id: string;
  title: string;
  description: string;
  status: ItemStatus;
  priority: Priority;
  duration: Duration;
  charts: string[];
  tags: string[];
  relations: Relations;
  timeConstraints: TimeConstraint[];
  userComment?: string;
  autoComment?: string;
  occlude: boolean;
}

/** Fields replaceable through a copy-on-write update. */
export type ItemPatch = Partial<Omit<Item, 'id' | 'relations'>>;
