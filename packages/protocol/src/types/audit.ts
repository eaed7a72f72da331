// Audit types - the persisted record of one entity mutation

import type { Timestamp } from './common.js';

/**
 * Kind of mutation an audit trail records.
 */
export const TrailType = {
  None: 'None',
  Create: 'Create',
  Update: 'Update',
  Delete: 'Delete',
} as const;

export type TrailType = (typeof TrailType)[keyof typeof TrailType];

export const TRAIL_TYPES: readonly TrailType[] = [
  TrailType.None,
  TrailType.Create,
  TrailType.Update,
  TrailType.Delete,
];

/**
 * Any value that survives a JSON round trip.
 */
export type ChangeValue =
  | null
  | boolean
  | number
  | string
  | ChangeValue[]
  | { [key: string]: ChangeValue };

/**
 * Column name -> value snapshot for one side of a change.
 */
export type ChangeMap = Record<string, ChangeValue>;

/**
 * Before/after value of a single changed column.
 */
export type ColumnChange = {
  column: string;
  oldValue: ChangeValue | undefined;
  newValue: ChangeValue | undefined;
};

/**
 * An AuditChangeSet is the immutable record written for one mutation.
 *
 * The old/new state is stored as two opaque text blobs. A null blob means
 * "no values" and is equivalent to an empty mapping, never to a missing record.
 */
export type AuditChangeSet = {
  id: string;

  /**
   * Name of the audited entity type, e.g. "Order"
   */
  entityName: string;

  /**
   * Primary key of the audited row, rendered as text
   */
  primaryKey: string | null;

  timestamp: Timestamp;

  trailType: TrailType;

  /**
   * Who performed the mutation, if known
   */
  userId: string | null;

  /**
   * Changed column names, in the order they were recorded
   */
  changedColumns: string[];

  oldValuesJson: string | null;
  newValuesJson: string | null;
};
