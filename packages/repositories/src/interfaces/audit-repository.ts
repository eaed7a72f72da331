import type { AuditChangeSet, Timestamp, TrailType } from '@plinth/protocol';

/**
 * Filter for counting audit trails
 */
export type AuditTrailFilter = {
  entityName?: string;
  userId?: string;
  trailType?: TrailType;
};

/**
 * Repository interface for audit trails.
 *
 * Audit trails are append-only: a change set is written once and never
 * updated. The old/new value blobs are stored as opaque text; decoding them
 * is the runtime's job. Every list query returns the newest trail first.
 */
export interface AuditRepository {
  /**
   * Append a change set.
   * @throws if the change set is invalid or its id already exists
   */
  append(changeSet: AuditChangeSet): Promise<AuditChangeSet>;

  /**
   * Get a change set by ID
   * @returns AuditChangeSet or null if not found
   */
  get(id: string): Promise<AuditChangeSet | null>;

  /**
   * History of one row. A null primary key matches trails recorded without one.
   */
  getByEntity(entityName: string, primaryKey: string | null): Promise<AuditChangeSet[]>;

  getByUser(userId: string, limit?: number): Promise<AuditChangeSet[]>;

  /**
   * Trails recorded between two instants, both inclusive
   */
  getByDateRange(start: Timestamp, end: Timestamp): Promise<AuditChangeSet[]>;

  count(filter?: AuditTrailFilter): Promise<number>;
}
