import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';
import type { TrailType } from '@plinth/protocol';

/**
 * Audit trails table - one row per audited mutation.
 *
 * Design notes:
 * - Append-only: no updates or deletes in normal operation
 * - Old/new values are opaque JSON text, not JSONB, so blobs are stored
 *   byte for byte as the codec wrote them
 * - A null blob means "no values"
 */
export const auditTrails = pgTable(
  'audit_trails',
  {
    id: text('id').primaryKey(),
    entityName: text('entity_name').notNull(), // e.g., "Order"
    primaryKey: text('primary_key'),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    trailType: text('trail_type').$type<TrailType>().notNull(),
    userId: text('user_id'),
    changedColumns: text('changed_columns').array().notNull(),
    oldValues: text('old_values'),
    newValues: text('new_values'),
  },
  (table) => [
    index('audit_trails_entity_idx').on(table.entityName, table.primaryKey),
    index('audit_trails_user_idx').on(table.userId),
    index('audit_trails_timestamp_idx').on(table.timestamp),
  ]
);

export type AuditTrailRow = typeof auditTrails.$inferSelect;
export type NewAuditTrailRow = typeof auditTrails.$inferInsert;
