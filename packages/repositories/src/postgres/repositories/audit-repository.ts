import { eq, and, gte, lte, desc, isNull, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { parseAuditChangeSet } from '@plinth/protocol';
import type { AuditChangeSet, Timestamp } from '@plinth/protocol';
import type { Database } from '../db.js';
import { auditTrails } from '../schema/index.js';
import type { AuditRepository, AuditTrailFilter } from '../../interfaces/index.js';
import { changeSetToRow, rowToChangeSet } from './audit-mappers.js';

export class PgAuditRepository implements AuditRepository {
  constructor(private db: Database) {}

  async append(changeSet: AuditChangeSet): Promise<AuditChangeSet> {
    const [row] = await this.db
      .insert(auditTrails)
      .values(changeSetToRow(parseAuditChangeSet(changeSet)))
      .returning();

    return rowToChangeSet(row);
  }

  async get(id: string): Promise<AuditChangeSet | null> {
    const [row] = await this.db.select().from(auditTrails).where(eq(auditTrails.id, id));

    return row ? rowToChangeSet(row) : null;
  }

  async getByEntity(entityName: string, primaryKey: string | null): Promise<AuditChangeSet[]> {
    const rows = await this.db
      .select()
      .from(auditTrails)
      .where(
        and(
          eq(auditTrails.entityName, entityName),
          primaryKey === null ? isNull(auditTrails.primaryKey) : eq(auditTrails.primaryKey, primaryKey)
        )
      )
      .orderBy(desc(auditTrails.timestamp));

    return rows.map(rowToChangeSet);
  }

  async getByUser(userId: string, limit?: number): Promise<AuditChangeSet[]> {
    const query = this.db
      .select()
      .from(auditTrails)
      .where(eq(auditTrails.userId, userId))
      .orderBy(desc(auditTrails.timestamp));

    const rows = limit !== undefined ? await query.limit(limit) : await query;
    return rows.map(rowToChangeSet);
  }

  async getByDateRange(start: Timestamp, end: Timestamp): Promise<AuditChangeSet[]> {
    const rows = await this.db
      .select()
      .from(auditTrails)
      .where(and(gte(auditTrails.timestamp, new Date(start)), lte(auditTrails.timestamp, new Date(end))))
      .orderBy(desc(auditTrails.timestamp));

    return rows.map(rowToChangeSet);
  }

  async count(filter: AuditTrailFilter = {}): Promise<number> {
    const conditions: SQL[] = [];

    if (filter.entityName) {
      conditions.push(eq(auditTrails.entityName, filter.entityName));
    }

    if (filter.userId) {
      conditions.push(eq(auditTrails.userId, filter.userId));
    }

    if (filter.trailType) {
      conditions.push(eq(auditTrails.trailType, filter.trailType));
    }

    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(auditTrails)
      .where(and(...conditions));

    return Number(result?.count ?? 0);
  }
}
