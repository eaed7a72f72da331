// Fluent construction of audit trails

import type { EntityId } from '@plinth/protocol';
import { TrailType, auditChangeSetDraftSchema } from '@plinth/protocol';
import { ValidationError } from '../errors.js';
import type { DomainRuntime } from '../runtime.js';
import { defaultRuntime } from '../runtime.js';
import { captureChanges } from './capture.js';
import type { EncodedChangeSet } from './change-set-codec.js';
import { AuditTrail } from './trail.js';

type ColumnValues = Readonly<Record<string, unknown>> | null | undefined;

/**
 * Builds a validated, transient AuditTrail.
 *
 * Usage:
 * ```ts
 * const trail = TrailBuilder.forUpdate('Order', 42, { Price: 50 }, { Price: 99.99 })
 *   .withUserId('user-7')
 *   .build();
 * ```
 */
export class TrailBuilder {
  private trailType: TrailType = TrailType.None;
  private entityName = '';
  private primaryKey: string | null = null;
  private timestamp: Date | null = null;
  private userId: string | null = null;
  private changedColumns: string[] = [];
  private encoded: EncodedChangeSet | null = null;

  constructor(private readonly runtime: DomainRuntime = defaultRuntime) {}

  static forCreation(entityName: string, primaryKey: EntityId | null, values: ColumnValues): TrailBuilder {
    return new TrailBuilder()
      .withTrailType(TrailType.Create)
      .withEntity(entityName, primaryKey)
      .withValues(null, values);
  }

  static forUpdate(
    entityName: string,
    primaryKey: EntityId | null,
    oldValues: ColumnValues,
    newValues: ColumnValues
  ): TrailBuilder {
    return new TrailBuilder()
      .withTrailType(TrailType.Update)
      .withEntity(entityName, primaryKey)
      .withValues(oldValues, newValues);
  }

  static forDeletion(entityName: string, primaryKey: EntityId | null, values: ColumnValues): TrailBuilder {
    return new TrailBuilder()
      .withTrailType(TrailType.Delete)
      .withEntity(entityName, primaryKey)
      .withValues(values, null);
  }

  withTrailType(trailType: TrailType): this {
    this.trailType = trailType;
    return this;
  }

  withEntity(entityName: string, primaryKey: EntityId | null = null): this {
    this.entityName = entityName;
    this.primaryKey = primaryKey === null ? null : String(primaryKey);
    return this;
  }

  withTimestamp(timestamp: Date): this {
    this.timestamp = timestamp;
    return this;
  }

  withUserId(userId: string | null): this {
    this.userId = userId;
    return this;
  }

  withValues(oldValues: ColumnValues, newValues: ColumnValues): this {
    return this.applyEncoded(this.runtime.codec.writeChanges(oldValues, newValues));
  }

  withValuesFromSpan(
    columns: readonly string[],
    oldValues: readonly unknown[],
    newValues: readonly unknown[]
  ): this {
    return this.applyEncoded(this.runtime.codec.writeChangesFromSpan(columns, oldValues, newValues));
  }

  /**
   * Use pre-encoded blobs. Changed columns are left as they are.
   */
  withValuesFromJson(oldValuesJson: string | null, newValuesJson: string | null): this {
    this.encoded = this.runtime.codec.writeChangesRaw(oldValuesJson, newValuesJson);
    return this;
  }

  withChangedColumns(columns: readonly string[]): this {
    this.changedColumns = [...columns];
    return this;
  }

  addChangedColumn(column: string): this {
    if (!this.changedColumns.includes(column)) {
      this.changedColumns.push(column);
    }
    return this;
  }

  /**
   * Diff two snapshots and take trail type, columns and values from the result.
   */
  fromSnapshots(before: object | null | undefined, after: object | null | undefined): this {
    const captured = captureChanges(before, after, { runtime: this.runtime });
    this.trailType = captured.trailType;
    return this.applyEncoded(captured);
  }

  /**
   * @throws ValidationError if the entity name is missing or the timestamp is invalid
   */
  build(): AuditTrail {
    const timestamp = this.timestamp ?? new Date();
    if (Number.isNaN(timestamp.getTime())) {
      throw new ValidationError('timestamp must be a valid date', { field: 'timestamp' });
    }

    const result = auditChangeSetDraftSchema.safeParse({
      entityName: this.entityName,
      primaryKey: this.primaryKey,
      timestamp: timestamp.toISOString(),
      trailType: this.trailType,
      userId: this.userId,
      changedColumns: this.changedColumns,
      oldValuesJson: this.encoded?.oldValuesJson ?? null,
      newValuesJson: this.encoded?.newValuesJson ?? null,
    });

    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      const [first] = result.error.issues;
      throw new ValidationError(`Invalid audit trail: ${issues.join('; ')}`, {
        field: first === undefined ? undefined : first.path.join('.'),
        details: { issues },
      });
    }

    const trail = new AuditTrail<string>(undefined, this.runtime.codec);
    trail.entityName = result.data.entityName;
    trail.primaryKey = result.data.primaryKey;
    trail.timestamp = timestamp;
    trail.trailType = result.data.trailType;
    trail.userId = result.data.userId;
    if (this.encoded !== null) {
      trail.setValuesFromJson(this.encoded.oldValuesJson, this.encoded.newValuesJson);
    }
    trail.changedColumns = [...result.data.changedColumns];
    return trail;
  }

  private applyEncoded(encoded: EncodedChangeSet): this {
    this.encoded = encoded;
    this.changedColumns = [...encoded.changedColumns];
    return this;
  }
}
