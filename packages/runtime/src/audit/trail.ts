// AuditTrail - the entity written for one audited mutation

import type { AuditChangeSet, ChangeMap, ChangeValue, ColumnChange, EntityId } from '@plinth/protocol';
import { TrailType } from '@plinth/protocol';
import { InvalidStateError } from '../errors.js';
import { Entity } from '../entities/entity.js';
import { defaultRuntime } from '../runtime.js';
import type { ChangeSetCodec, EncodedChangeSet } from './change-set-codec.js';

/**
 * Record of one entity mutation: metadata plus the old and new column values
 * as two JSON blobs.
 *
 * Values are written once through one of the `setValues*` methods and read
 * back either whole (`oldValues`, `newValues`) or one key at a time
 * (`readOldValue`, `readNewValue`) without materializing the blob.
 */
export class AuditTrail<TId extends EntityId = string> extends Entity<TId> {
  entityName = '';
  primaryKey: string | null = null;
  timestamp: Date = new Date();
  trailType: TrailType = TrailType.None;
  userId: string | null = null;
  changedColumns: string[] = [];

  #oldValuesJson: string | null = null;
  #newValuesJson: string | null = null;
  #hasChangeData = false;
  readonly #codec: ChangeSetCodec;

  constructor(id?: TId, codec: ChangeSetCodec = defaultRuntime.codec) {
    super(id);
    this.#codec = codec;
  }

  get oldValuesJson(): string | null {
    return this.#oldValuesJson;
  }

  get newValuesJson(): string | null {
    return this.#newValuesJson;
  }

  /**
   * Old values, fully decoded. A null blob reads as `{}`.
   */
  get oldValues(): ChangeMap {
    return this.#codec.decode(this.#oldValuesJson);
  }

  get newValues(): ChangeMap {
    return this.#codec.decode(this.#newValuesJson);
  }

  /**
   * Record two column maps and derive the changed columns from their keys.
   */
  setValues(
    oldValues: Readonly<Record<string, unknown>> | null | undefined,
    newValues: Readonly<Record<string, unknown>> | null | undefined
  ): void {
    this.apply(this.#codec.writeChanges(oldValues, newValues), true);
  }

  /**
   * Record a change from parallel column and value sequences.
   *
   * @throws ValidationError if the sequences differ in length
   */
  setValuesFromSpan(
    columns: readonly string[],
    oldValues: readonly unknown[],
    newValues: readonly unknown[]
  ): void {
    this.apply(this.#codec.writeChangesFromSpan(columns, oldValues, newValues), true);
  }

  /**
   * Record pre-encoded blobs verbatim. Changed columns are left as they are.
   */
  setValuesFromJson(oldValuesJson: string | null | undefined, newValuesJson: string | null | undefined): void {
    this.apply(this.#codec.writeChangesRaw(oldValuesJson, newValuesJson), false);
  }

  readOldValue(key: string): ChangeValue | undefined {
    return this.#codec.readValue(this.#oldValuesJson, key);
  }

  readNewValue(key: string): ChangeValue | undefined {
    return this.#codec.readValue(this.#newValuesJson, key);
  }

  /**
   * Whether any `setValues*` method has been called
   */
  hasChangeData(): boolean {
    return this.#hasChangeData;
  }

  /**
   * Old and new value of one column, or undefined when the trail does not
   * mention it.
   *
   * @throws InvalidStateError if no change data was ever written
   */
  changeFor(column: string): ColumnChange | undefined {
    if (!this.#hasChangeData) {
      throw new InvalidStateError('Audit trail has no change data');
    }

    const oldValue = this.readOldValue(column);
    const newValue = this.readNewValue(column);
    if (oldValue === undefined && newValue === undefined && !this.changedColumns.includes(column)) {
      return undefined;
    }
    return { column, oldValue, newValue };
  }

  /**
   * Persistable record of this trail.
   *
   * @throws InvalidStateError if the trail has no id yet
   */
  toChangeSet(): AuditChangeSet {
    const id = this.id;
    if (id === undefined || this.isTransient()) {
      throw new InvalidStateError('Audit trail must have an id before it is persisted');
    }

    return {
      id: String(id),
      entityName: this.entityName,
      primaryKey: this.primaryKey,
      timestamp: this.timestamp.toISOString(),
      trailType: this.trailType,
      userId: this.userId,
      changedColumns: [...this.changedColumns],
      oldValuesJson: this.#oldValuesJson,
      newValuesJson: this.#newValuesJson,
    };
  }

  static fromChangeSet(
    changeSet: AuditChangeSet,
    codec: ChangeSetCodec = defaultRuntime.codec
  ): AuditTrail<string> {
    const trail = new AuditTrail<string>(changeSet.id, codec);
    trail.entityName = changeSet.entityName;
    trail.primaryKey = changeSet.primaryKey;
    trail.timestamp = new Date(changeSet.timestamp);
    trail.trailType = changeSet.trailType;
    trail.userId = changeSet.userId;
    trail.changedColumns = [...changeSet.changedColumns];
    trail.setValuesFromJson(changeSet.oldValuesJson, changeSet.newValuesJson);
    return trail;
  }

  private apply(encoded: EncodedChangeSet, replaceColumns: boolean): void {
    this.#oldValuesJson = encoded.oldValuesJson;
    this.#newValuesJson = encoded.newValuesJson;
    if (replaceColumns) {
      this.changedColumns = encoded.changedColumns;
    }
    this.#hasChangeData = true;
  }
}
