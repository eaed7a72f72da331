// Change capture - diff two snapshots of an entity into an encoded change set

import { TrailType } from '@plinth/protocol';
import type { DomainRuntime } from '../runtime.js';
import { defaultRuntime } from '../runtime.js';
import type { EncodedChangeSet } from './change-set-codec.js';

export type CapturedChanges = EncodedChangeSet & {
  trailType: TrailType;
};

export type CaptureOptions = {
  /**
   * Columns to compare. Defaults to the keys of both snapshots.
   */
  columns?: readonly string[];

  runtime?: DomainRuntime;
};

function snapshotColumns(before: object | null, after: object | null): string[] {
  const columns = before ? Object.keys(before) : [];
  const seen = new Set(columns);
  for (const key of after ? Object.keys(after) : []) {
    if (!seen.has(key)) {
      columns.push(key);
    }
  }
  return columns;
}

/**
 * Compare two snapshots of the same entity, column by column.
 *
 * - `before` null: a creation; every column of `after` is recorded as new
 * - `after` null: a deletion; every column of `before` is recorded as old
 * - otherwise an update of the columns whose values differ, or `None`
 *   with empty blobs when nothing differs
 *
 * Value objects, dates and collections are compared structurally.
 */
export function captureChanges(
  before: object | null | undefined,
  after: object | null | undefined,
  options: CaptureOptions = {}
): CapturedChanges {
  const runtime = options.runtime ?? defaultRuntime;
  const { codec, values } = runtime;
  const previous = before ?? null;
  const current = after ?? null;
  const columns = options.columns ? [...options.columns] : snapshotColumns(previous, current);

  if (previous === null) {
    if (current === null) {
      return { trailType: TrailType.None, ...codec.writeChangesRaw(null, null) };
    }
    return {
      trailType: TrailType.Create,
      changedColumns: [...new Set(columns)],
      oldValuesJson: null,
      newValuesJson: codec.encodeColumns(
        columns,
        columns.map((column) => Reflect.get(current, column))
      ),
    };
  }

  if (current === null) {
    return {
      trailType: TrailType.Delete,
      changedColumns: [...new Set(columns)],
      oldValuesJson: codec.encodeColumns(
        columns,
        columns.map((column) => Reflect.get(previous, column))
      ),
      newValuesJson: null,
    };
  }

  const changed: string[] = [];
  const oldValues: unknown[] = [];
  const newValues: unknown[] = [];

  for (const column of columns) {
    const oldValue: unknown = Reflect.get(previous, column);
    const newValue: unknown = Reflect.get(current, column);
    if (!values.valuesEqual(oldValue, newValue)) {
      changed.push(column);
      oldValues.push(oldValue);
      newValues.push(newValue);
    }
  }

  return {
    trailType: changed.length > 0 ? TrailType.Update : TrailType.None,
    ...codec.writeChangesFromSpan(changed, oldValues, newValues),
  };
}
