// Change-set codec - encodes old/new column values as JSON text blobs

import type { ChangeMap, ChangeValue } from '@plinth/protocol';
import { ValidationError } from '../errors.js';
import type { DomainLogger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import { scanTopLevelValue } from './json-scan.js';

export const DEFAULT_SPAN_INLINE_LIMIT = 3;

/**
 * Encoded form of one mutation's values.
 * A null blob stands for "no values".
 */
export type EncodedChangeSet = {
  changedColumns: string[];
  oldValuesJson: string | null;
  newValuesJson: string | null;
};

export type ChangeSetCodecOptions = {
  /**
   * Largest column count encoded by direct concatenation
   */
  inlineLimit?: number;

  logger?: DomainLogger;
};

// Characters JSON.stringify would escape in a string
const NEEDS_ESCAPE = /["\\\u0000-\u001f\ud800-\udfff]/;

function jsonReplacer(_key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return null;
    case 'bigint':
      return value.toString();
    default:
      return value;
  }
}

function quoteJson(text: string): string {
  return NEEDS_ESCAPE.test(text) ? JSON.stringify(text) : `"${text}"`;
}

function inlineValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return quoteJson(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : 'null';
    case 'boolean':
      return value ? 'true' : 'false';
    case 'undefined':
      return 'null';
    case 'bigint':
      return `"${value.toString()}"`;
    default:
      return value === null ? 'null' : (JSON.stringify(value, jsonReplacer) ?? 'null');
  }
}

// JSON.parse only produces JSON values, so an object result is a ChangeMap
function isJsonObject(value: unknown): value is ChangeMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasDuplicates(columns: readonly string[]): boolean {
  return new Set(columns).size !== columns.length;
}

/**
 * Encodes and decodes the two value blobs of an audit change set.
 *
 * Writes never fail on values (anything JSON cannot hold is written as
 * null, bigint as decimal text); reads never throw on malformed blobs.
 */
function requireColumnNames(columns: readonly string[]): void {
  const index = columns.findIndex((column) => column.length === 0);
  if (index !== -1) {
    throw new ValidationError('Column names must not be empty', {
      field: 'columns',
      details: { index },
    });
  }
}

export class ChangeSetCodec {
  private readonly inlineLimit: number;
  private readonly logger: DomainLogger;

  constructor(options: ChangeSetCodecOptions = {}) {
    const inlineLimit = options.inlineLimit ?? DEFAULT_SPAN_INLINE_LIMIT;
    if (!Number.isInteger(inlineLimit) || inlineLimit < 0) {
      throw new ValidationError('inlineLimit must be a non-negative integer', {
        field: 'inlineLimit',
        details: { inlineLimit },
      });
    }
    this.inlineLimit = inlineLimit;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Encode a column map. An empty or missing map encodes to null.
   *
   * @throws ValidationError if a column name is empty
   */
  encodeMap(values: Readonly<Record<string, unknown>> | null | undefined): string | null {
    if (values === null || values === undefined || Object.keys(values).length === 0) {
      return null;
    }
    requireColumnNames(Object.keys(values));
    return JSON.stringify(values, jsonReplacer);
  }

  /**
   * Encode parallel column and value sequences.
   *
   * @throws ValidationError if the sequences differ in length or a column name is empty
   */
  encodeColumns(columns: readonly string[], values: readonly unknown[]): string | null {
    if (columns.length !== values.length) {
      throw new ValidationError(
        `Column count (${columns.length}) does not match value count (${values.length})`,
        { details: { columns: columns.length, values: values.length } }
      );
    }
    if (columns.length === 0) {
      return null;
    }
    requireColumnNames(columns);

    if (columns.length <= this.inlineLimit && !hasDuplicates(columns)) {
      const parts = columns.map((column, i) => `${quoteJson(column)}:${inlineValue(values[i])}`);
      return `{${parts.join(',')}}`;
    }

    // fromEntries defines own properties, so "__proto__" stays a column; later duplicates win
    return this.encodeMap(Object.fromEntries(columns.map((column, i) => [column, values[i]])));
  }

  /**
   * Encode two column maps. Changed columns are the old map's keys followed
   * by keys present only in the new map.
   */
  writeChanges(
    oldValues: Readonly<Record<string, unknown>> | null | undefined,
    newValues: Readonly<Record<string, unknown>> | null | undefined
  ): EncodedChangeSet {
    const oldKeys = oldValues ? Object.keys(oldValues) : [];
    const newKeys = newValues ? Object.keys(newValues) : [];
    const seen = new Set(oldKeys);

    return {
      changedColumns: [...oldKeys, ...newKeys.filter((key) => !seen.has(key))],
      oldValuesJson: this.encodeMap(oldValues),
      newValuesJson: this.encodeMap(newValues),
    };
  }

  /**
   * Encode a change from parallel sequences:
   * `columns[i]` changed from `oldValues[i]` to `newValues[i]`.
   *
   * @throws ValidationError if the three sequences differ in length or a column name is empty
   */
  writeChangesFromSpan(
    columns: readonly string[],
    oldValues: readonly unknown[],
    newValues: readonly unknown[]
  ): EncodedChangeSet {
    if (columns.length !== oldValues.length || columns.length !== newValues.length) {
      throw new ValidationError(
        `Columns (${columns.length}), old values (${oldValues.length}) and new values (${newValues.length}) must have the same length`,
        {
          details: {
            columns: columns.length,
            oldValues: oldValues.length,
            newValues: newValues.length,
          },
        }
      );
    }

    return {
      changedColumns: [...new Set(columns)],
      oldValuesJson: this.encodeColumns(columns, oldValues),
      newValuesJson: this.encodeColumns(columns, newValues),
    };
  }

  /**
   * Store pre-encoded blobs verbatim. Empty text is stored as null.
   */
  writeChangesRaw(oldBlob: string | null | undefined, newBlob: string | null | undefined): EncodedChangeSet {
    return {
      changedColumns: [],
      oldValuesJson: oldBlob ? oldBlob : null,
      newValuesJson: newBlob ? newBlob : null,
    };
  }

  /**
   * Materialize a blob. Missing, malformed and non-object blobs read as `{}`.
   */
  decode(blob: string | null | undefined): ChangeMap {
    if (!blob) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(blob);
    } catch (error) {
      this.logger.warn('Malformed change-set blob', {
        length: blob.length,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    if (!isJsonObject(parsed)) {
      this.logger.warn('Change-set blob is not a JSON object', {
        length: blob.length,
        kind: Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed,
      });
      return {};
    }
    return parsed;
  }

  /**
   * Read one key from a blob. Agrees with `decode(blob)[key]` for every key.
   */
  readValue(blob: string | null | undefined, key: string): ChangeValue | undefined {
    if (!blob) {
      return undefined;
    }

    const scan = scanTopLevelValue(blob, key);
    switch (scan.kind) {
      case 'found':
        return scan.value;
      case 'absent':
        return undefined;
      case 'fallback': {
        const values = this.decode(blob);
        return Object.hasOwn(values, key) ? values[key] : undefined;
      }
    }
  }
}
