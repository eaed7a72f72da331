// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Identifier of an entity. Equatable with `===` and orderable with `<`.
 */
export type EntityId = string | number | bigint;

/**
 * Check whether an identifier holds the default value for its kind.
 *
 * An entity whose id is the default has not been persisted yet
 * (it is "transient"). `undefined` and `null` count as default for every kind.
 */
export function isDefaultId(id: EntityId | null | undefined): boolean {
  if (id === undefined || id === null) {
    return true;
  }

  switch (typeof id) {
    case 'string':
      return id.length === 0;
    case 'number':
      return id === 0;
    case 'bigint':
      return id === 0n;
    default:
      return false;
  }
}

