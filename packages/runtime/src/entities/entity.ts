// Entity base class

import type { EntityId, TypeCacheStats } from '@plinth/protocol';
import { isDefaultId } from '@plinth/protocol';
import { InvalidStateError, ValidationError } from '../errors.js';
import { defaultRuntime } from '../runtime.js';

/**
 * A domain object with a persistent identity.
 *
 * An entity without an id (or with the default id for its kind) is
 * transient: it has not been persisted and is equal only to itself.
 * ORM proxy subclasses marked with `markProxyType` compare equal to
 * their domain type.
 */
export abstract class Entity<TId extends EntityId = EntityId> {
  #id: TId | undefined;

  protected constructor(id?: TId) {
    if (typeof id === 'number' && Number.isNaN(id)) {
      throw new ValidationError('id must not be NaN', { field: 'id' });
    }
    this.#id = id;
  }

  get id(): TId | undefined {
    return this.#id;
  }

  isTransient(): boolean {
    return defaultRuntime.entities.isTransient(this);
  }

  equals(other: Entity<TId> | null | undefined): boolean {
    return defaultRuntime.entities.equals(this, other);
  }

  hashCode(): number {
    return defaultRuntime.entities.hashOf(this);
  }

  /**
   * Give a transient entity the id it was persisted under.
   *
   * @throws InvalidStateError if the entity already has an id
   * @throws ValidationError if the id is the default for its kind
   */
  assignId(id: TId): void {
    if (!this.isTransient()) {
      throw new InvalidStateError(`Entity already has id ${String(this.#id)}`);
    }
    if (isDefaultId(id) || (typeof id === 'number' && Number.isNaN(id))) {
      throw new ValidationError('Cannot assign a default id', { field: 'id' });
    }
    this.#id = id;
  }

  static getPerformanceStats(): TypeCacheStats {
    return defaultRuntime.types.getCacheStats();
  }

  static clearTypeCache(): void {
    defaultRuntime.types.clearCaches();
  }
}
