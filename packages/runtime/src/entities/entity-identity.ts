// Entity identity - equality by resolved type and persisted id

import type { EntityId } from '@plinth/protocol';
import { isDefaultId } from '@plinth/protocol';
import { hashPrimitive, identityHash } from '../hashing.js';
import type { TypeResolutionCache } from './type-resolution.js';

/**
 * The shape identity comparisons need from an entity.
 */
export type Identifiable = {
  readonly id: EntityId | null | undefined;
};

/**
 * Compares entities by identity.
 *
 * Two entities are equal when both are persisted, their real types match
 * after proxy resolution, and their ids are equal. A transient entity is
 * equal only to itself.
 */
export class EntityIdentity {
  constructor(private readonly types: TypeResolutionCache) {}

  isTransient(entity: Identifiable): boolean {
    return isDefaultId(entity.id);
  }

  equals(a: Identifiable | null | undefined, b: Identifiable | null | undefined): boolean {
    if (a === b) {
      return true;
    }
    if (a === null || a === undefined || b === null || b === undefined) {
      return false;
    }
    if (this.isTransient(a) || this.isTransient(b)) {
      return false;
    }
    if (this.types.resolve(a) !== this.types.resolve(b)) {
      return false;
    }
    return a.id === b.id;
  }

  /**
   * Transient entities hash by instance; persisted ones by id, so a proxy
   * and its domain instance with the same id hash alike.
   */
  hashOf(entity: Identifiable): number {
    if (this.isTransient(entity)) {
      return identityHash(entity);
    }
    return hashPrimitive(entity.id);
  }
}
