// Entity with creation, update and soft-delete timestamps

import type { EntityId } from '@plinth/protocol';
import { InvalidStateError } from '../errors.js';
import { Entity } from './entity.js';

export abstract class AuditableEntity<TId extends EntityId = EntityId> extends Entity<TId> {
  created: Date | null = null;
  updated: Date | null = null;
  deleted: Date | null = null;

  protected constructor(id?: TId) {
    super(id);
  }

  markCreated(at: Date = new Date()): void {
    this.created = at;
  }

  markUpdated(at: Date = new Date()): void {
    if (this.isDeleted()) {
      throw new InvalidStateError('Cannot update a deleted entity');
    }
    this.updated = at;
  }

  /**
   * Soft delete. The first deletion time is kept.
   */
  markDeleted(at: Date = new Date()): void {
    this.deleted ??= at;
  }

  isDeleted(): boolean {
    return this.deleted !== null;
  }
}
