// Auditable entity that also records which user made each change

import type { EntityId } from '@plinth/protocol';
import { AuditableEntity } from './auditable-entity.js';

export abstract class UserAuditableEntity<TId extends EntityId = EntityId> extends AuditableEntity<TId> {
  createdBy: string | null = null;
  updatedBy: string | null = null;
  deletedBy: string | null = null;

  protected constructor(id?: TId) {
    super(id);
  }

  markCreated(at: Date = new Date(), userId: string | null = null): void {
    super.markCreated(at);
    this.createdBy = userId;
  }

  /**
   * @throws InvalidStateError if the entity is deleted
   */
  markUpdated(at: Date = new Date(), userId: string | null = null): void {
    super.markUpdated(at);
    this.updatedBy = userId;
  }

  /**
   * Soft delete. The first deletion time and user are kept.
   */
  markDeleted(at: Date = new Date(), userId: string | null = null): void {
    if (this.isDeleted()) {
      return;
    }
    super.markDeleted(at);
    this.deletedBy = userId;
  }
}
