// In-memory repository implementations for development and testing
//
// Useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.

import { parseAuditChangeSet } from '@plinth/protocol';
import type { AuditChangeSet } from '@plinth/protocol';
import type { AuditRepository, RepositoryContext } from '../interfaces/index.js';

/**
 * Audit repository with access to its underlying data and a clear function.
 */
export interface InMemoryAuditRepository extends AuditRepository {
  /** Direct access to the stored change sets (for debugging/testing) */
  readonly _data: Map<string, AuditChangeSet>;
  /** Clear all data */
  clear(): void;
}

export interface InMemoryRepositoryContext extends RepositoryContext {
  readonly auditTrails: InMemoryAuditRepository;
  clear(): void;
}

function newestFirst(changeSets: Iterable<AuditChangeSet>): AuditChangeSet[] {
  return Array.from(changeSets).sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));
}

/**
 * Create an in-memory audit repository.
 *
 * Stored change sets are copies; mutating a returned record does not
 * change the repository.
 */
export function createInMemoryAuditRepository(): InMemoryAuditRepository {
  const changeSets = new Map<string, AuditChangeSet>();

  const copy = (changeSet: AuditChangeSet): AuditChangeSet => ({
    ...changeSet,
    changedColumns: [...changeSet.changedColumns],
  });

  return {
    _data: changeSets,

    async append(changeSet) {
      const parsed = parseAuditChangeSet(changeSet);
      if (changeSets.has(parsed.id)) {
        throw new Error(`Audit trail ${parsed.id} already exists`);
      }
      changeSets.set(parsed.id, copy(parsed));
      return copy(parsed);
    },

    async get(id) {
      const changeSet = changeSets.get(id);
      return changeSet ? copy(changeSet) : null;
    },

    async getByEntity(entityName, primaryKey) {
      const matches = Array.from(changeSets.values()).filter(
        (c) => c.entityName === entityName && c.primaryKey === primaryKey
      );
      return newestFirst(matches).map(copy);
    },

    async getByUser(userId, limit) {
      const matches = newestFirst(Array.from(changeSets.values()).filter((c) => c.userId === userId));
      return (limit !== undefined ? matches.slice(0, limit) : matches).map(copy);
    },

    async getByDateRange(start, end) {
      const from = Date.parse(start);
      const to = Date.parse(end);
      const matches = Array.from(changeSets.values()).filter((c) => {
        const at = Date.parse(c.timestamp);
        return at >= from && at <= to;
      });
      return newestFirst(matches).map(copy);
    },

    async count(filter = {}) {
      let count = 0;
      for (const c of changeSets.values()) {
        if (filter.entityName && c.entityName !== filter.entityName) continue;
        if (filter.userId && c.userId !== filter.userId) continue;
        if (filter.trailType && c.trailType !== filter.trailType) continue;
        count++;
      }
      return count;
    },

    clear() {
      changeSets.clear();
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * await repos.auditTrails.append(trail.toChangeSet());
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const auditTrails = createInMemoryAuditRepository();

  return {
    auditTrails,
    clear() {
      auditTrails.clear();
    },
  };
}
