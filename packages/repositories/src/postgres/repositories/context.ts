import type { Database } from '../db.js';
import type { RepositoryContext } from '../../interfaces/index.js';
import { PgAuditRepository } from './audit-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(databaseConfigFromEnv());
 * const repos = createPgRepositoryContext(db);
 *
 * await repos.auditTrails.append(trail.toChangeSet());
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    auditTrails: new PgAuditRepository(db),
  };
}
