import type { AuditRepository } from './audit-repository.js';

/**
 * RepositoryContext bundles the repository interfaces together.
 *
 * Pass a RepositoryContext to code that needs data access, and swap
 * implementations (Postgres, in-memory) without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * await repos.auditTrails.append(trail.toChangeSet());
 * ```
 */
export interface RepositoryContext {
  readonly auditTrails: AuditRepository;
}
