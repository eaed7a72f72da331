// Repository interfaces

export type { AuditRepository, AuditTrailFilter } from './audit-repository.js';
export type { RepositoryContext } from './repository-context.js';
