// Postgres repository implementations
export { PgAuditRepository } from './audit-repository.js';
export { changeSetToRow, rowToChangeSet } from './audit-mappers.js';
export { createPgRepositoryContext } from './context.js';
