// Postgres adapter: connection, schema and repositories
export { createDatabase, databaseConfigFromEnv } from './db.js';
export type { Database, DatabaseConfig } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
