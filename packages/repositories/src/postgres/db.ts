import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
  /** Close idle connections after this many seconds */
  idleTimeoutSeconds?: number;
};

/**
 * Read the database configuration from DATABASE_URL.
 *
 * @throws Error if DATABASE_URL is not set
 */
export function databaseConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): DatabaseConfig {
  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }
  return { connectionString };
}

/**
 * Create a database connection and Drizzle instance over the audit schema.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase(databaseConfigFromEnv());
 * const repos = createPgRepositoryContext(db);
 * // ...
 * await client.end();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    idle_timeout: config.idleTimeoutSeconds,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
