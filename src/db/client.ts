/**
 * Drizzle ORM Database Client
 *
 * One pooled postgres connection per process, shared by every
 * PgVectorStore that uses the same connection string.
 */

import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '@/lib/logger';

// Create a child logger for database operations
const log = logger.child({ layer: 'db', service: 'DatabaseClient' });

// =============================================================================
// Types
// =============================================================================

export type Database = PostgresJsDatabase;

// =============================================================================
// Client
// =============================================================================

let dbClient: postgres.Sql | null = null;
let db: Database | null = null;
let dbUrl: string | null = null;

/**
 * Get the Drizzle client for a connection string.
 *
 * @throws Error if the string is empty or differs from the open connection
 */
export function getDb(connectionString: string): Database {
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  if (db) {
    if (connectionString !== dbUrl) {
      throw new Error('A database connection to a different URL is already open');
    }
    return db;
  }

  dbClient = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => log.debug({ event: 'db_notice', notice: notice.message }, 'Postgres notice'),
  });
  db = drizzle(dbClient);
  dbUrl = connectionString;

  log.debug({ event: 'db_connect' }, 'Created database connection');

  return db;
}

/**
 * Close the database connection.
 * Call this before a script exits.
 */
export async function closeDb(): Promise<void> {
  if (dbClient) {
    await dbClient.end();
    dbClient = null;
    db = null;
    dbUrl = null;
    log.debug({ event: 'db_close' }, 'Database connection closed');
  }
}
