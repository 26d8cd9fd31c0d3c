/**
 * Database Connection Pool
 *
 * One process-wide PostgreSQL pool (`postgres` driver) wrapped by Drizzle ORM.
 * Created on first use, reused by every request, closed at shutdown.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';
import { logger } from '@/utils/logger';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseOptions {
  url: string;
  poolSize: number;
  ssl?: boolean;
}

interface DatabaseHandle {
  sql: postgres.Sql;
  db: Database;
}

let handle: DatabaseHandle | null = null;

/**
 * Initialize the shared pool. Calling it again returns the existing handle.
 */
export function initDatabase(options: DatabaseOptions): DatabaseHandle {
  if (handle) return handle;

  const sql = postgres(options.url, {
    max: options.poolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10, // Timeout for establishing connection
    ssl: options.ssl ? 'require' : false,
    onnotice: (notice) => logger.debug('Postgres notice', { message: notice.message }),
  });

  handle = { sql, db: drizzle(sql, { schema }) };
  logger.info('Database pool initialized', { poolSize: options.poolSize });
  return handle;
}

export function getDatabase(): Database {
  if (!handle) {
    throw new Error('Database not initialized: call initDatabase() at startup');
  }
  return handle.db;
}

/**
 * Create tables and indexes if they do not exist yet
 */
export async function ensureSchema(): Promise<void> {
  if (!handle) {
    throw new Error('Database not initialized: call initDatabase() at startup');
  }
  await handle.sql.unsafe(schema.SCHEMA_DDL);
  logger.info('Database schema verified');
}

/**
 * Close the database connection pool
 * Used during graceful shutdown
 */
export async function closeDatabase(): Promise<void> {
  if (!handle) return;
  const { sql } = handle;
  handle = null;
  await sql.end();
}
