import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from './schema.js';

/**
 * A database handle or an open transaction
 */
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

let pool: pg.Pool | null = null;

/**
 * Open the connection pool and wrap it in drizzle
 */
export function initializeDatabase(connectionString: string): Executor {
  if (!pool) {
    pool = new pg.Pool({ connectionString });
  }
  return drizzle(pool, { schema });
}

/**
 * Close the connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
