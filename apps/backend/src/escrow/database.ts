/**
 * Database Configuration
 * PostgreSQL pool backing the custody ledger
 */

import { Pool } from 'pg';

export function createDatabasePool(databaseUrl = process.env.DATABASE_URL): Pool {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  return new Pool({
    connectionString: databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
}

export async function closeDatabasePool(pool: Pool): Promise<void> {
  await pool.end();
}
