import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import debug from 'debug';
import * as schema from './schema';

const debugLog = debug('inkwell:db');

/**
 * Any postgres-backed drizzle instance over this schema: node-postgres in
 * the server, PGlite in the tests.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export function createPool(databaseUrl: string): Pool {
  // Managed hosts (Neon and friends) require TLS
  const requiresSsl = databaseUrl.includes('sslmode=require') || databaseUrl.includes('neon.tech');

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: requiresSsl ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Timeout for initial connection
  });

  // An idle client erroring out means the server went away
  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err);
    process.exit(-1);
  });

  pool.on('connect', () => {
    debugLog('New client connected to the pool');
  });

  pool.on('remove', () => {
    debugLog('Client removed from the pool');
  });

  return pool;
}

export function createDb(pool: Pool): Database {
  return drizzle(pool, { schema });
}

export * from './schema';
