#!/usr/bin/env node

import { drizzle } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { loadConfig } from '../config';
import { createPool } from '../db/index';
import { MIGRATIONS_DIR } from '../db/migrate';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);

  try {
    await migrate(drizzle(pool), { migrationsFolder: MIGRATIONS_DIR });
    console.log('✅ Migrations applied');
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Migration failed:', error);
  process.exit(1);
});
