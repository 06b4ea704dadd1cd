#!/usr/bin/env node

import { loadConfig } from '../config';
import { createDb, createPool } from '../db/index';
import { createAuth } from '../auth';
import { ensureAdmin } from '../services/adminBootstrap';

/**
 * Best-effort: a failure here is logged and never stops the container from
 * starting the server.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);

  try {
    const db = createDb(pool);
    const result = await ensureAdmin(createAuth(db, config), db, config.admin);

    switch (result) {
      case 'created':
        console.log(`✅ Superuser ${config.admin.username} created`);
        break;
      case 'exists':
        console.log(`ℹ️  Superuser ${config.admin.username} already exists`);
        break;
      case 'skipped':
        console.log('ℹ️  ADMIN_PASSWORD is not set, no superuser created');
        break;
    }
  } finally {
    await pool.end();
  }
}

main()
  .catch((error: unknown) => {
    console.error('❌ Could not create superuser:', error);
  })
  .finally(() => {
    process.exit(0);
  });
