import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * drizzle-kit output folder (`out` in drizzle.config.ts). The SQL files are
 * listed in `meta/_journal.json`; drizzle's migrator records what it applied
 * in `drizzle.__drizzle_migrations`.
 */
export const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');
