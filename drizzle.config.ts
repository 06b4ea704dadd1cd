import { Config, defineConfig } from 'drizzle-kit';
import { loadConfig } from './src/config';

const drizzleConfig = {
  schema: './src/db/schema.ts',
  out: './migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: loadConfig().databaseUrl,
  },
} satisfies Config;

export default defineConfig(drizzleConfig);
