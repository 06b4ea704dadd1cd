import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({ path: '.env.local' });
dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('8000'),
  BASE_URL: z.string().url().optional(),
  FRONTEND_URL: z.string().optional(),
  BETTER_AUTH_SECRET: z.string().optional(),

  DATABASE_URL: z.string().optional(),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),

  ADMIN_USERNAME: z.string().default('admin'),
  ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  ADMIN_PASSWORD: z.string().optional(),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: string;
  baseUrl: string;
  frontendUrl?: string;
  authSecret: string;
  databaseUrl: string;
  admin: {
    username: string;
    email: string;
    password?: string;
  };
}

/**
 * Builds the postgres connection string from DATABASE_URL, or from the
 * DB_NAME / DB_USER / DB_PASSWORD / DB_HOST / DB_PORT parts.
 */
export function resolveDatabaseUrl(env: z.infer<typeof envSchema>): string {
  if (env.DATABASE_URL) {
    return env.DATABASE_URL;
  }
  if (!env.DB_NAME) {
    throw new Error('DATABASE_URL or DB_NAME must be set');
  }

  const user = env.DB_USER ? encodeURIComponent(env.DB_USER) : '';
  const password = env.DB_PASSWORD ? `:${encodeURIComponent(env.DB_PASSWORD)}` : '';
  const auth = user ? `${user}${password}@` : '';
  return `postgres://${auth}${env.DB_HOST}:${env.DB_PORT}/${env.DB_NAME}`;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  const port = env.PORT;

  if (env.NODE_ENV === 'production' && !env.BETTER_AUTH_SECRET) {
    throw new Error('BETTER_AUTH_SECRET must be set in production');
  }

  return {
    env: env.NODE_ENV,
    port,
    baseUrl: env.BASE_URL || `http://localhost:${port}`,
    frontendUrl: env.FRONTEND_URL,
    authSecret: env.BETTER_AUTH_SECRET || 'inkwell-development-secret-change-me',
    databaseUrl: resolveDatabaseUrl(env),
    admin: {
      username: env.ADMIN_USERNAME,
      email: env.ADMIN_EMAIL,
      password: env.ADMIN_PASSWORD,
    },
  };
}
