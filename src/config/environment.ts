// src/config/environment.ts
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// The logger reads LOG_LEVEL itself, so this file must not import it.
const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
const envPath = path.resolve(process.cwd(), envFile);

const loadEnvResult = dotenv.config({ path: envPath });

if (loadEnvResult.error && process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
  console.warn(`⚠️ [ENV] Could not find ${envFile} file. Relying on system environment variables.`);
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().url({ message: 'DATABASE_URL must be a valid PostgreSQL connection string URL' }),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  REDIS_URL: z.string().url({ message: 'REDIS_URL must be a valid Redis connection string URL' }),
  // Chat/room the ledger reports to (shift opened/closed, handovers). Injected into the publisher once.
  REPORT_DESTINATION: z.string().min(1, { message: 'REPORT_DESTINATION cannot be empty' }).default('admin'),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().optional(),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().optional(),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('❌ [ENV] Invalid environment variables:');
  parsedEnv.error.errors.forEach((err) => {
    console.error(`  - ${err.path.join('.')}: ${err.message}`);
  });
  process.exit(1);
}

export const env = parsedEnv.data;
