// src/config/database.ts
import { drizzle } from 'drizzle-orm/postgres-js';
import { sql, type Logger } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from '@/db/schema';
import logger from '@/utils/logger';
import { env } from './environment';

const client = postgres(env.DATABASE_URL, {
  max: env.DB_POOL_MAX,
  idle_timeout: 20,
  max_lifetime: 300,
  connect_timeout: 10,
  onnotice: (notice) => {
    logger.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
  },
});

const queryLogger: Logger = {
  logQuery: (query, params) => {
    logger.debug(`SQL: ${query}`);
    logger.debug(`Params: ${JSON.stringify(params)}`);
  },
};

export const db = drizzle(client, {
  schema,
  logger: env.NODE_ENV === 'development' ? queryLogger : false,
});

export type Database = typeof db;

export const verifyDatabaseConnection = async (): Promise<void> => {
  try {
    await db.execute(sql`select 1`);
    logger.info('✅ Database connection successful.');
  } catch (error) {
    logger.error('❌ Database connection failed:', error);
    throw error;
  }
};

export const closeDatabase = async (): Promise<void> => {
  await client.end({ timeout: 5 });
  logger.info('Database pool closed.');
};

export { client as sqlClient };
