// src/config/redis.ts
import Redis, { RedisOptions } from 'ioredis';
import { env } from './environment';
import logger from '@/utils/logger';

const redisOptions: RedisOptions = {
  maxRetriesPerRequest: 3,
  enableReadyCheck: true,
  // Ledger events are best-effort; nothing should block on Redis at import time.
  lazyConnect: true,
};

const redisClient = new Redis(env.REDIS_URL, redisOptions);

redisClient.on('ready', () => {
  logger.info('Redis client ready.');
});

redisClient.on('error', (error: Error) => {
  logger.error('Redis connection error:', error);
});

redisClient.on('reconnecting', (delay: number) => {
  logger.warn(`Redis reconnecting in ${delay}ms`);
});

redisClient.on('end', () => {
  logger.warn('Redis connection ended. No more reconnections will be attempted.');
});

export const connectRedis = async (): Promise<void> => {
  await redisClient.connect();
  const pong = await redisClient.ping();
  if (pong !== 'PONG') {
    throw new Error('Redis ping did not return PONG');
  }
  logger.info('✅ Redis connection successful (PING/PONG).');
};

export default redisClient;
