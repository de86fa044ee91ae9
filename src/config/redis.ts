import Redis, { type RedisOptions } from 'ioredis';
import type { AppConfig } from './app.config';
import { logger } from '../utils/logger';

const MAX_RECONNECT_DELAY_MS = 3000;

const redisOptionsFrom = (config: AppConfig['redis']): RedisOptions => ({
  host: config.host,
  port: config.port,
  password: config.password,
  maxRetriesPerRequest: 3,
  connectTimeout: 10_000,
  keepAlive: 30_000,
  enableReadyCheck: true,
  retryStrategy: (times: number) => Math.min(times * 200, MAX_RECONNECT_DELAY_MS),
});

let sharedClient: Redis | null = null;

/**
 * 🧩 Shared connection for the job store and the rate limiter. The first
 * call opens it; later calls get the same client back.
 */
export const createRedisClient = (config: AppConfig['redis']): Redis => {
  if (sharedClient) return sharedClient;

  const client = new Redis(redisOptionsFrom(config));
  client.on('ready', () => logger.info(`✅ Redis ready at ${config.host}:${config.port}`));
  client.on('reconnecting', (delay: number) => logger.warn(`⚠️ Redis reconnecting in ${delay}ms`));
  client.on('error', (err: Error) => logger.error(`💥 Redis error: ${err.message}`));
  client.on('end', () => logger.warn('🛑 Redis connection ended'));

  sharedClient = client;
  return client;
};

export const closeRedisClient = async (): Promise<void> => {
  if (!sharedClient) return;
  const client = sharedClient;
  sharedClient = null;
  if (client.status !== 'end') await client.quit();
  logger.info('🔒 Redis connection closed');
};
