import type { RequestHandler } from 'express';
import rateLimit, { type Store } from 'express-rate-limit';
import RedisStore, { type RedisReply } from 'rate-limit-redis';
import type Redis from 'ioredis';
import type { AppConfig } from '../config/app.config';
import { buildErrorResponse } from '../services/responseBuilder';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const isRedisReply = (value: unknown): value is RedisReply =>
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'boolean' ||
  (Array.isArray(value) && value.every(isRedisReply));

/**
 * 🧩 Custom sendCommand bridge to make ioredis work with rate-limit-redis
 */
const redisCommandSender =
  (redis: Redis) =>
  async (...args: string[]): Promise<RedisReply> => {
    const [command, ...rest] = args;
    if (!command) throw new Error('Empty Redis command');
    try {
      const reply: unknown = await redis.call(command, ...rest);
      if (!isRedisReply(reply)) throw new Error(`Unexpected Redis reply to ${command}`);
      return reply;
    } catch (err) {
      logger.error(`Redis sendCommand error: ${errorMessage(err)}`);
      throw err;
    }
  };

/**
 * 🏗 Redis store when a client is available, in-memory otherwise.
 */
const createRateLimitStore = (prefix: string, redis: Redis | null): Store | undefined => {
  if (!redis) return undefined;
  return new RedisStore({ prefix, sendCommand: redisCommandSender(redis) });
};

/**
 * 🚀 API rate limiter. A no-op when rate limiting is disabled (tests).
 */
export const createRateLimitMiddleware = (config: AppConfig['rateLimit'], redis: Redis | null = null): RequestHandler => {
  if (!config.enabled) return (_req, _res, next) => next();

  return rateLimit({
    store: createRateLimitStore('rl:', redis),
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn(`🚫 Rate limit exceeded for IP: ${req.ip}`);
      res
        .status(429)
        .json(
          buildErrorResponse(
            [{ code: 'RATE_LIMITED', message: 'Too many requests. Please wait before retrying.', details: null }],
            {},
            new Date(),
          ),
        );
    },
  });
};
