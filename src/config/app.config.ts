import dotenv from 'dotenv';
import type { ProxyMode } from '../types';

dotenv.config();

type Env = NodeJS.ProcessEnv;

const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export interface ProxyConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  corsOrigin: string;
  apiPrefix: string;
  rateLimit: { enabled: boolean; windowMs: number; max: number };
  jobs: {
    store: 'memory' | 'redis';
    maxConcurrentJobs: number;
    pollIntervalMs: number;
    retentionMs: number;
    sweepIntervalMs: number;
  };
  fetch: {
    baseUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    maxPageSize: number;
    proxy: ProxyConfig | null;
    proxyMode: ProxyMode;
  };
  webhook: {
    timeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    maxConcurrency: number;
    userAgent: string;
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    keyPrefix: string;
  };
}

const proxyFromEnv = (env: Env): ProxyConfig | null => {
  if (!env.PROXY_HOST) return null;
  return {
    host: env.PROXY_HOST,
    port: int(env.PROXY_PORT, 8080),
    username: env.PROXY_USERNAME || undefined,
    password: env.PROXY_PASSWORD || undefined,
  };
};

/**
 * 🧩 Builds the typed configuration from environment variables.
 */
export const loadAppConfig = (env: Env = process.env): AppConfig => ({
  nodeEnv: env.NODE_ENV || 'development',
  port: int(env.PORT, 5000),
  corsOrigin: env.CORS_ORIGIN || '*',
  apiPrefix: '/api/v1',

  // Rate limiting
  rateLimit: {
    enabled: env.NODE_ENV !== 'test',
    windowMs: int(env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000), // 15 minutes
    max: int(env.RATE_LIMIT_MAX, 100),
  },

  // Background jobs
  jobs: {
    store: env.JOB_STORE === 'redis' ? 'redis' : 'memory',
    maxConcurrentJobs: Math.max(1, int(env.MAX_CONCURRENT_JOBS, 2)),
    pollIntervalMs: int(env.JOB_POLL_INTERVAL_MS, 5000),
    retentionMs: int(env.JOB_RETENTION_MS, 24 * 60 * 60 * 1000), // 24 hours
    sweepIntervalMs: int(env.JOB_SWEEP_INTERVAL_MS, 60 * 60 * 1000),
  },

  // Reddit fetching
  fetch: {
    baseUrl: env.REDDIT_BASE_URL || 'https://www.reddit.com',
    timeoutMs: int(env.FETCH_TIMEOUT_MS, 10_000),
    maxAttempts: Math.max(1, int(env.FETCH_MAX_ATTEMPTS, 3)),
    baseDelayMs: int(env.FETCH_BASE_DELAY_MS, 1000),
    maxDelayMs: int(env.FETCH_MAX_DELAY_MS, 30_000),
    maxPageSize: int(env.FETCH_MAX_PAGE_SIZE, 100),
    proxy: proxyFromEnv(env),
    proxyMode: env.PROXY_MODE === 'fallback' ? 'fallback' : 'always',
  },

  // Webhooks
  webhook: {
    timeoutMs: int(env.WEBHOOK_TIMEOUT_MS, 30_000),
    maxAttempts: Math.max(1, int(env.WEBHOOK_MAX_ATTEMPTS, 5)),
    baseDelayMs: int(env.WEBHOOK_BASE_DELAY_MS, 1000),
    maxDelayMs: int(env.WEBHOOK_MAX_DELAY_MS, 60_000),
    maxConcurrency: Math.max(1, int(env.WEBHOOK_MAX_CONCURRENCY, 4)),
    userAgent: env.WEBHOOK_USER_AGENT || 'RedditExtractor-Webhook/1.0',
  },

  redis: {
    host: env.REDIS_HOST || '127.0.0.1',
    port: int(env.REDIS_PORT, 6379),
    password: env.REDIS_PASSWORD || undefined,
    keyPrefix: env.REDIS_KEY_PREFIX || 'reddit-extractor',
  },
});

export const appConfig = loadAppConfig();
