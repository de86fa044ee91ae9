import type Redis from 'ioredis';
import type { AppConfig } from './config/app.config';
import { createRedisClient } from './config/redis';
import { RedditGateway } from './adapters/reddit/RedditGateway';
import { InMemoryJobStore, type JobStore } from './jobs/JobStore';
import { JobReaper } from './jobs/JobReaper';
import { RedisJobStore } from './jobs/RedisJobStore';
import { ScrapeRunner } from './jobs/ScrapeRunner';
import { WorkerPool } from './jobs/WorkerPool';
import { ScrapeService } from './services/ScrapeService';
import { AxiosWebhookTransport, WebhookDispatcher, type WebhookTransport } from './services/WebhookDispatcher';
import type { Clock, FetchGateway } from './types';
import { MetricsCollector } from './utils/metrics';
import { RetryPolicy } from './utils/retry';
import { sleep, systemClock } from './utils/time';

export interface ContainerOverrides {
  store?: JobStore;
  gateway?: FetchGateway;
  webhookTransport?: WebhookTransport;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export interface AppContainer {
  config: AppConfig;
  redis: Redis | null;
  store: JobStore;
  gateway: FetchGateway;
  runner: ScrapeRunner;
  pool: WorkerPool;
  dispatcher: WebhookDispatcher;
  reaper: JobReaper;
  metrics: MetricsCollector;
  scrapeService: ScrapeService;
}

/**
 * 🧩 Wires the engine together from configuration. Tests pass overrides
 * for the gateway, the webhook transport, the clock and sleeping.
 */
export const createContainer = (config: AppConfig, overrides: ContainerOverrides = {}): AppContainer => {
  const clock = overrides.clock ?? systemClock;
  const wait = overrides.sleep ?? sleep;
  const metrics = new MetricsCollector();

  const redis = !overrides.store && config.jobs.store === 'redis' ? createRedisClient(config.redis) : null;
  const store: JobStore =
    overrides.store ?? (redis ? new RedisJobStore(redis, config.redis.keyPrefix, clock) : new InMemoryJobStore(clock));

  const gateway =
    overrides.gateway ??
    new RedditGateway({
      baseUrl: config.fetch.baseUrl,
      timeoutMs: config.fetch.timeoutMs,
      proxy: config.fetch.proxy,
      proxyMode: config.fetch.proxyMode,
    });

  const runner = new ScrapeRunner(gateway, {
    pageRetry: new RetryPolicy(
      {
        maxAttempts: config.fetch.maxAttempts,
        baseDelayMs: config.fetch.baseDelayMs,
        maxDelayMs: config.fetch.maxDelayMs,
        jitterMs: Math.min(1000, config.fetch.baseDelayMs),
      },
      wait,
    ),
    fetchTimeoutMs: config.fetch.timeoutMs,
    maxPageSize: config.fetch.maxPageSize,
    clock,
    metrics,
  });

  const dispatcher = new WebhookDispatcher({
    transport: overrides.webhookTransport ?? new AxiosWebhookTransport(),
    retry: new RetryPolicy(
      {
        maxAttempts: config.webhook.maxAttempts,
        baseDelayMs: config.webhook.baseDelayMs,
        maxDelayMs: config.webhook.maxDelayMs,
      },
      wait,
    ),
    maxConcurrency: config.webhook.maxConcurrency,
    timeoutMs: config.webhook.timeoutMs,
    userAgent: config.webhook.userAgent,
    clock,
    metrics,
  });

  const pool = new WorkerPool(
    { store, runner, delivery: dispatcher, metrics, clock },
    { maxConcurrentJobs: config.jobs.maxConcurrentJobs, pollIntervalMs: config.jobs.pollIntervalMs },
  );

  const reaper = new JobReaper(store, {
    retentionMs: config.jobs.retentionMs,
    sweepIntervalMs: config.jobs.sweepIntervalMs,
    onEvicted: (ids) => dispatcher.forget(ids),
    clock,
  });

  const scrapeService = new ScrapeService({ store, runner, pool, dispatcher, gateway, metrics, clock });

  return { config, redis, store, gateway, runner, pool, dispatcher, reaper, metrics, scrapeService };
};
