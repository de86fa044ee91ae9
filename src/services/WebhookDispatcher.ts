import axios, { type AxiosInstance } from 'axios';
import type {
  AttemptOutcome,
  Clock,
  DeepReadonly,
  DeliveryRecord,
  Job,
  ScrapeResponse,
} from '../types';
import { WEBHOOK_CONSTANTS } from '../utils/constants';
import { DeliveryError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { MetricsCollector } from '../utils/metrics';
import type { RetryPolicy } from '../utils/retry';
import { formatExecutionTime, systemClock } from '../utils/time';
import { deepFreeze, isTerminal } from '../jobs/jobState';
import { responseFromJob } from './responseBuilder';

export interface WebhookResponse {
  status: number;
}

/**
 * Sends one webhook request. Resolves with the HTTP status for every
 * response; rejects only when no response arrived (timeout, refused...).
 */
export interface WebhookTransport {
  post(url: string, body: string, headers: Record<string, string>, timeoutMs: number): Promise<WebhookResponse>;
}

export class AxiosWebhookTransport implements WebhookTransport {
  constructor(private readonly http: AxiosInstance = axios.create()) {}

  async post(url: string, body: string, headers: Record<string, string>, timeoutMs: number): Promise<WebhookResponse> {
    const response = await this.http.post<unknown>(url, body, {
      headers,
      timeout: timeoutMs,
      validateStatus: () => true,
      // The body is already serialized; keep axios from touching it.
      transformRequest: [(data: unknown) => data],
    });
    return { status: response.status };
  }
}

export interface WebhookDispatcherOptions {
  transport: WebhookTransport;
  retry: RetryPolicy;
  maxConcurrency: number;
  timeoutMs: number;
  userAgent: string;
  clock?: Clock;
  metrics?: MetricsCollector;
}

export interface WebhookPayload extends ScrapeResponse {
  jobId: string;
  status: Job['status'];
  completedAt: string | null;
  executionTime: string;
  webhook: { version: string };
}

export interface WebhookTestResult {
  success: boolean;
  url: string;
  statusCode: number | null;
  responseTimeMs: number;
  error: string | null;
}

export interface DeliveryStats {
  pending: number;
  delivered: number;
  exhausted: number;
  inFlight: number;
}

const TRANSPORT_ERROR_CLASS = 'TransportError';

interface QueuedAttempt {
  jobId: string;
  body: string;
  attempt: number;
}

/**
 * 📮 Classifies one attempt: 2xx succeeds; 408, 429 and 5xx are retryable;
 * any other status is final.
 */
export const classifyWebhookStatus = (status: number): DeliveryError | null => {
  if (status >= 200 && status < 300) return null;
  const retryable = status === 408 || status === 429 || status >= 500;
  return new DeliveryError(`Webhook endpoint answered HTTP ${status}`, retryable, status, `HTTP_${status}`);
};

export const buildWebhookPayload = (job: Job): WebhookPayload => {
  const envelope = responseFromJob(job);
  return {
    jobId: job.id,
    status: job.status,
    completedAt: job.finishedAt,
    executionTime: envelope.metadata.executionTime,
    ...envelope,
    webhook: { version: WEBHOOK_CONSTANTS.PAYLOAD_VERSION },
  };
};

/**
 * 🔔 Delivers terminal job outcomes to their webhook URLs.
 *
 * Owns the delivery records and never writes job state. Attempts for one
 * job run strictly one after another; at most `maxConcurrency` attempts are
 * in flight at any time. A backoff wait does not hold a slot: the next
 * attempt re-enters the queue once its delay has passed.
 */
export class WebhookDispatcher {
  private readonly records = new Map<string, DeliveryRecord>();
  private readonly waiting: QueuedAttempt[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  /** Jobs evicted while their delivery was still pending. */
  private readonly evicted = new Set<string>();
  private active = 0;
  private scheduled = 0;
  private stopped = false;
  private readonly clock: Clock;

  constructor(private readonly options: WebhookDispatcherOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Registers a terminal job for delivery. Returns `false` when the job has
   * no webhook, is not terminal or is already tracked.
   */
  enqueue(job: Job): boolean {
    const url = job.request.webhookUrl;
    if (!url || !isTerminal(job.status) || this.records.has(job.id) || this.stopped) return false;

    this.records.set(job.id, {
      jobId: job.id,
      url,
      state: 'PENDING',
      attempts: [],
      nextAttemptAt: null,
      inFlight: false,
    });

    // Rendered once so every attempt sends the same bytes.
    const body = JSON.stringify(buildWebhookPayload(job));
    this.waiting.push({ jobId: job.id, body, attempt: 1 });
    logger.info(`📬 [Job ${job.id}] webhook delivery queued for ${url}`);
    this.pump();
    return true;
  }

  getRecord(jobId: string): DeepReadonly<DeliveryRecord> | null {
    const record = this.records.get(jobId);
    return record ? deepFreeze(structuredClone(record)) : null;
  }

  stats(): DeliveryStats {
    const stats: DeliveryStats = { pending: 0, delivered: 0, exhausted: 0, inFlight: 0 };
    for (const record of this.records.values()) {
      if (record.state === 'PENDING') stats.pending += 1;
      if (record.state === 'DELIVERED') stats.delivered += 1;
      if (record.state === 'EXHAUSTED') stats.exhausted += 1;
      if (record.inFlight) stats.inFlight += 1;
    }
    return stats;
  }

  /**
   * Drops the records of evicted jobs. A pending delivery keeps its record
   * until it finishes.
   */
  forget(jobIds: readonly string[]): void {
    for (const id of jobIds) {
      const record = this.records.get(id);
      if (!record) continue;
      if (record.state === 'PENDING') this.evicted.add(id);
      else this.records.delete(id);
    }
  }

  /** Resolves once nothing is queued, being delivered or waiting to retry. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stops accepting work and waits for running deliveries. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.whenIdle();
  }

  /**
   * 🧪 One-off reachability check of a webhook URL (no retries, no record).
   */
  async testEndpoint(url: string): Promise<WebhookTestResult> {
    const body = JSON.stringify({
      test: true,
      message: 'This is a test webhook from RedditExtractor API',
      timestamp: this.clock.now().toISOString(),
      webhook: { version: WEBHOOK_CONSTANTS.PAYLOAD_VERSION },
    });
    const started = Date.now();

    try {
      const response = await this.options.transport.post(url, body, this.headers('test', 1), this.options.timeoutMs);
      const failure = classifyWebhookStatus(response.status);
      return {
        success: failure === null,
        url,
        statusCode: response.status,
        responseTimeMs: Date.now() - started,
        error: failure ? failure.message : null,
      };
    } catch (error) {
      return { success: false, url, statusCode: null, responseTimeMs: Date.now() - started, error: errorMessage(error) };
    }
  }

  private pump(): void {
    while (this.active < this.options.maxConcurrency && this.waiting.length > 0) {
      const next = this.waiting.shift();
      if (!next) break;
      this.active += 1;
      void this.deliver(next)
        .catch((error: unknown) => {
          logger.error(`💥 [Job ${next.jobId}] webhook delivery crashed: ${errorMessage(error)}`);
          this.giveUp(next.jobId);
        })
        .finally(() => {
          this.active -= 1;
          this.pump();
          this.notifyIdle();
        });
    }
  }

  private isIdle(): boolean {
    return this.active === 0 && this.scheduled === 0 && this.waiting.length === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    this.idleWaiters.splice(0).forEach((resolve) => resolve());
  }

  /** Runs one attempt; a retryable failure schedules the next one. */
  private async deliver({ jobId, body, attempt }: QueuedAttempt): Promise<void> {
    const record = this.records.get(jobId);
    if (!record) return;
    const { retry } = this.options;

    record.inFlight = true;
    record.nextAttemptAt = null;
    const startedAt = this.clock.now();
    const { httpStatus, failure } = await this.attempt(record.url, body, jobId, attempt);
    const finishedAt = this.clock.now();
    record.inFlight = false;

    const outcome: AttemptOutcome = failure === null ? 'SUCCESS' : failure.retryable ? 'RETRYABLE_FAILURE' : 'NON_RETRYABLE_FAILURE';
    record.attempts.push({
      attempt,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      outcome,
      httpStatus,
      errorClass: failure ? failure.errorClass : null,
    });
    this.options.metrics?.recordWebhookAttempt(outcome, finishedAt.getTime() - startedAt.getTime());

    if (failure === null) {
      record.state = 'DELIVERED';
      logger.info(`✅ [Job ${jobId}] webhook delivered (attempt ${attempt})`);
      this.settle(jobId);
      return;
    }

    if (!failure.retryable || !retry.hasAttemptsLeft(attempt)) {
      record.state = 'EXHAUSTED';
      logger.warn(`⚠️ [Job ${jobId}] webhook delivery gave up after ${attempt} attempt(s): ${failure.message}`);
      this.settle(jobId);
      return;
    }

    const delay = retry.delayFor(attempt);
    record.nextAttemptAt = new Date(finishedAt.getTime() + delay).toISOString();
    logger.info(`🔁 [Job ${jobId}] webhook attempt ${attempt} failed, retrying in ${formatExecutionTime(delay)}`);
    this.scheduleRetry({ jobId, body, attempt: attempt + 1 }, delay);
  }

  private scheduleRetry(next: QueuedAttempt, delay: number): void {
    this.scheduled += 1;
    void this.options.retry
      .wait(delay)
      .then(() => {
        this.waiting.push(next);
      })
      .catch((error: unknown) => {
        logger.error(`💥 [Job ${next.jobId}] webhook retry could not be scheduled: ${errorMessage(error)}`);
        this.giveUp(next.jobId);
      })
      .finally(() => {
        this.scheduled -= 1;
        this.pump();
        this.notifyIdle();
      });
  }

  private giveUp(jobId: string): void {
    const record = this.records.get(jobId);
    if (!record) return;
    record.state = 'EXHAUSTED';
    record.inFlight = false;
    record.nextAttemptAt = null;
    this.settle(jobId);
  }

  /** A finished delivery of an already evicted job leaves no record behind. */
  private settle(jobId: string): void {
    if (this.evicted.delete(jobId)) this.records.delete(jobId);
  }

  private async attempt(
    url: string,
    body: string,
    jobId: string,
    attempt: number,
  ): Promise<{ httpStatus: number | null; failure: DeliveryError | null }> {
    try {
      const response = await this.options.transport.post(url, body, this.headers(jobId, attempt), this.options.timeoutMs);
      return { httpStatus: response.status, failure: classifyWebhookStatus(response.status) };
    } catch (error) {
      const errorClass = axios.isAxiosError(error) && error.code ? error.code : TRANSPORT_ERROR_CLASS;
      return { httpStatus: null, failure: new DeliveryError(errorMessage(error), true, null, errorClass) };
    }
  }

  private headers(jobId: string, attempt: number): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'User-Agent': this.options.userAgent,
      [WEBHOOK_CONSTANTS.HEADERS.JOB_ID]: jobId,
      [WEBHOOK_CONSTANTS.HEADERS.ATTEMPT]: String(attempt),
    };
  }
}
