import type {
  Clock,
  FetchGateway,
  GatewayInfo,
  Job,
  JobListFilter,
  JobStatus,
  JobView,
  OutputFormat,
  ScrapeRequest,
  ScrapeResponse,
} from '../types';
import type { JobStore } from '../jobs/JobStore';
import type { ScrapeRunner } from '../jobs/ScrapeRunner';
import type { WorkerPool } from '../jobs/WorkerPool';
import { ConflictError } from '../utils/errors';
import { jobLogger, logger } from '../utils/logger';
import type { MetricsCollector } from '../utils/metrics';
import { systemClock } from '../utils/time';
import { OutputFormatter } from './OutputFormatter';
import { buildScrapeResponse, responseFromJob, toResponseErrors } from './responseBuilder';
import type { DeliveryStats, WebhookDispatcher, WebhookTestResult } from './WebhookDispatcher';

export interface ScrapeServiceDeps {
  store: JobStore;
  runner: ScrapeRunner;
  pool: WorkerPool;
  dispatcher: WebhookDispatcher;
  gateway: FetchGateway;
  metrics?: MetricsCollector;
  clock?: Clock;
}

export type SubmitResult = { mode: 'async'; job: Job } | { mode: 'sync'; response: ScrapeResponse };

export interface RenderedResult {
  format: OutputFormat;
  contentType: string;
  fileName: string;
  body: string;
}

export interface JobsSummary {
  total: number;
  byStatus: Record<JobStatus, number>;
  activeJobIds: string[];
  deliveries: DeliveryStats;
  metrics: ReturnType<MetricsCollector['summarize']> | null;
}

const MAX_CANCEL_ATTEMPTS = 3;

/**
 * 🧠 Job API surface: submits scrape requests (inline or as background
 * jobs), reads and cancels jobs, and renders results.
 */
export class ScrapeService {
  private readonly clock: Clock;

  constructor(private readonly deps: ScrapeServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Requests with a webhook become jobs; everything else runs inline.
   */
  async submit(request: ScrapeRequest): Promise<SubmitResult> {
    if (request.webhookUrl) return { mode: 'async', job: await this.createJob(request) };
    return { mode: 'sync', response: await this.runSync(request) };
  }

  async createJob(request: ScrapeRequest): Promise<Job> {
    const job = await this.deps.store.create(request);
    jobLogger(job.id).info('🆕 queued', { webhookUrl: request.webhookUrl ?? null });
    this.deps.pool.notify();
    return job;
  }

  /** Runs the fetch loop in the caller's request and builds the envelope. */
  async runSync(request: ScrapeRequest): Promise<ScrapeResponse> {
    const startedAt = this.clock.now();
    const outcome = await this.deps.runner.run(request);
    const finishedAt = this.clock.now();

    logger.info(`⚡ Sync scrape finished as ${outcome.status}`, {
      itemsSeen: outcome.progress.itemsSeen,
      errors: outcome.errors.length,
    });

    return buildScrapeResponse({
      request,
      result: outcome.status === 'succeeded' ? outcome.result : null,
      success: outcome.status === 'succeeded',
      errors: toResponseErrors(outcome.errors),
      scrapedAt: finishedAt,
      executionTimeMs: finishedAt.getTime() - startedAt.getTime(),
      itemsSeen: outcome.progress.itemsSeen,
    });
  }

  async getJob(id: string): Promise<JobView> {
    const job = await this.deps.store.get(id);
    return { ...job, webhookDelivery: this.deps.dispatcher.getRecord(id) };
  }

  async listJobs(filter: JobListFilter = {}): Promise<Job[]> {
    return this.deps.store.list(filter);
  }

  /**
   * 🚫 QUEUED jobs are cancelled at once; RUNNING jobs get the cancel flag
   * and stop at their next page boundary. Terminal jobs answer 409.
   */
  async cancelJob(id: string): Promise<Job> {
    for (let attempt = 1; attempt <= MAX_CANCEL_ATTEMPTS; attempt += 1) {
      const job = await this.deps.store.get(id);

      try {
        if (job.status === 'QUEUED') {
          const cancelled = await this.deps.store.transition(id, 'QUEUED', 'CANCELLED', () => ({
            cancelRequested: true,
          }));
          jobLogger(id).info('🚫 cancelled before start');
          this.deps.dispatcher.enqueue(cancelled);
          return cancelled;
        }

        if (job.status === 'RUNNING') {
          const flagged = await this.deps.store.transition(id, 'RUNNING', 'RUNNING', () => ({ cancelRequested: true }));
          jobLogger(id).info('🚫 cancellation requested');
          return flagged;
        }
      } catch (error) {
        if (error instanceof ConflictError) continue;
        throw error;
      }

      throw new ConflictError(`Job ${id} is already ${job.status}`);
    }

    throw new ConflictError(`Job ${id} changed state repeatedly while cancelling`);
  }

  async getJobResponse(id: string): Promise<ScrapeResponse> {
    const job = await this.requireTerminal(id);
    return responseFromJob(job);
  }

  /** Renders a SUCCEEDED job's result in `format` (defaults to the requested one). */
  async renderJobResult(id: string, format?: OutputFormat): Promise<RenderedResult> {
    const job = await this.requireTerminal(id);
    if (job.status !== 'SUCCEEDED') throw new ConflictError(`Job ${id} finished as ${job.status}`);

    const response = responseFromJob(job);
    const chosen = format ?? job.request.outputFormat;
    return {
      format: chosen,
      contentType: OutputFormatter.contentType(chosen),
      fileName: `reddit-${job.id}.${OutputFormatter.fileExtension(chosen)}`,
      body:
        chosen === 'json'
          ? JSON.stringify(response, null, 2)
          : OutputFormatter.render(response.data, chosen, response.metadata),
    };
  }

  async getSummary(): Promise<JobsSummary> {
    const jobs = await this.deps.store.list();
    const byStatus: Record<JobStatus, number> = { QUEUED: 0, RUNNING: 0, SUCCEEDED: 0, FAILED: 0, CANCELLED: 0 };
    jobs.forEach((job) => {
      byStatus[job.status] += 1;
    });

    return {
      total: jobs.length,
      byStatus,
      activeJobIds: this.deps.pool.getActiveJobIds(),
      deliveries: this.deps.dispatcher.stats(),
      metrics: this.deps.metrics ? this.deps.metrics.summarize() : null,
    };
  }

  testWebhook(url: string): Promise<WebhookTestResult> {
    return this.deps.dispatcher.testEndpoint(url);
  }

  describeGateway(): GatewayInfo {
    return this.deps.gateway.describe();
  }

  private async requireTerminal(id: string): Promise<Job> {
    const job = await this.deps.store.get(id);
    if (job.status === 'QUEUED' || job.status === 'RUNNING') {
      throw new ConflictError(`Job ${id} is still ${job.status}`);
    }
    return job;
  }
}
