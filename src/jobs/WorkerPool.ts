import type { Clock, ErrorEntry, Job } from '../types';
import { ConflictError, toErrorEntry } from '../utils/errors';
import { jobLogger, logger } from '../utils/logger';
import type { MetricsCollector } from '../utils/metrics';
import { systemClock } from '../utils/time';
import type { JobStore } from './JobStore';
import type { CheckpointDecision, CheckpointState, RunOutcome, ScrapeRunner } from './ScrapeRunner';

/** Anything that can take a terminal job for webhook delivery. */
export interface DeliveryScheduler {
  enqueue(job: Job): boolean;
}

export interface WorkerPoolOptions {
  maxConcurrentJobs: number;
  pollIntervalMs: number;
}

export interface WorkerPoolDeps {
  store: JobStore;
  runner: ScrapeRunner;
  delivery?: DeliveryScheduler;
  metrics?: MetricsCollector;
  clock?: Clock;
}

/**
 * 🏭 Fixed set of worker slots. Each slot claims the oldest QUEUED job
 * through the store's compare-and-update, runs it to a terminal status and
 * hands the terminal snapshot to the delivery scheduler.
 */
export class WorkerPool {
  private running = false;
  private loops: Promise<void>[] = [];
  private wakeups: Array<() => void> = [];
  private readonly active = new Map<string, number>();
  private readonly clock: Clock;

  constructor(
    private readonly deps: WorkerPoolDeps,
    private readonly options: WorkerPoolOptions,
  ) {
    if (options.maxConcurrentJobs < 1) throw new RangeError('maxConcurrentJobs must be at least 1');
    this.clock = deps.clock ?? systemClock;
  }

  /** 🚀 Starts one polling loop per slot. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.loops = Array.from({ length: this.options.maxConcurrentJobs }, (_unused, slot) => this.runSlot(slot, false));
    logger.info(`🏭 Worker pool started with ${this.options.maxConcurrentJobs} slot(s)`);
  }

  /** 🛑 Stops claiming new jobs and waits for in-flight ones. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.notify();
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('🛑 Worker pool stopped');
  }

  /** Wakes idle slots, e.g. right after a job was created. */
  notify(): void {
    this.wakeups.splice(0).forEach((wake) => wake());
  }

  /**
   * Runs every slot until no QUEUED job can be claimed. Meant for one-shot
   * processing and tests; do not combine with `start()`.
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from({ length: this.options.maxConcurrentJobs }, (_unused, slot) => this.runSlot(slot, true)));
  }

  getActiveJobIds(): string[] {
    return [...this.active.keys()];
  }

  /** Slots currently parked waiting for work. */
  getIdleSlotCount(): number {
    return this.wakeups.length;
  }

  isRunning(): boolean {
    return this.running;
  }

  private async runSlot(slot: number, untilEmpty: boolean): Promise<void> {
    while (untilEmpty || this.running) {
      let job: Job | null;
      try {
        job = await this.claimNext();
      } catch (error) {
        logger.error(`💥 Worker slot ${slot} failed to claim a job`, { error });
        if (untilEmpty) return;
        await this.waitForWork();
        continue;
      }

      if (!job) {
        if (untilEmpty) return;
        await this.waitForWork();
        continue;
      }

      this.active.set(job.id, slot);
      try {
        await this.execute(job);
      } catch (error) {
        logger.error(`💥 Worker slot ${slot} lost job ${job.id}`, { error });
      } finally {
        this.active.delete(job.id);
      }
    }
  }

  /**
   * Claims the oldest QUEUED job. Losing a race to another slot (or to a
   * cancel) is a ConflictError; the next candidate is tried.
   */
  private async claimNext(): Promise<Job | null> {
    const queued = await this.deps.store.list({ status: 'QUEUED' });
    for (const candidate of queued.reverse()) {
      try {
        return await this.deps.store.transition(candidate.id, 'QUEUED', 'RUNNING');
      } catch (error) {
        if (error instanceof ConflictError) continue;
        throw error;
      }
    }
    return null;
  }

  /** Parks a slot until `notify()` or the next poll, whichever comes first. */
  private waitForWork(): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        const index = this.wakeups.indexOf(done);
        if (index >= 0) this.wakeups.splice(index, 1);
        resolve();
      };
      const timer = setTimeout(done, this.options.pollIntervalMs);
      this.wakeups.push(done);
    });
  }

  private async execute(job: Job): Promise<void> {
    const log = jobLogger(job.id);
    const started = Date.now();
    log.info('▶️ claimed, starting scrape');

    let outcome: RunOutcome | null = null;
    let crash: ErrorEntry | null = null;
    try {
      outcome = await this.deps.runner.run(job.request, { checkpoint: (state) => this.checkpoint(job.id, state) }, job.id);
    } catch (error) {
      log.error('💥 scrape crashed', { error });
      crash = toErrorEntry(error, this.clock.now(), true);
    }

    const terminal = await this.finalize(job.id, outcome, crash);
    if (!terminal) return;

    this.deps.metrics?.recordJobDuration(terminal.status, Date.now() - started);
    log.info(`🏁 finished as ${terminal.status}`, {
      itemsReturned: terminal.result?.itemsReturned ?? 0,
      errors: terminal.errors.length,
    });
    this.deps.delivery?.enqueue(terminal);
  }

  /**
   * Persists progress after a page. A set cancel flag, or a job that is no
   * longer RUNNING, stops the loop.
   */
  private async checkpoint(jobId: string, state: CheckpointState): Promise<CheckpointDecision> {
    try {
      const updated = await this.deps.store.transition(jobId, 'RUNNING', 'RUNNING', (current) => ({
        progress: state.progress,
        errors: [...current.errors, ...state.newErrors],
      }));
      return updated.cancelRequested ? 'cancel' : 'continue';
    } catch (error) {
      if (error instanceof ConflictError) return 'cancel';
      throw error;
    }
  }

  private async finalize(jobId: string, result: RunOutcome | null, crash: ErrorEntry | null): Promise<Job | null> {
    const { store } = this.deps;
    try {
      if (result === null) {
        return await store.transition(jobId, 'RUNNING', 'FAILED', (current) => ({
          errors: [...current.errors, ...(crash ? [crash] : [])],
        }));
      }

      const outcome = result;
      const appendPending = (current: Job) => [...current.errors, ...outcome.pendingErrors];
      switch (outcome.status) {
        case 'succeeded':
          return await store.transition(jobId, 'RUNNING', 'SUCCEEDED', (current) => ({
            progress: outcome.progress,
            errors: appendPending(current),
            result: outcome.result,
          }));
        case 'failed':
          return await store.transition(jobId, 'RUNNING', 'FAILED', (current) => ({
            progress: outcome.progress,
            errors: appendPending(current),
          }));
        case 'cancelled':
          jobLogger(jobId).info('🚫 cancellation observed, discarding partial results');
          return await store.transition(jobId, 'RUNNING', 'CANCELLED', (current) => ({
            progress: outcome.progress,
            errors: appendPending(current),
          }));
        default:
          return null;
      }
    } catch (error) {
      if (error instanceof ConflictError) {
        const current = await store.get(jobId);
        jobLogger(jobId).warn(`⚠️ already ${current.status}, skipping final transition`);
        return null;
      }
      throw error;
    }
  }
}
