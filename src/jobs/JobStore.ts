import { v4 as uuidv4 } from 'uuid';
import type { Clock, Job, JobListFilter, JobMutator, JobStatus, ScrapeRequest } from '../types';
import { NotFoundError } from '../utils/errors';
import { systemClock } from '../utils/time';
import { applyTransition, freezeJob, isTerminal, newJobRecord } from './jobState';

/**
 * 🗃️ Authoritative job state.
 *
 * `transition` is the only mutation path. Every returned job is a frozen
 * snapshot, so callers can hold on to it without seeing later writes.
 */
export interface JobStore {
  create(request: ScrapeRequest): Promise<Job>;
  /** @throws NotFoundError */
  get(id: string): Promise<Job>;
  /** Newest first. */
  list(filter?: JobListFilter): Promise<Job[]>;
  /**
   * Atomic compare-and-update.
   * @throws ConflictError when the job is not in `expected`
   * @throws IllegalTransitionError when the edge or the resulting state is invalid
   */
  transition(id: string, expected: JobStatus, next: JobStatus, mutator?: JobMutator): Promise<Job>;
  /** Removes terminal jobs finished before `cutoff` and returns their ids. */
  evictTerminalBefore(cutoff: Date): Promise<string[]>;
}

export const byNewestFirst = (a: Job, b: Job): number => b.sequence - a.sequence;

/**
 * In-process store. Each operation reads, checks and writes without
 * yielding to the event loop, which makes `transition` atomic.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();
  private sequence = 0;

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly generateId: () => string = () => uuidv4(),
  ) {}

  async create(request: ScrapeRequest): Promise<Job> {
    this.sequence += 1;
    const job = freezeJob(newJobRecord(this.generateId(), request, this.clock.now(), this.sequence));
    this.jobs.set(job.id, job);
    return job;
  }

  async get(id: string): Promise<Job> {
    return this.require(id);
  }

  async list(filter: JobListFilter = {}): Promise<Job[]> {
    const matching = [...this.jobs.values()]
      .filter((job) => !filter.status || job.status === filter.status)
      .sort(byNewestFirst);
    return filter.limit !== undefined ? matching.slice(0, filter.limit) : matching;
  }

  async transition(id: string, expected: JobStatus, next: JobStatus, mutator?: JobMutator): Promise<Job> {
    const current = this.require(id);
    const updated = freezeJob(applyTransition(current, expected, next, mutator, this.clock.now()));
    this.jobs.set(id, updated);
    return updated;
  }

  async evictTerminalBefore(cutoff: Date): Promise<string[]> {
    const evicted: string[] = [];
    for (const job of this.jobs.values()) {
      if (isTerminal(job.status) && job.finishedAt !== null && Date.parse(job.finishedAt) < cutoff.getTime()) {
        evicted.push(job.id);
      }
    }
    evicted.forEach((id) => this.jobs.delete(id));
    return evicted;
  }

  get size(): number {
    return this.jobs.size;
  }

  private require(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) throw new NotFoundError(`Job ${id}`);
    return job;
  }
}
