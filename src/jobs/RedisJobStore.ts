import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Clock, Job, JobListFilter, JobMutator, JobRecord, JobStatus, ScrapeRequest } from '../types';
import { ConflictError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { systemClock } from '../utils/time';
import { applyTransition, freezeJob, isTerminal, newJobRecord } from './jobState';
import { byNewestFirst, type JobStore } from './JobStore';

/**
 * Writes ARGV[2] only when the stored document still has version ARGV[1].
 * Returns 1 on commit, 0 on a lost race, -1 when the key vanished.
 */
const COMPARE_AND_SET = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
local doc = cjson.decode(current)
if tonumber(doc.version) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
return 1
`;

const MAX_CAS_ATTEMPTS = 5;

// Loose structural check on what comes back from Redis; the job shape itself is ours.
const storedJobSchema = z
  .object({
    id: z.string(),
    status: z.enum(['QUEUED', 'RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELLED']),
    sequence: z.number(),
    version: z.number(),
  })
  .passthrough();

const isJobRecord = (value: unknown): value is JobRecord => storedJobSchema.safeParse(value).success;

export interface RedisJobPipeline {
  set(key: string, value: string): RedisJobPipeline;
  zadd(key: string, score: number, member: string): RedisJobPipeline;
  del(...keys: string[]): RedisJobPipeline;
  zrem(key: string, ...members: string[]): RedisJobPipeline;
  exec(): Promise<unknown>;
}

/** The slice of the ioredis client the store talks to. */
export interface RedisJobClient {
  get(key: string): Promise<string | null>;
  mget(keys: string[]): Promise<Array<string | null>>;
  incr(key: string): Promise<number>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  zrem(key: string, ...members: string[]): Promise<number>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  multi(): RedisJobPipeline;
}

/**
 * 🧰 Redis-backed store: one JSON document per job plus a sorted-set index
 * scored by creation sequence. Transitions commit through a Lua
 * compare-and-set on `version` and re-run against fresh state on a lost race.
 */
export class RedisJobStore implements JobStore {
  private readonly indexKey: string;
  private readonly sequenceKey: string;

  constructor(
    private readonly redis: RedisJobClient,
    private readonly prefix = 'reddit-extractor',
    private readonly clock: Clock = systemClock,
  ) {
    this.indexKey = `${prefix}:jobs`;
    this.sequenceKey = `${prefix}:jobs:seq`;
  }

  private jobKey(id: string): string {
    return `${this.prefix}:job:${id}`;
  }

  async create(request: ScrapeRequest): Promise<Job> {
    const sequence = await this.redis.incr(this.sequenceKey);
    const record = newJobRecord(uuidv4(), request, this.clock.now(), sequence);

    await this.redis
      .multi()
      .set(this.jobKey(record.id), JSON.stringify(record))
      .zadd(this.indexKey, sequence, record.id)
      .exec();

    return freezeJob(record);
  }

  async get(id: string): Promise<Job> {
    const job = await this.read(id);
    if (!job) throw new NotFoundError(`Job ${id}`);
    return job;
  }

  async list(filter: JobListFilter = {}): Promise<Job[]> {
    const ids = await this.redis.zrevrange(this.indexKey, 0, -1);
    if (ids.length === 0) return [];

    const raws = await this.redis.mget(ids.map((id) => this.jobKey(id)));
    const stale: string[] = [];
    const jobs: Job[] = [];

    raws.forEach((raw, index) => {
      const job = raw === null ? null : this.parse(raw);
      if (!job) {
        stale.push(ids[index]);
        return;
      }
      if (!filter.status || job.status === filter.status) jobs.push(job);
    });

    if (stale.length > 0) await this.redis.zrem(this.indexKey, ...stale);

    jobs.sort(byNewestFirst);
    return filter.limit !== undefined ? jobs.slice(0, filter.limit) : jobs;
  }

  async transition(id: string, expected: JobStatus, next: JobStatus, mutator?: JobMutator): Promise<Job> {
    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt += 1) {
      const current = await this.get(id);
      const updated = applyTransition(current, expected, next, mutator, this.clock.now());

      const committed = await this.redis.eval(
        COMPARE_AND_SET,
        1,
        this.jobKey(id),
        String(current.version),
        JSON.stringify(updated),
      );

      if (committed === 1) return freezeJob(updated);
      if (committed === -1) throw new NotFoundError(`Job ${id}`);

      logger.debug(`[Job ${id}] lost compare-and-set race (attempt ${attempt}), re-reading`);
    }

    throw new ConflictError(`Job ${id} kept changing while moving to ${next}`);
  }

  async evictTerminalBefore(cutoff: Date): Promise<string[]> {
    const jobs = await this.list();
    const expired = jobs
      .filter((job) => isTerminal(job.status) && job.finishedAt !== null)
      .filter((job) => Date.parse(job.finishedAt ?? '') < cutoff.getTime())
      .map((job) => job.id);

    if (expired.length === 0) return [];

    await this.redis
      .multi()
      .del(...expired.map((id) => this.jobKey(id)))
      .zrem(this.indexKey, ...expired)
      .exec();

    return expired;
  }

  private async read(id: string): Promise<Job | null> {
    const raw = await this.redis.get(this.jobKey(id));
    return raw === null ? null : this.parse(raw);
  }

  private parse(raw: string): Job | null {
    try {
      const value: unknown = JSON.parse(raw);
      if (isJobRecord(value)) return freezeJob(value);
      logger.warn('⚠️ Ignoring malformed job document in Redis');
      return null;
    } catch (error) {
      logger.warn('⚠️ Ignoring unparsable job document in Redis', { error });
      return null;
    }
  }
}
