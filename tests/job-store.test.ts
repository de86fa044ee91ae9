import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryJobStore } from '../src/jobs/JobStore';
import { ConflictError, IllegalTransitionError, NotFoundError, errorEntry } from '../src/utils/errors';
import { emptyProgress } from '../src/jobs/jobState';
import type { AggregatedResultSet } from '../src/types';
import { ManualClock, NOW, makePosts, makeRequest } from './helpers/fixtures';

const resultWith = (count: number): AggregatedResultSet => ({
  data: { posts: makePosts(count), comments: [], users: [], communities: [] },
  totalItems: count,
  itemsReturned: count,
  truncated: false,
});

describe('InMemoryJobStore', () => {
  let clock: ManualClock;
  let store: InMemoryJobStore;
  let ids: string[];

  beforeEach(() => {
    clock = new ManualClock();
    ids = ['job-1', 'job-2', 'job-3', 'job-4'];
    let next = 0;
    store = new InMemoryJobStore(clock, () => ids[next++]);
  });

  it('creates QUEUED jobs with only createdAt set', async () => {
    const job = await store.create(makeRequest());

    expect(job.id).toBe('job-1');
    expect(job.status).toBe('QUEUED');
    expect(job.createdAt).toBe(NOW.toISOString());
    expect(job.startedAt).toBeNull();
    expect(job.finishedAt).toBeNull();
    expect(job.progress).toEqual(emptyProgress());
    expect(job.result).toBeNull();
    expect(job.errors).toEqual([]);
  });

  it('returns frozen snapshots that ignore later writes', async () => {
    const created = await store.create(makeRequest());
    await store.transition(created.id, 'QUEUED', 'RUNNING');

    expect(created.status).toBe('QUEUED');
    expect(Object.isFrozen(created)).toBe(true);
    expect(Object.isFrozen(created.progress.itemsFetched)).toBe(true);
    expect(Reflect.set(created, 'status', 'FAILED')).toBe(false);
    expect(Reflect.set(created.progress, 'pagesProcessed', 5)).toBe(false);
    expect(created.status).toBe('QUEUED');
  });

  it('does not share the caller request object', async () => {
    const request = makeRequest();
    const job = await store.create(request);
    request.maxItems = 1;

    expect(job.request.maxItems).toBe(100);
  });

  it('throws NotFoundError for unknown ids', async () => {
    await expect(store.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.transition('missing', 'QUEUED', 'RUNNING')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists newest first and filters by status', async () => {
    await store.create(makeRequest());
    await store.create(makeRequest());
    await store.create(makeRequest());
    await store.transition('job-2', 'QUEUED', 'RUNNING');

    expect((await store.list()).map((job) => job.id)).toEqual(['job-3', 'job-2', 'job-1']);
    expect((await store.list({ status: 'QUEUED' })).map((job) => job.id)).toEqual(['job-3', 'job-1']);
    expect((await store.list({ limit: 1 })).map((job) => job.id)).toEqual(['job-3']);
  });

  it('sets startedAt and finishedAt exactly once', async () => {
    const job = await store.create(makeRequest());
    clock.advance(1000);
    const running = await store.transition(job.id, 'QUEUED', 'RUNNING');
    clock.advance(1000);
    const progressed = await store.transition(job.id, 'RUNNING', 'RUNNING');
    clock.advance(1000);
    const done = await store.transition(job.id, 'RUNNING', 'SUCCEEDED', () => ({ result: resultWith(1) }));

    expect(running.startedAt).toBe('2024-06-01T12:00:01.000Z');
    expect(progressed.startedAt).toBe('2024-06-01T12:00:01.000Z');
    expect(done.startedAt).toBe('2024-06-01T12:00:01.000Z');
    expect(done.finishedAt).toBe('2024-06-01T12:00:03.000Z');
    expect(done.version).toBe(3);
  });

  it('rejects a transition from an unexpected status with ConflictError', async () => {
    const job = await store.create(makeRequest());
    await store.transition(job.id, 'QUEUED', 'RUNNING');

    await expect(store.transition(job.id, 'QUEUED', 'RUNNING')).rejects.toBeInstanceOf(ConflictError);
  });

  it('lets exactly one of two concurrent claims win', async () => {
    const job = await store.create(makeRequest());

    const results = await Promise.allSettled([
      store.transition(job.id, 'QUEUED', 'RUNNING'),
      store.transition(job.id, 'QUEUED', 'RUNNING'),
    ]);

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((result) => result.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason instanceof ConflictError).toBe(true);
  });

  it('rejects edges outside the lifecycle', async () => {
    const job = await store.create(makeRequest());

    await expect(store.transition(job.id, 'QUEUED', 'SUCCEEDED')).rejects.toBeInstanceOf(IllegalTransitionError);
    await store.transition(job.id, 'QUEUED', 'CANCELLED');
    await expect(store.transition(job.id, 'CANCELLED', 'RUNNING')).rejects.toBeInstanceOf(IllegalTransitionError);
  });

  it('requires an error entry to fail and a result to succeed', async () => {
    const job = await store.create(makeRequest());
    await store.transition(job.id, 'QUEUED', 'RUNNING');

    await expect(store.transition(job.id, 'RUNNING', 'FAILED')).rejects.toBeInstanceOf(IllegalTransitionError);
    await expect(store.transition(job.id, 'RUNNING', 'SUCCEEDED')).rejects.toBeInstanceOf(IllegalTransitionError);

    const failed = await store.transition(job.id, 'RUNNING', 'FAILED', () => ({
      errors: [errorEntry('BLOCKED', 'Access blocked by Reddit', clock.now(), { fatal: true })],
    }));
    expect(failed.status).toBe('FAILED');
    expect(failed.errors.map((entry) => entry.code)).toEqual(['BLOCKED']);
  });

  it('rejects progress that goes backwards and leaves the job untouched', async () => {
    const job = await store.create(makeRequest());
    await store.transition(job.id, 'QUEUED', 'RUNNING', () => ({
      progress: { ...emptyProgress(), pagesProcessed: 2, itemsSeen: 50 },
    }));

    await expect(
      store.transition(job.id, 'RUNNING', 'RUNNING', () => ({
        progress: { ...emptyProgress(), pagesProcessed: 1, itemsSeen: 50 },
      })),
    ).rejects.toBeInstanceOf(IllegalTransitionError);
    expect((await store.get(job.id)).progress.pagesProcessed).toBe(2);
  });

  it('drops partial results when a job is cancelled', async () => {
    const job = await store.create(makeRequest());
    await store.transition(job.id, 'QUEUED', 'RUNNING');

    await expect(
      store.transition(job.id, 'RUNNING', 'RUNNING', () => ({ result: resultWith(1) })),
    ).rejects.toBeInstanceOf(IllegalTransitionError);

    const cancelled = await store.transition(job.id, 'RUNNING', 'CANCELLED', () => ({ cancelRequested: true }));
    expect(cancelled.result).toBeNull();
    expect(cancelled.cancelRequested).toBe(true);
  });

  it('keeps identity fields out of the mutator reach', async () => {
    const job = await store.create(makeRequest());
    const running = await store.transition(job.id, 'QUEUED', 'RUNNING', (current) => {
      expect(current.status).toBe('QUEUED');
      return { cancelRequested: false };
    });

    expect(running.id).toBe(job.id);
    expect(running.request).toEqual(job.request);
    expect(running.createdAt).toBe(job.createdAt);
  });

  it('evicts only terminal jobs finished before the cutoff', async () => {
    await store.create(makeRequest());
    await store.create(makeRequest());
    await store.create(makeRequest());
    await store.transition('job-1', 'QUEUED', 'CANCELLED');
    clock.advance(60_000);
    await store.transition('job-2', 'QUEUED', 'CANCELLED');

    const evicted = await store.evictTerminalBefore(new Date(NOW.getTime() + 30_000));

    expect(evicted).toEqual(['job-1']);
    expect(store.size).toBe(2);
    await expect(store.get('job-1')).rejects.toBeInstanceOf(NotFoundError);
  });
});
