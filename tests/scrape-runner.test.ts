import { describe, it, expect } from 'vitest';
import { ScrapeRunner, type CheckpointState, type RunHooks } from '../src/jobs/ScrapeRunner';
import { FatalFetchError, TransientFetchError } from '../src/utils/errors';
import { RetryPolicy } from '../src/utils/retry';
import { MetricsCollector } from '../src/utils/metrics';
import { ManualClock, instantSleep, makeComment, makePosts, makeRequest } from './helpers/fixtures';
import { ScriptedGateway } from './helpers/fakes';

const SEARCH = 'search:typescript';

const createRunner = (gateway: ScriptedGateway, fetchTimeoutMs = 1000) =>
  new ScrapeRunner(gateway, {
    pageRetry: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }, instantSleep),
    fetchTimeoutMs,
    maxPageSize: 100,
    clock: new ManualClock(),
    metrics: new MetricsCollector(),
  });

const recordingHooks = (decide: (call: number) => 'continue' | 'cancel' = () => 'continue') => {
  const states: CheckpointState[] = [];
  const hooks: RunHooks = {
    checkpoint: async (state) => {
      states.push(state);
      return decide(states.length);
    },
  };
  return { states, hooks };
};

describe('ScrapeRunner', () => {
  it('follows cursors until the item ceiling is reached', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [
      { records: makePosts(25, 0), nextCursor: 'a' },
      { records: makePosts(25, 25), nextCursor: 'b' },
      { records: makePosts(25, 50), nextCursor: 'c' },
      { records: makePosts(25, 75), nextCursor: null },
    ]);
    const { states, hooks } = recordingHooks();

    const outcome = await createRunner(gateway).run(makeRequest({ maxItems: 50 }), hooks);

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.itemsReturned).toBe(50);
    expect(outcome.result.totalItems).toBe(75);
    expect(outcome.result.truncated).toBe(true);
    expect(outcome.progress.pagesProcessed).toBe(3);
    expect(outcome.progress.itemsFetched.posts).toBe(50);
    expect(gateway.calls.map((call) => call.cursor)).toEqual([null, 'a', 'b']);
    expect(gateway.calls[0].pageSize).toBe(25);
    expect(states.map((state) => state.progress.pagesProcessed)).toEqual([1, 2, 3]);
  });

  it('stops a task when the source has no next cursor', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [{ records: makePosts(4), nextCursor: null }]);

    const outcome = await createRunner(gateway).run(makeRequest());

    expect(outcome.status).toBe('succeeded');
    expect(gateway.calls).toHaveLength(1);
  });

  it('retries a rate-limited second page and records each failed attempt', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [
      { records: makePosts(2, 0), nextCursor: 'a' },
      new TransientFetchError('RATE_LIMITED', 'Too many requests', null, 2000),
      new TransientFetchError('RATE_LIMITED', 'Too many requests', null, 2000),
      { records: makePosts(3, 2), nextCursor: null },
    ]);
    const { states, hooks } = recordingHooks();

    const outcome = await createRunner(gateway).run(makeRequest(), hooks);

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.progress.pagesProcessed).toBe(2);
    expect(outcome.progress.pagesSkipped).toBe(0);
    expect(outcome.result.itemsReturned).toBe(5);
    expect(outcome.errors.map((entry) => entry.code)).toEqual(['RATE_LIMITED', 'RATE_LIMITED']);
    expect(outcome.errors.every((entry) => !entry.fatal)).toBe(true);
    expect(gateway.calls.map((call) => call.cursor)).toEqual([null, 'a', 'a', 'a']);
    expect(states.map((state) => state.newErrors.length)).toEqual([0, 2]);
    expect(outcome.pendingErrors).toEqual([]);
  });

  it('fails the run on a fatal error without retrying', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [
      { records: makePosts(5), nextCursor: 'a' },
      new FatalFetchError('BLOCKED', 'Forbidden'),
    ]);

    const outcome = await createRunner(gateway).run(makeRequest());

    expect(outcome.status).toBe('failed');
    expect(gateway.calls).toHaveLength(2);
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0]).toMatchObject({ code: 'BLOCKED', fatal: true });
    expect(outcome.pendingErrors.map((entry) => entry.code)).toEqual(['BLOCKED']);
  });

  it('skips a page that exhausts its retries and moves on to the next task', async () => {
    const gateway = new ScriptedGateway()
      .on(SEARCH, 'posts', [
        new TransientFetchError('NETWORK', 'reset'),
        new TransientFetchError('NETWORK', 'reset'),
        new TransientFetchError('NETWORK', 'reset'),
      ])
      .on(SEARCH, 'comments', [{ records: [makeComment(1), makeComment(2)], nextCursor: null }]);

    const outcome = await createRunner(gateway).run(makeRequest({ searchForComments: true }));

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.progress.pagesSkipped).toBe(1);
    expect(outcome.progress.pagesProcessed).toBe(1);
    expect(outcome.result.data.comments).toHaveLength(2);
    expect(outcome.errors.map((entry) => entry.code)).toEqual(['NETWORK', 'NETWORK', 'NETWORK', 'PAGE_SKIPPED']);
  });

  it('fails when every page was skipped', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [
      new TransientFetchError('PROXY', 'proxy down'),
      new TransientFetchError('PROXY', 'proxy down'),
      new TransientFetchError('PROXY', 'proxy down'),
    ]);

    const outcome = await createRunner(gateway).run(makeRequest());

    expect(outcome.status).toBe('failed');
    const last = outcome.errors[outcome.errors.length - 1];
    expect(last).toMatchObject({ code: 'ALL_PAGES_FAILED', fatal: true, details: '1 page(s) skipped' });
  });

  it('stops at the checkpoint that asks for cancellation', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [
      { records: makePosts(2, 0), nextCursor: 'a' },
      { records: makePosts(2, 2), nextCursor: 'b' },
      { records: makePosts(2, 4), nextCursor: null },
    ]);
    const { hooks } = recordingHooks((call) => (call === 2 ? 'cancel' : 'continue'));

    const outcome = await createRunner(gateway).run(makeRequest(), hooks);

    expect(outcome.status).toBe('cancelled');
    expect(outcome.progress.pagesProcessed).toBe(2);
    expect(gateway.calls).toHaveLength(2);
  });

  it('treats a page that outlives the fetch timeout as transient', async () => {
    const gateway = new ScriptedGateway().on(SEARCH, 'posts', [
      () => new Promise(() => undefined),
      { records: makePosts(1), nextCursor: null },
    ]);

    const outcome = await createRunner(gateway, 20).run(makeRequest());

    expect(outcome.status).toBe('succeeded');
    expect(outcome.errors.map((entry) => entry.code)).toEqual(['TIMEOUT']);
    expect(gateway.calls.map((call) => call.signal?.aborted)).toEqual([true, false]);
  });

  it('returns an empty success when nothing was found', async () => {
    const outcome = await createRunner(new ScriptedGateway()).run(makeRequest());

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.itemsReturned).toBe(0);
    expect(outcome.errors).toEqual([]);
  });
});
