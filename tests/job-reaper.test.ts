import { describe, it, expect } from 'vitest';
import { InMemoryJobStore } from '../src/jobs/JobStore';
import { JobReaper } from '../src/jobs/JobReaper';
import { ManualClock, makeRequest } from './helpers/fixtures';

const HOUR = 60 * 60 * 1000;

describe('JobReaper', () => {
  it('evicts terminal jobs past the retention window and reports them', async () => {
    const clock = new ManualClock();
    const store = new InMemoryJobStore(clock);
    const reported: string[][] = [];
    const reaper = new JobReaper(store, {
      retentionMs: 24 * HOUR,
      sweepIntervalMs: HOUR,
      onEvicted: (ids) => reported.push(ids),
      clock,
    });

    const old = await store.create(makeRequest());
    await store.transition(old.id, 'QUEUED', 'CANCELLED');
    const queued = await store.create(makeRequest());
    clock.advance(23 * HOUR);
    const recent = await store.create(makeRequest());
    await store.transition(recent.id, 'QUEUED', 'CANCELLED');

    expect(await reaper.sweep()).toEqual([]);

    clock.advance(2 * HOUR);
    expect(await reaper.sweep()).toEqual([old.id]);
    expect(reported).toEqual([[old.id]]);
    expect((await store.list()).map((job) => job.id)).toEqual([recent.id, queued.id]);
  });

  it('starts and stops its timer idempotently', () => {
    const reaper = new JobReaper(new InMemoryJobStore(), { retentionMs: HOUR, sweepIntervalMs: HOUR });
    reaper.start();
    reaper.start();
    reaper.stop();
    reaper.stop();
  });
});
