import { describe, it, expect } from 'vitest';
import { ResultAggregator, type AggregatorOptions } from '../src/services/ResultAggregator';
import type { UserRecord } from '../src/types';
import { ManualClock, NOW_UTC_SECONDS, makeComment, makePost, makePosts } from './helpers/fixtures';

const options = (overrides: Partial<AggregatorOptions> = {}): AggregatorOptions => ({
  maxItems: 100,
  includeNSFW: false,
  filterByDate: 'all',
  ...overrides,
});

const DAY = 24 * 60 * 60;

const makeUser = (createdUtc: number): UserRecord => ({
  id: 'u1',
  username: 'old_user',
  profileUrl: 'https://www.reddit.com/user/old_user',
  linkKarma: 10,
  commentKarma: 20,
  createdUtc,
  over18: false,
});

describe('ResultAggregator', () => {
  it('stops at maxItems while counting every record seen', () => {
    const aggregator = new ResultAggregator(options({ maxItems: 50 }), new ManualClock());

    expect(aggregator.add('posts', makePosts(25, 0)).truncated).toBe(false);
    expect(aggregator.add('posts', makePosts(25, 25)).truncated).toBe(false);
    const third = aggregator.add('posts', makePosts(25, 50));

    expect(third).toEqual({ accepted: 0, filtered: 0, discarded: 25, truncated: true });
    const result = aggregator.toResultSet();
    expect(result.itemsReturned).toBe(50);
    expect(result.totalItems).toBe(75);
    expect(result.truncated).toBe(true);
    expect(result.data.posts[0].id).toBe('p0');
    expect(result.data.posts[49].id).toBe('p49');
  });

  it('discards the rest of the page that crosses the ceiling', () => {
    const aggregator = new ResultAggregator(options({ maxItems: 30 }), new ManualClock());
    aggregator.add('posts', makePosts(25, 0));

    const second = aggregator.add('posts', makePosts(25, 25));

    expect(second).toEqual({ accepted: 5, filtered: 0, discarded: 20, truncated: true });
    expect(aggregator.itemsReturned).toBe(30);
    expect(aggregator.totalItems).toBe(50);
  });

  it('applies the ceiling across categories', () => {
    const aggregator = new ResultAggregator(options({ maxItems: 3 }), new ManualClock());
    aggregator.add('posts', makePosts(2));
    const comments = aggregator.add('comments', [makeComment(1), makeComment(2)]);

    expect(comments).toEqual({ accepted: 1, filtered: 0, discarded: 1, truncated: true });
    expect(aggregator.countFor('posts')).toBe(2);
    expect(aggregator.countFor('comments')).toBe(1);
  });

  it('drops NSFW records before they count toward the ceiling', () => {
    const aggregator = new ResultAggregator(options({ maxItems: 2 }), new ManualClock());
    const outcome = aggregator.add('posts', [makePost(1, { over18: true }), makePost(2), makePost(3)]);

    expect(outcome).toEqual({ accepted: 2, filtered: 1, discarded: 0, truncated: false });
    expect(aggregator.toResultSet().data.posts.map((post) => post.id)).toEqual(['p2', 'p3']);
    expect(aggregator.totalItems).toBe(3);
  });

  it('keeps NSFW records when includeNSFW is set', () => {
    const aggregator = new ResultAggregator(options({ includeNSFW: true }), new ManualClock());
    expect(aggregator.add('posts', [makePost(1, { over18: true })]).accepted).toBe(1);
  });

  it('filters posts older than the filterByDate window', () => {
    const aggregator = new ResultAggregator(options({ filterByDate: 'day' }), new ManualClock());
    const outcome = aggregator.add('posts', [
      makePost(1, { createdUtc: NOW_UTC_SECONDS - 2 * DAY }),
      makePost(2, { createdUtc: NOW_UTC_SECONDS - 60 }),
    ]);

    expect(outcome.filtered).toBe(1);
    expect(aggregator.toResultSet().data.posts.map((post) => post.id)).toEqual(['p2']);
  });

  it('composes filterByDate with postDateLimit, keeping the later bound', () => {
    const aggregator = new ResultAggregator(
      options({ filterByDate: 'week', postDateLimit: '2024-05-31T00:00:00Z' }),
      new ManualClock(),
    );
    const outcome = aggregator.add('posts', [
      makePost(1, { createdUtc: Date.parse('2024-05-30T12:00:00Z') / 1000 }),
      makePost(2, { createdUtc: Date.parse('2024-05-31T06:00:00Z') / 1000 }),
    ]);

    expect(outcome).toEqual({ accepted: 1, filtered: 1, discarded: 0, truncated: false });
    expect(aggregator.toResultSet().data.posts[0].id).toBe('p2');
  });

  it('does not date-filter users', () => {
    const aggregator = new ResultAggregator(options({ filterByDate: 'hour' }), new ManualClock());
    expect(aggregator.add('users', [makeUser(NOW_UTC_SECONDS - 365 * DAY)]).accepted).toBe(1);
  });

  it('hands out copies of its collections', () => {
    const aggregator = new ResultAggregator(options(), new ManualClock());
    aggregator.add('posts', makePosts(1));
    const first = aggregator.toResultSet();
    first.data.posts.pop();

    expect(aggregator.toResultSet().data.posts).toHaveLength(1);
  });
});
