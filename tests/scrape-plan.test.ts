import { describe, it, expect } from 'vitest';
import { planFetchTasks } from '../src/services/scrapePlan';
import { makeRequest } from './helpers/fixtures';

const summary = (tasks: ReturnType<typeof planFetchTasks>) =>
  tasks.map((task) => [task.resource.type, task.category, task.pageSize, task.pageLimit]);

describe('planFetchTasks', () => {
  it('plans an unbounded posts search by default', () => {
    expect(planFetchTasks(makeRequest(), 100)).toEqual([
      { resource: { type: 'search', query: 'typescript' }, category: 'posts', pageSize: 25, pageLimit: null },
    ]);
  });

  it('orders search categories and applies the page limits', () => {
    const request = makeRequest({
      searchForComments: true,
      searchForCommunities: true,
      searchForUsers: true,
      communityPagesLimit: 2,
      userPagesLimit: 3,
    });

    expect(summary(planFetchTasks(request, 100))).toEqual([
      ['search', 'posts', 25, null],
      ['search', 'comments', 20, null],
      ['search', 'communities', 25, 2],
      ['search', 'users', 25, 3],
    ]);
  });

  it('drops comments when skipComments is set', () => {
    const request = makeRequest({ searchForComments: true, skipComments: true });
    expect(summary(planFetchTasks(request, 100))).toEqual([['search', 'posts', 25, null]]);
  });

  it('clamps page sizes to the gateway maximum', () => {
    expect(planFetchTasks(makeRequest({ postsPerPage: 100 }), 50)[0].pageSize).toBe(50);
  });

  it('plans start URLs in order and skips unknown ones', () => {
    const request = makeRequest({
      startUrls: [
        'https://www.reddit.com/r/typescript',
        'https://www.reddit.com/wiki/index',
        'https://www.reddit.com/user/someone',
        'https://www.reddit.com/r/node/comments/abc123/title/',
      ],
      searchForUsers: true,
      searchForCommunities: true,
      userPagesLimit: 2,
    });

    expect(summary(planFetchTasks(request, 100))).toEqual([
      ['subreddit', 'posts', 25, null],
      ['subreddit', 'comments', 20, null],
      ['subreddit', 'communities', 25, 1],
      ['user', 'posts', 25, 2],
      ['user', 'comments', 20, 2],
      ['user', 'users', 25, 1],
      ['post', 'posts', 25, 1],
      ['post', 'comments', 20, 1],
    ]);
  });

  it('honours skipCommunity and skipUserPosts for start URLs', () => {
    const request = makeRequest({
      startUrls: ['https://www.reddit.com/r/typescript', 'https://www.reddit.com/u/someone'],
      skipCommunity: true,
      skipUserPosts: true,
    });

    expect(planFetchTasks(request, 100)).toEqual([]);
  });
});
