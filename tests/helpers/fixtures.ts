import type { AggregatedResultSet, Clock, CommentRecord, PostRecord, ScrapeRequest } from '../../src/types';
import { scrapeRequestSchema } from '../../src/middlewares/validation.middleware';

export const NOW = new Date('2024-06-01T12:00:00.000Z');
export const NOW_UTC_SECONDS = Math.floor(NOW.getTime() / 1000);

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date = NOW) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const makePost = (index: number, overrides: Partial<PostRecord> = {}): PostRecord => ({
  id: `p${index}`,
  title: `Post ${index}`,
  author: `author${index}`,
  subreddit: 'typescript',
  score: index,
  numComments: 0,
  createdUtc: NOW_UTC_SECONDS - index * 60,
  permalink: `https://www.reddit.com/r/typescript/comments/p${index}/post_${index}/`,
  url: `https://example.com/${index}`,
  selftext: '',
  domain: 'example.com',
  over18: false,
  pinned: false,
  ...overrides,
});

export const makePosts = (count: number, start = 0): PostRecord[] =>
  Array.from({ length: count }, (_unused, offset) => makePost(start + offset));

export const makeComment = (index: number, overrides: Partial<CommentRecord> = {}): CommentRecord => ({
  id: `c${index}`,
  body: `Comment ${index}`,
  author: `commenter${index}`,
  subreddit: 'typescript',
  score: 1,
  createdUtc: NOW_UTC_SECONDS - index * 60,
  permalink: `https://www.reddit.com/r/typescript/comments/p0/post_0/c${index}/`,
  parentId: 't3_p0',
  postTitle: 'Post 0',
  over18: false,
  ...overrides,
});

export const makeResultSet = (count: number): AggregatedResultSet => ({
  data: { posts: makePosts(count), comments: [], users: [], communities: [] },
  totalItems: count,
  itemsReturned: count,
  truncated: false,
});

/** Validated request with defaults applied; searches for "typescript" unless told otherwise. */
export const makeRequest = (overrides: Record<string, unknown> = {}): ScrapeRequest =>
  scrapeRequestSchema.parse(
    'startUrls' in overrides ? overrides : { searchTerm: 'typescript', searchForComments: false, ...overrides },
  );

export const instantSleep = async (): Promise<void> => undefined;
