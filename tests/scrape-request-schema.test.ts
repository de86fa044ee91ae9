import { describe, it, expect } from 'vitest';
import { scrapeRequestSchema } from '../src/middlewares/validation.middleware';

const messages = (input: unknown): string[] => {
  const parsed = scrapeRequestSchema.safeParse(input);
  return parsed.success ? [] : parsed.error.issues.map((issue) => issue.message);
};

describe('scrapeRequestSchema', () => {
  it('fills in defaults', () => {
    expect(scrapeRequestSchema.parse({ searchTerm: 'typescript' })).toEqual({
      searchTerm: 'typescript',
      searchForPosts: true,
      searchForComments: true,
      searchForCommunities: false,
      searchForUsers: false,
      skipComments: false,
      skipUserPosts: false,
      skipCommunity: false,
      includeNSFW: false,
      sortSearch: 'hot',
      filterByDate: 'all',
      maxItems: 100,
      postsPerPage: 25,
      commentsPerPage: 20,
      communityPagesLimit: 1,
      userPagesLimit: 1,
      outputFormat: 'json',
    });
  });

  it('requires exactly one of startUrls and searchTerm', () => {
    expect(messages({})).toEqual(['Either startUrls or searchTerm is required']);
    expect(messages({ searchTerm: 'ts', startUrls: ['https://www.reddit.com/r/typescript'] })).toEqual([
      'Provide either startUrls or searchTerm, not both',
    ]);
  });

  it('rejects non-Reddit start URLs and empty lists', () => {
    expect(messages({ startUrls: ['https://example.com/r/typescript'] })).toEqual(['Each start URL must point to reddit.com']);
    expect(messages({ startUrls: [] })).toContain('startUrls must not be empty');
  });

  it('needs at least one category to search for', () => {
    expect(
      messages({ searchTerm: 'ts', searchForPosts: false, searchForComments: false }),
    ).toEqual(['At least one of searchForPosts, searchForComments, searchForCommunities or searchForUsers must be true']);
  });

  it('bounds numeric options', () => {
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', maxItems: 0 }).success).toBe(false);
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', postsPerPage: 101 }).success).toBe(false);
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', userPagesLimit: 51 }).success).toBe(false);
  });

  it('rejects unknown keys and unsupported enums', () => {
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', extra: true }).success).toBe(false);
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', outputFormat: 'pdf' }).success).toBe(false);
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', filterByDate: 'decade' }).success).toBe(false);
  });

  it('accepts http and https webhooks only', () => {
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', webhookUrl: 'https://hooks.test/a' }).success).toBe(true);
    expect(messages({ searchTerm: 'ts', webhookUrl: 'ftp://hooks.test/a' })).toEqual(['webhookUrl must use http or https']);
  });

  it('validates postDateLimit as a date', () => {
    expect(scrapeRequestSchema.safeParse({ searchTerm: 'ts', postDateLimit: '2024-05-01' }).success).toBe(true);
    expect(messages({ searchTerm: 'ts', postDateLimit: 'last tuesday' })).toEqual(['postDateLimit must be an ISO-8601 date']);
  });
});
