import { z, ZodError, type ZodSchema } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import { isRedditUrl } from '../adapters/reddit/urlParser';
import { buildErrorResponse } from '../services/responseBuilder';
import type { ResponseError } from '../types';

export const zodIssues = (error: ZodError): ResponseError[] =>
  error.issues.map((issue) => ({
    code: 'INVALID_PARAMS',
    message: issue.message,
    details: issue.path.length > 0 ? issue.path.join('.') : null,
  }));

/**
 * Validates `{ body, query, params }` against `schema`. On success the
 * parsed body (defaults applied) replaces `req.body`.
 */
export const validate = (schema: ZodSchema) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = await schema.safeParseAsync({
      body: req.body,
      query: req.query,
      params: req.params,
    });

    if (!parsed.success) {
      const body: unknown = req.body;
      const requestParams = typeof body === 'object' && body !== null ? { ...body } : {};
      res.status(400).json(buildErrorResponse(zodIssues(parsed.error), requestParams, new Date()));
      return;
    }

    const data: unknown = parsed.data;
    if (typeof data === 'object' && data !== null && 'body' in data && data.body !== undefined) {
      req.body = data.body;
    }
    next();
  };
};

// ---------------------------------------------------------------------------
// Scrape request schemas
// ---------------------------------------------------------------------------

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const sortOption = z.enum(['hot', 'new', 'top', 'rising', 'relevance']);
const dateFilter = z.enum(['hour', 'day', 'week', 'month', 'year', 'all']);
export const outputFormat = z.enum(['json', 'csv', 'rss', 'xml']);
export const jobStatus = z.enum(['QUEUED', 'RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELLED']);

const pageCount = (fallback: number) => z.number().int().min(1).max(50).default(fallback);
const pageSize = (fallback: number) => z.number().int().min(1).max(100).default(fallback);

export const scrapeRequestSchema = z
  .object({
    startUrls: z
      .array(
        z
          .string()
          .url('Each start URL must be a valid URL')
          .refine(isRedditUrl, { message: 'Each start URL must point to reddit.com' }),
      )
      .min(1, 'startUrls must not be empty')
      .max(100)
      .optional(),
    searchTerm: z.string().trim().min(1, 'searchTerm must not be empty').max(500).optional(),
    searchForPosts: z.boolean().default(true),
    searchForComments: z.boolean().default(true),
    searchForCommunities: z.boolean().default(false),
    searchForUsers: z.boolean().default(false),
    skipComments: z.boolean().default(false),
    skipUserPosts: z.boolean().default(false),
    skipCommunity: z.boolean().default(false),
    includeNSFW: z.boolean().default(false),
    sortSearch: sortOption.default('hot'),
    filterByDate: dateFilter.default('all'),
    postDateLimit: z
      .string()
      .refine((value) => ISO_DATE.test(value) || !Number.isNaN(Date.parse(value)), {
        message: 'postDateLimit must be an ISO-8601 date',
      })
      .optional(),
    maxItems: z.number().int().min(1).max(10_000).default(100),
    postsPerPage: pageSize(25),
    commentsPerPage: pageSize(20),
    communityPagesLimit: pageCount(1),
    userPagesLimit: pageCount(1),
    outputFormat: outputFormat.default('json'),
    webhookUrl: z
      .string()
      .url('webhookUrl must be a valid URL')
      .refine((value) => /^https?:\/\//i.test(value), { message: 'webhookUrl must use http or https' })
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.startUrls && value.searchTerm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Provide either startUrls or searchTerm, not both',
        path: ['searchTerm'],
      });
    }
    if (!value.startUrls && !value.searchTerm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Either startUrls or searchTerm is required',
        path: ['startUrls'],
      });
    }
    if (
      !value.searchForPosts &&
      !value.searchForComments &&
      !value.searchForCommunities &&
      !value.searchForUsers
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At least one of searchForPosts, searchForComments, searchForCommunities or searchForUsers must be true',
      });
    }
  });

export const webhookTestSchema = z.object({
  url: z
    .string()
    .url('url must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), { message: 'url must use http or https' }),
});

// Common validation schemas
export const scrapeSchemas = {
  scrape: z.object({ body: scrapeRequestSchema }),

  webhookTest: z.object({ body: webhookTestSchema }),

  jobId: z.object({
    params: z.object({ id: z.string().uuid('Job id must be a UUID') }),
  }),

  listJobsQuery: z.object({
    status: jobStatus.optional(),
    limit: z.coerce.number().int().min(1).max(1000).optional(),
  }),

  resultQuery: z.object({
    format: outputFormat.optional(),
  }),

  subredditParams: z.object({
    name: z.string().regex(/^[A-Za-z0-9_]{2,21}$/, 'Invalid subreddit name'),
  }),

  subredditQuery: z.object({
    limit: z.coerce.number().int().min(1).max(100).default(10),
    sort: sortOption.default('hot'),
  }),
};
