import type {
  AggregatedResultSet,
  DeepReadonly,
  ErrorEntry,
  Job,
  ResponseError,
  ResultCollections,
  ScrapeRequest,
  ScrapeResponse,
} from '../types';
import { formatExecutionTime } from '../utils/time';
import { OutputFormatter } from './OutputFormatter';

export const emptyCollections = (): ResultCollections => ({ posts: [], comments: [], users: [], communities: [] });

export const toResponseErrors = (errors: ReadonlyArray<DeepReadonly<ErrorEntry>>): ResponseError[] =>
  errors.map(({ code, message, details }) => ({ code, message, details }));

export interface EnvelopeInput {
  request: DeepReadonly<ScrapeRequest>;
  result: DeepReadonly<AggregatedResultSet> | null;
  success: boolean;
  errors: ResponseError[];
  scrapedAt: Date;
  executionTimeMs: number;
  /** Records seen when there is no result (failed or cancelled runs). */
  itemsSeen?: number;
}

/**
 * 📦 Builds the response envelope shared by sync responses, job results and
 * webhook payloads. Non-JSON formats also carry the rendered document.
 */
export const buildScrapeResponse = (input: EnvelopeInput): ScrapeResponse => {
  const data = input.success && input.result ? input.result.data : emptyCollections();
  const response: ScrapeResponse = {
    success: input.success,
    data,
    metadata: {
      totalItems: input.result?.totalItems ?? input.itemsSeen ?? 0,
      itemsReturned: input.success && input.result ? input.result.itemsReturned : 0,
      requestParams: input.request,
      scrapedAt: input.scrapedAt.toISOString(),
      executionTime: formatExecutionTime(input.executionTimeMs),
    },
    errors: input.errors,
  };

  const format = input.request.outputFormat;
  if (input.success && format !== 'json') {
    response.formattedData = {
      format,
      contentType: OutputFormatter.contentType(format),
      data: OutputFormatter.render(data, format, response.metadata),
    };
  }

  return response;
};

const elapsedMs = (job: Job): number => {
  if (!job.finishedAt) return 0;
  return Date.parse(job.finishedAt) - Date.parse(job.startedAt ?? job.createdAt);
};

/**
 * Envelope for a terminal job. Cancelled jobs report `JOB_CANCELLED`.
 */
export const responseFromJob = (job: Job): ScrapeResponse => {
  const errors = toResponseErrors(job.errors);
  if (job.status === 'CANCELLED') {
    errors.push({ code: 'JOB_CANCELLED', message: 'Job was cancelled before completion', details: null });
  }

  return buildScrapeResponse({
    request: job.request,
    result: job.result,
    success: job.status === 'SUCCEEDED',
    errors,
    scrapedAt: new Date(job.finishedAt ?? job.createdAt),
    executionTimeMs: elapsedMs(job),
    itemsSeen: job.progress.itemsSeen,
  });
};

/**
 * Error-shaped envelope for requests rejected before any scraping happened.
 */
export const buildErrorResponse = (
  errors: ResponseError[],
  requestParams: Record<string, unknown>,
  scrapedAt: Date,
): ScrapeResponse => ({
  success: false,
  data: emptyCollections(),
  metadata: {
    totalItems: 0,
    itemsReturned: 0,
    requestParams,
    scrapedAt: scrapedAt.toISOString(),
    executionTime: formatExecutionTime(0),
  },
  errors,
});
