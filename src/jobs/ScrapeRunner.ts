import type {
  AggregatedResultSet,
  Clock,
  DeepReadonly,
  ErrorEntry,
  FetchGateway,
  FetchPageResult,
  JobProgress,
  RecordCategory,
  ScrapeRequest,
} from '../types';
import { aggregatorOptionsFrom, ResultAggregator } from '../services/ResultAggregator';
import { planFetchTasks, type FetchTask } from '../services/scrapePlan';
import { RECORD_CATEGORIES } from '../utils/constants';
import { FatalFetchError, FetchError, TransientFetchError, errorEntry, toErrorEntry } from '../utils/errors';
import { logger } from '../utils/logger';
import type { MetricsCollector } from '../utils/metrics';
import type { RetryPolicy } from '../utils/retry';
import { systemClock, withTimeout } from '../utils/time';
import { emptyProgress } from './jobState';

export interface CheckpointState {
  progress: JobProgress;
  /** Errors recorded since the previous checkpoint. */
  newErrors: ErrorEntry[];
}

export type CheckpointDecision = 'continue' | 'cancel';

export interface RunHooks {
  /** Called after every page (fetched or skipped). */
  checkpoint(state: CheckpointState): Promise<CheckpointDecision>;
}

interface OutcomeBase {
  progress: JobProgress;
  /** Every error recorded during the run. */
  errors: ErrorEntry[];
  /** Errors not yet handed to a checkpoint. */
  pendingErrors: ErrorEntry[];
}

export type RunOutcome =
  | (OutcomeBase & { status: 'succeeded'; result: AggregatedResultSet })
  | (OutcomeBase & { status: 'failed' })
  | (OutcomeBase & { status: 'cancelled' });

export interface ScrapeRunnerOptions {
  pageRetry: RetryPolicy;
  fetchTimeoutMs: number;
  maxPageSize: number;
  clock?: Clock;
  metrics?: MetricsCollector;
}

type PageAttempt =
  | { kind: 'page'; page: FetchPageResult }
  | { kind: 'skipped' }
  | { kind: 'fatal'; error: FatalFetchError };

const continueAlways: RunHooks = { checkpoint: async () => 'continue' };

/**
 * 🔄 Runs the paginated fetch loop for one request.
 *
 * The runner knows nothing about job storage: it reports progress through
 * `hooks.checkpoint` and returns a terminal outcome. Page failures never
 * escape; only a bug in a collaborator rejects the returned promise.
 */
export class ScrapeRunner {
  private readonly clock: Clock;

  constructor(
    private readonly gateway: FetchGateway,
    private readonly options: ScrapeRunnerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async run(
    request: DeepReadonly<ScrapeRequest>,
    hooks: RunHooks = continueAlways,
    label = 'sync',
  ): Promise<RunOutcome> {
    const tasks = planFetchTasks(request, this.options.maxPageSize);
    const aggregator = new ResultAggregator(aggregatorOptionsFrom(request), this.clock);
    const progress = emptyProgress();
    const errors: ErrorEntry[] = [];
    let flushed = 0;
    let pagesSucceeded = 0;

    const record = (entry: ErrorEntry) => errors.push(entry);
    const outcome = (): OutcomeBase => ({
      progress: { ...progress, itemsFetched: { ...progress.itemsFetched } },
      errors: [...errors],
      pendingErrors: errors.slice(flushed),
    });
    const checkpoint = async (): Promise<CheckpointDecision> => {
      const newErrors = errors.slice(flushed);
      flushed = errors.length;
      return hooks.checkpoint({ progress: outcome().progress, newErrors });
    };

    logger.debug(`[Run ${label}] planned ${tasks.length} fetch task(s)`);

    taskLoop: for (const task of tasks) {
      let cursor: string | null = null;
      let pagesForTask = 0;

      while (task.pageLimit === null || pagesForTask < task.pageLimit) {
        const attempt = await this.fetchWithRetry(task, cursor, request, record, label);

        if (attempt.kind === 'fatal') {
          logger.warn(`[Run ${label}] fatal ${attempt.error.code} on ${task.resource.type}/${task.category}`);
          return { ...outcome(), status: 'failed' };
        }

        if (attempt.kind === 'skipped') {
          progress.pagesSkipped += 1;
          record(
            errorEntry('PAGE_SKIPPED', `Skipped ${task.category} page ${pagesForTask + 1} after retries`, this.clock.now(), {
              details: describeResource(task),
            }),
          );
          if ((await checkpoint()) === 'cancel') return { ...outcome(), status: 'cancelled' };
          continue taskLoop;
        }

        pagesSucceeded += 1;
        pagesForTask += 1;
        const added = aggregator.add(task.category, attempt.page.records);
        progress.pagesProcessed += 1;
        progress.itemsSeen = aggregator.totalItems;
        RECORD_CATEGORIES.forEach((category: RecordCategory) => {
          progress.itemsFetched[category] = aggregator.countFor(category);
        });

        if ((await checkpoint()) === 'cancel') return { ...outcome(), status: 'cancelled' };
        if (added.truncated) break taskLoop;
        if (attempt.page.nextCursor === null) break;
        cursor = attempt.page.nextCursor;
      }
    }

    if (pagesSucceeded === 0 && progress.pagesSkipped > 0) {
      record(
        errorEntry('ALL_PAGES_FAILED', 'No page could be fetched', this.clock.now(), {
          details: `${progress.pagesSkipped} page(s) skipped`,
          fatal: true,
        }),
      );
      return { ...outcome(), status: 'failed' };
    }

    return { ...outcome(), status: 'succeeded', result: aggregator.toResultSet() };
  }

  /**
   * One page with bounded retries. Every failed attempt is recorded; a
   * transient failure that exhausts the budget becomes a skipped page.
   */
  private async fetchWithRetry(
    task: FetchTask,
    cursor: string | null,
    request: DeepReadonly<ScrapeRequest>,
    record: (entry: ErrorEntry) => void,
    label: string,
  ): Promise<PageAttempt> {
    const { pageRetry, fetchTimeoutMs, metrics } = this.options;

    try {
      const page = await pageRetry.execute(
        async () => {
          const started = Date.now();
          const result = await withTimeout(
            (signal) =>
              this.gateway.fetchPage({
                resource: task.resource,
                category: task.category,
                cursor,
                pageSize: task.pageSize,
                sort: request.sortSearch,
                timeFilter: request.filterByDate,
                signal,
              }),
            fetchTimeoutMs,
            () => new TransientFetchError('TIMEOUT', `Page fetch exceeded ${fetchTimeoutMs}ms`, describeResource(task)),
          );
          metrics?.recordPageFetch(task.category, Date.now() - started);
          return result;
        },
        {
          isRetryable: (error) => error instanceof FetchError && error.retryable,
          onFailure: (error, attempt) => {
            const entry = toErrorEntry(error, this.clock.now());
            metrics?.recordPageFailure(entry.code);
            logger.warn(`[Run ${label}] ${entry.code} on ${describeResource(task)} (attempt ${attempt})`);
            record(entry);
          },
          minDelayFor: (error) => (error instanceof TransientFetchError ? error.retryAfterMs : null),
        },
      );
      return { kind: 'page', page };
    } catch (error) {
      if (error instanceof FatalFetchError) return { kind: 'fatal', error };
      if (error instanceof FetchError) return { kind: 'skipped' };
      throw error;
    }
  }
}

const describeResource = (task: FetchTask): string => {
  const { resource } = task;
  switch (resource.type) {
    case 'search':
      return `search "${resource.query}" ${task.category}`;
    case 'subreddit':
      return `r/${resource.name} ${task.category}`;
    case 'user':
      return `u/${resource.username} ${task.category}`;
    case 'post':
      return `post ${resource.postId} ${task.category}`;
    default:
      return task.category;
  }
};
