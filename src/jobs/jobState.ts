import type {
  AggregatedResultSet,
  DeepReadonly,
  ErrorEntry,
  Job,
  JobMutator,
  JobProgress,
  JobRecord,
  JobStatus,
  RecordCategory,
  ScrapeRequest,
  TerminalJobStatus,
} from '../types';
import { ALLOWED_TRANSITIONS, RECORD_CATEGORIES, TERMINAL_STATUSES } from '../utils/constants';
import { ConflictError, IllegalTransitionError } from '../utils/errors';

export const isTerminal = (status: JobStatus): status is TerminalJobStatus =>
  TERMINAL_STATUSES.some((terminal) => terminal === status);

export const emptyProgress = (): JobProgress => ({
  pagesProcessed: 0,
  pagesSkipped: 0,
  itemsSeen: 0,
  itemsFetched: { posts: 0, comments: 0, users: 0, communities: 0 },
});

/**
 * 🧊 Freezes a job record and everything below it. Frozen objects are
 * handed out as `Job` snapshots; nothing mutates them afterwards.
 */
export const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
};

export const freezeJob = (record: JobRecord): Job => deepFreeze(record);

export const cloneProgress = (progress: DeepReadonly<JobProgress>): JobProgress => ({
  ...progress,
  itemsFetched: { ...progress.itemsFetched },
});

export const cloneResult = (result: DeepReadonly<AggregatedResultSet>): AggregatedResultSet => ({
  totalItems: result.totalItems,
  itemsReturned: result.itemsReturned,
  truncated: result.truncated,
  data: {
    posts: result.data.posts.map((post) => ({ ...post })),
    comments: result.data.comments.map((comment) => ({ ...comment })),
    users: result.data.users.map((user) => ({ ...user })),
    communities: result.data.communities.map((community) => ({ ...community })),
  },
});

const cloneError = (entry: DeepReadonly<ErrorEntry>): ErrorEntry => ({ ...entry });

export const cloneRequest = (request: DeepReadonly<ScrapeRequest>): ScrapeRequest => {
  const { startUrls, ...rest } = request;
  return startUrls ? { ...rest, startUrls: [...startUrls] } : { ...rest };
};

/** Mutable deep copy of a snapshot. */
export const thawJob = (job: Job): JobRecord => ({
  ...job,
  request: cloneRequest(job.request),
  progress: cloneProgress(job.progress),
  result: job.result ? cloneResult(job.result) : null,
  errors: job.errors.map(cloneError),
});

export const newJobRecord = (
  id: string,
  request: ScrapeRequest,
  createdAt: Date,
  sequence: number,
): JobRecord => ({
  id,
  status: 'QUEUED',
  request: cloneRequest(request),
  progress: emptyProgress(),
  result: null,
  errors: [],
  cancelRequested: false,
  createdAt: createdAt.toISOString(),
  startedAt: null,
  finishedAt: null,
  sequence,
  version: 0,
});

const assertMonotonic = (id: string, before: Job['progress'], after: Job['progress']): void => {
  const decreased: string[] = [];
  if (after.pagesProcessed < before.pagesProcessed) decreased.push('pagesProcessed');
  if (after.pagesSkipped < before.pagesSkipped) decreased.push('pagesSkipped');
  if (after.itemsSeen < before.itemsSeen) decreased.push('itemsSeen');
  RECORD_CATEGORIES.forEach((category: RecordCategory) => {
    if (after.itemsFetched[category] < before.itemsFetched[category]) decreased.push(`itemsFetched.${category}`);
  });

  if (decreased.length > 0) {
    throw new IllegalTransitionError(`Job ${id} progress may not decrease (${decreased.join(', ')})`);
  }
};

/**
 * 🔀 Computes the next version of a job for `transition`.
 *
 * Pure: both stores run it between their read and their conditional write.
 * Throws `ConflictError` when `current.status !== expected`, and
 * `IllegalTransitionError` for edges outside the lifecycle or a result that
 * breaks a job invariant.
 */
export const applyTransition = (
  current: Job,
  expected: JobStatus,
  next: JobStatus,
  mutator: JobMutator | undefined,
  now: Date,
): JobRecord => {
  if (current.status !== expected) {
    throw new ConflictError(`Job ${current.id} is ${current.status}, expected ${expected}`);
  }
  if (!ALLOWED_TRANSITIONS[expected].includes(next)) {
    throw new IllegalTransitionError(`Job ${current.id} cannot move from ${expected} to ${next}`);
  }

  const patch = mutator ? mutator(current) : {};
  const draft = thawJob(current);
  if (patch.progress) draft.progress = cloneProgress(patch.progress);
  if (patch.result !== undefined) draft.result = patch.result === null ? null : cloneResult(patch.result);
  if (patch.errors) draft.errors = patch.errors.map(cloneError);
  if (patch.cancelRequested !== undefined) draft.cancelRequested = patch.cancelRequested;

  assertMonotonic(current.id, current.progress, draft.progress);

  const timestamp = now.toISOString();
  draft.status = next;
  draft.version = current.version + 1;
  if (next === 'RUNNING' && draft.startedAt === null) draft.startedAt = timestamp;
  if (isTerminal(next)) {
    draft.finishedAt = timestamp;
    if (next !== 'SUCCEEDED') draft.result = null;
  }

  if (next === 'SUCCEEDED' && draft.result === null) {
    throw new IllegalTransitionError(`Job ${current.id} cannot succeed without a result`);
  }
  if (next === 'FAILED' && draft.errors.length === 0) {
    throw new IllegalTransitionError(`Job ${current.id} cannot fail without an error entry`);
  }
  if (!isTerminal(next) && draft.result !== null) {
    throw new IllegalTransitionError(`Job ${current.id} may only carry a result once SUCCEEDED`);
  }

  return draft;
};
