/**
 * 🧱 Shared domain types for scrape requests, records, jobs and deliveries.
 */

export type JobStatus = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';
export type TerminalJobStatus = Extract<JobStatus, 'SUCCEEDED' | 'FAILED' | 'CANCELLED'>;

export type OutputFormat = 'json' | 'csv' | 'rss' | 'xml';
export type SortOption = 'hot' | 'new' | 'top' | 'rising' | 'relevance';
export type DateFilter = 'hour' | 'day' | 'week' | 'month' | 'year' | 'all';
export type RecordCategory = 'posts' | 'comments' | 'users' | 'communities';

/**
 * Recursively readonly view used for every snapshot handed out by the stores.
 */
export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export interface Clock {
  now(): Date;
}

// ---------------------------------------------------------------------------
// Scrape request
// ---------------------------------------------------------------------------

export interface ScrapeRequest {
  startUrls?: string[];
  searchTerm?: string;
  searchForPosts: boolean;
  searchForComments: boolean;
  searchForCommunities: boolean;
  searchForUsers: boolean;
  skipComments: boolean;
  skipUserPosts: boolean;
  skipCommunity: boolean;
  includeNSFW: boolean;
  sortSearch: SortOption;
  filterByDate: DateFilter;
  postDateLimit?: string;
  maxItems: number;
  postsPerPage: number;
  commentsPerPage: number;
  communityPagesLimit: number;
  userPagesLimit: number;
  outputFormat: OutputFormat;
  webhookUrl?: string;
}

// ---------------------------------------------------------------------------
// Scraped records
// ---------------------------------------------------------------------------

interface BaseRecord {
  id: string;
  /** Epoch seconds, 0 when Reddit did not report it. */
  createdUtc: number;
  over18: boolean;
}

export interface PostRecord extends BaseRecord {
  title: string;
  author: string;
  subreddit: string;
  score: number;
  numComments: number;
  permalink: string;
  url: string;
  selftext: string;
  domain: string;
  pinned: boolean;
}

export interface CommentRecord extends BaseRecord {
  body: string;
  author: string;
  subreddit: string;
  score: number;
  permalink: string;
  parentId: string;
  postTitle: string;
}

export interface UserRecord extends BaseRecord {
  username: string;
  profileUrl: string;
  linkKarma: number;
  commentKarma: number;
}

export interface CommunityRecord extends BaseRecord {
  name: string;
  title: string;
  description: string;
  subscribers: number;
  url: string;
}

export interface RecordByCategory {
  posts: PostRecord;
  comments: CommentRecord;
  users: UserRecord;
  communities: CommunityRecord;
}

export type ResultCollections = { [K in RecordCategory]: RecordByCategory[K][] };

export interface AggregatedResultSet {
  data: ResultCollections;
  /** Every record received, including filtered and discarded ones. */
  totalItems: number;
  itemsReturned: number;
  truncated: boolean;
}

// ---------------------------------------------------------------------------
// Fetch gateway
// ---------------------------------------------------------------------------

export type ResourceDescriptor =
  | { type: 'search'; query: string }
  | { type: 'subreddit'; name: string }
  | { type: 'user'; username: string }
  | { type: 'post'; subreddit: string; postId: string };

export interface FetchPageRequest<C extends RecordCategory = RecordCategory> {
  resource: ResourceDescriptor;
  category: C;
  cursor: string | null;
  pageSize: number;
  sort: SortOption;
  timeFilter: DateFilter;
  /** Aborted when the caller stops waiting for this page. */
  signal?: AbortSignal;
}

export interface FetchPageResult<C extends RecordCategory = RecordCategory> {
  records: RecordByCategory[C][];
  nextCursor: string | null;
}

export interface GatewayInfo {
  baseUrl: string;
  proxyConfigured: boolean;
  proxyMode: ProxyMode;
  timeoutMs: number;
  userAgents: number;
}

export type ProxyMode = 'always' | 'fallback';

/**
 * Single-page access to the remote source. Implementations throw a
 * `FetchError` subclass for every failure.
 */
export interface FetchGateway {
  fetchPage<C extends RecordCategory>(request: FetchPageRequest<C>): Promise<FetchPageResult<C>>;
  describe(): GatewayInfo;
}

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export type ErrorCode =
  | 'RATE_LIMITED'
  | 'NETWORK'
  | 'PROXY'
  | 'TIMEOUT'
  | 'BLOCKED'
  | 'NOT_FOUND'
  | 'PAGE_SKIPPED'
  | 'ALL_PAGES_FAILED'
  | 'INTERNAL_ERROR'
  | 'JOB_CANCELLED';

export interface ErrorEntry {
  code: ErrorCode;
  message: string;
  details: string | null;
  occurredAt: string;
  fatal: boolean;
}

export interface JobProgress {
  pagesProcessed: number;
  pagesSkipped: number;
  itemsSeen: number;
  itemsFetched: Record<RecordCategory, number>;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  request: ScrapeRequest;
  progress: JobProgress;
  result: AggregatedResultSet | null;
  errors: ErrorEntry[];
  cancelRequested: boolean;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  sequence: number;
  version: number;
}

export type Job = DeepReadonly<JobRecord>;

/** Fields a transition mutator may replace. */
export type JobPatch = Partial<Pick<Job, 'progress' | 'result' | 'errors' | 'cancelRequested'>>;
export type JobMutator = (current: Job) => JobPatch;

export interface JobListFilter {
  status?: JobStatus;
  limit?: number;
}

// ---------------------------------------------------------------------------
// Webhook delivery
// ---------------------------------------------------------------------------

export type DeliveryState = 'PENDING' | 'DELIVERED' | 'EXHAUSTED';
export type AttemptOutcome = 'SUCCESS' | 'RETRYABLE_FAILURE' | 'NON_RETRYABLE_FAILURE';

export interface DeliveryAttempt {
  attempt: number;
  startedAt: string;
  finishedAt: string;
  outcome: AttemptOutcome;
  httpStatus: number | null;
  errorClass: string | null;
}

export interface DeliveryRecord {
  jobId: string;
  url: string;
  state: DeliveryState;
  attempts: DeliveryAttempt[];
  nextAttemptAt: string | null;
  inFlight: boolean;
}

export type JobView = Job & { webhookDelivery: DeepReadonly<DeliveryRecord> | null };

// ---------------------------------------------------------------------------
// Response envelope
// ---------------------------------------------------------------------------

export interface ResponseError {
  code: string;
  message: string;
  details: string | null;
}

export interface ResponseMetadata {
  totalItems: number;
  itemsReturned: number;
  requestParams: DeepReadonly<ScrapeRequest> | Record<string, unknown>;
  scrapedAt: string;
  executionTime: string;
}

export interface ScrapeResponse {
  success: boolean;
  data: DeepReadonly<ResultCollections>;
  metadata: ResponseMetadata;
  errors: ResponseError[];
  formattedData?: FormattedData;
}

export interface FormattedData {
  format: OutputFormat;
  contentType: string;
  data: string;
}
