import type { DateFilter, JobStatus, OutputFormat, RecordCategory, TerminalJobStatus } from '../types';

export const TERMINAL_STATUSES: readonly TerminalJobStatus[] = ['SUCCEEDED', 'FAILED', 'CANCELLED'];

/**
 * 🔀 Lifecycle edges. `RUNNING → RUNNING` is the progress-only transition.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  QUEUED: ['RUNNING', 'CANCELLED'],
  RUNNING: ['RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELLED'],
  SUCCEEDED: [],
  FAILED: [],
  CANCELLED: [],
};

export const RECORD_CATEGORIES: readonly RecordCategory[] = ['posts', 'comments', 'users', 'communities'];

export const CONTENT_TYPES: Readonly<Record<OutputFormat, string>> = {
  json: 'application/json',
  csv: 'text/csv',
  rss: 'application/rss+xml',
  xml: 'application/xml',
};

export const FILE_EXTENSIONS: Readonly<Record<OutputFormat, string>> = {
  json: 'json',
  csv: 'csv',
  rss: 'xml',
  xml: 'xml',
};

/** Window length in seconds for `filterByDate`; `all` disables the filter. */
export const DATE_FILTER_WINDOWS: Readonly<Record<DateFilter, number | null>> = {
  hour: 60 * 60,
  day: 24 * 60 * 60,
  week: 7 * 24 * 60 * 60,
  month: 30 * 24 * 60 * 60,
  year: 365 * 24 * 60 * 60,
  all: null,
};

export const WEBHOOK_CONSTANTS = {
  PAYLOAD_VERSION: '1.0',
  HEADERS: {
    JOB_ID: 'X-Job-Id',
    ATTEMPT: 'X-Delivery-Attempt',
  },
} as const;

export const RSS_MAX_ITEMS = 50;
export const TEXT_FIELD_LIMIT = 500;
