import type {
  AggregatedResultSet,
  Clock,
  DateFilter,
  RecordByCategory,
  RecordCategory,
  ResultCollections,
  ScrapeRequest,
} from '../types';
import { DATE_FILTER_WINDOWS } from '../utils/constants';
import { systemClock } from '../utils/time';

export interface AggregatorOptions {
  maxItems: number;
  includeNSFW: boolean;
  filterByDate: DateFilter;
  postDateLimit?: string;
}

export interface AddOutcome {
  accepted: number;
  filtered: number;
  discarded: number;
  truncated: boolean;
}

const DATED_CATEGORIES: ReadonlySet<RecordCategory> = new Set(['posts', 'comments']);

export const aggregatorOptionsFrom = (request: Pick<ScrapeRequest, keyof AggregatorOptions>): AggregatorOptions => ({
  maxItems: request.maxItems,
  includeNSFW: request.includeNSFW,
  filterByDate: request.filterByDate,
  postDateLimit: request.postDateLimit,
});

/**
 * 🧮 Collects records across pages under a global `maxItems` ceiling.
 *
 * Every incoming record counts toward `totalItems`. Filtered records are
 * dropped before they count toward the ceiling. The first record that
 * arrives once the ceiling is reached truncates the aggregator: it and the
 * rest of its page are discarded and no further page should be fetched.
 */
export class ResultAggregator {
  private readonly data: ResultCollections = { posts: [], comments: [], users: [], communities: [] };
  private seen = 0;
  private returned = 0;
  private truncated = false;
  /** Epoch seconds; records created before it are dropped. */
  private readonly earliestCreatedUtc: number | null;

  constructor(
    private readonly options: AggregatorOptions,
    clock: Clock = systemClock,
  ) {
    if (options.maxItems < 1) throw new RangeError('maxItems must be at least 1');
    this.earliestCreatedUtc = ResultAggregator.earliestAllowed(options, clock.now());
  }

  /**
   * Both date filters apply; the later of the two bounds wins.
   */
  private static earliestAllowed(options: AggregatorOptions, now: Date): number | null {
    const bounds: number[] = [];
    const window = DATE_FILTER_WINDOWS[options.filterByDate];
    if (window !== null) bounds.push(Math.floor(now.getTime() / 1000) - window);
    if (options.postDateLimit) {
      const limit = Date.parse(options.postDateLimit);
      if (!Number.isNaN(limit)) bounds.push(Math.floor(limit / 1000));
    }
    return bounds.length > 0 ? Math.max(...bounds) : null;
  }

  add<C extends RecordCategory>(category: C, records: readonly RecordByCategory[C][]): AddOutcome {
    const outcome: AddOutcome = { accepted: 0, filtered: 0, discarded: 0, truncated: false };

    for (const record of records) {
      this.seen += 1;

      if (this.truncated) {
        outcome.discarded += 1;
        continue;
      }
      if (!this.passesFilters(category, record)) {
        outcome.filtered += 1;
        continue;
      }
      if (this.returned >= this.options.maxItems) {
        this.truncated = true;
        outcome.discarded += 1;
        continue;
      }

      this.data[category].push(record);
      this.returned += 1;
      outcome.accepted += 1;
    }

    outcome.truncated = this.truncated;
    return outcome;
  }

  private passesFilters(category: RecordCategory, record: RecordByCategory[RecordCategory]): boolean {
    if (!this.options.includeNSFW && record.over18) return false;
    if (this.earliestCreatedUtc !== null && DATED_CATEGORIES.has(category)) {
      return record.createdUtc >= this.earliestCreatedUtc;
    }
    return true;
  }

  get totalItems(): number {
    return this.seen;
  }

  get itemsReturned(): number {
    return this.returned;
  }

  countFor(category: RecordCategory): number {
    return this.data[category].length;
  }

  toResultSet(): AggregatedResultSet {
    return {
      data: {
        posts: this.data.posts.map((post) => ({ ...post })),
        comments: this.data.comments.map((comment) => ({ ...comment })),
        users: this.data.users.map((user) => ({ ...user })),
        communities: this.data.communities.map((community) => ({ ...community })),
      },
      totalItems: this.seen,
      itemsReturned: this.returned,
      truncated: this.truncated,
    };
  }
}
