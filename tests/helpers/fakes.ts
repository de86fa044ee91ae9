import type {
  FetchGateway,
  FetchPageRequest,
  FetchPageResult,
  GatewayInfo,
  RecordCategory,
  ResourceDescriptor,
} from '../../src/types';
import type { WebhookResponse, WebhookTransport } from '../../src/services/WebhookDispatcher';

type Step<C extends RecordCategory> = FetchPageResult<C> | Error | (() => Promise<FetchPageResult<C>>);
type Scripts = { [K in RecordCategory]: Map<string, Step<K>[]> };

export const resourceKey = (resource: ResourceDescriptor): string => {
  switch (resource.type) {
    case 'search':
      return `search:${resource.query}`;
    case 'subreddit':
      return `r/${resource.name}`;
    case 'user':
      return `u/${resource.username}`;
    case 'post':
      return `post:${resource.postId}`;
    default:
      return 'unknown';
  }
};

export interface GatewayCall {
  key: string;
  category: RecordCategory;
  cursor: string | null;
  pageSize: number;
  signal: AbortSignal | null;
}

/**
 * In-process gateway replaying scripted pages per resource and category.
 * Unscripted calls return an empty last page.
 */
export class ScriptedGateway implements FetchGateway {
  readonly calls: GatewayCall[] = [];
  private readonly scripts: Scripts = { posts: new Map(), comments: new Map(), users: new Map(), communities: new Map() };

  on<C extends RecordCategory>(resource: string, category: C, steps: Step<C>[]): this {
    this.scripts[category].set(resource, [...steps]);
    return this;
  }

  async fetchPage<C extends RecordCategory>(request: FetchPageRequest<C>): Promise<FetchPageResult<C>> {
    const key = resourceKey(request.resource);
    this.calls.push({
      key,
      category: request.category,
      cursor: request.cursor,
      pageSize: request.pageSize,
      signal: request.signal ?? null,
    });

    const step = this.scripts[request.category].get(key)?.shift();
    if (!step) return { records: [], nextCursor: null };
    if (step instanceof Error) throw step;
    return typeof step === 'function' ? step() : step;
  }

  describe(): GatewayInfo {
    return { baseUrl: 'https://reddit.test', proxyConfigured: false, proxyMode: 'always', timeoutMs: 1000, userAgents: 1 };
  }
}

export interface RecordedWebhook {
  url: string;
  body: string;
  headers: Record<string, string>;
}

/**
 * Webhook transport answering from a queue of statuses (or errors), then
 * `fallback`. URLs registered with `failAlways` skip the queue. Tracks
 * concurrent attempts overall and per job.
 */
export class RecordingTransport implements WebhookTransport {
  readonly requests: RecordedWebhook[] = [];
  maxInFlight = 0;
  maxInFlightPerJob = 0;
  private total = 0;
  private readonly inFlight = new Map<string, number>();
  private readonly failing = new Map<string, number>();

  constructor(
    private readonly responses: Array<number | Error> = [],
    private readonly fallback = 200,
  ) {}

  failAlways(url: string, status: number): this {
    this.failing.set(url, status);
    return this;
  }

  async post(url: string, body: string, headers: Record<string, string>): Promise<WebhookResponse> {
    this.requests.push({ url, body, headers });
    const jobId = headers['X-Job-Id'] ?? 'unknown';
    const current = (this.inFlight.get(jobId) ?? 0) + 1;
    this.inFlight.set(jobId, current);
    this.maxInFlightPerJob = Math.max(this.maxInFlightPerJob, current);
    this.total += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.total);

    await new Promise((resolve) => setImmediate(resolve));
    this.inFlight.set(jobId, (this.inFlight.get(jobId) ?? 1) - 1);
    this.total -= 1;

    const failing = this.failing.get(url);
    if (failing !== undefined) return { status: failing };
    const next = this.responses.length > 0 ? this.responses.shift() : this.fallback;
    if (next instanceof Error) throw next;
    return { status: next ?? this.fallback };
  }

  bodiesFor(jobId: string): string[] {
    return this.requests.filter((request) => request.headers['X-Job-Id'] === jobId).map((request) => request.body);
  }
}
