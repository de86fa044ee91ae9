import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosResponse } from 'axios';
import type {
  FetchGateway,
  FetchPageRequest,
  FetchPageResult,
  GatewayInfo,
  ProxyMode,
  RecordByCategory,
  RecordCategory,
} from '../../types';
import type { ProxyConfig } from '../../config/app.config';
import { FatalFetchError, FetchError, TransientFetchError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import defaultUserAgents from '../../data/user-agents.json';
import { RECORD_PARSERS, type Thing, aboutSchema, listingSchema, postThreadSchema } from './parsers';

export interface RedditGatewayOptions {
  baseUrl: string;
  timeoutMs: number;
  proxy: ProxyConfig | null;
  proxyMode: ProxyMode;
  userAgents?: string[];
  /** Injected for tests (e.g. an instance with a custom adapter). */
  http?: AxiosInstance;
  random?: () => number;
}

interface Endpoint {
  path: string;
  params: Record<string, string | number>;
  shape: 'listing' | 'about' | 'thread-post' | 'thread-comments';
}

const PROXY_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENOTFOUND', 'EPROTO']);
const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const parseRetryAfter = (header: unknown): number | null => {
  if (typeof header !== 'string' && typeof header !== 'number') return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
};

/**
 * 🚦 Maps an HTTP status to the error taxonomy. `null` means success.
 */
export const classifyStatus = (status: number, headers: Record<string, unknown> = {}): FetchError | null => {
  if (status >= 200 && status < 300) return null;
  if (status === 429) {
    return new TransientFetchError(
      'RATE_LIMITED',
      'Reddit rate limit reached',
      `HTTP ${status}`,
      parseRetryAfter(headers['retry-after']),
    );
  }
  if (status === 401 || status === 403) return new FatalFetchError('BLOCKED', 'Access blocked by Reddit', `HTTP ${status}`);
  if (status === 404) return new FatalFetchError('NOT_FOUND', 'Resource not found on Reddit', `HTTP ${status}`);
  if (status === 407) return new TransientFetchError('PROXY', 'Proxy authentication required', `HTTP ${status}`);
  return new TransientFetchError('NETWORK', `Unexpected response from Reddit`, `HTTP ${status}`);
};

/**
 * 🔌 Maps a transport failure (no HTTP response) to the error taxonomy.
 */
export const classifyTransportError = (error: unknown, viaProxy: boolean): FetchError => {
  if (error instanceof FetchError) return error;

  const code = axios.isAxiosError(error) ? error.code ?? '' : '';
  if (TIMEOUT_ERROR_CODES.has(code) || /timeout/i.test(errorMessage(error))) {
    return new TransientFetchError('TIMEOUT', 'Reddit request timed out', code || null);
  }
  if (viaProxy && PROXY_ERROR_CODES.has(code)) {
    return new TransientFetchError('PROXY', 'Proxy connection failed', code);
  }
  return new TransientFetchError('NETWORK', 'Network error while contacting Reddit', code || errorMessage(error));
};

/**
 * 🌐 Reddit JSON gateway: one GET per page, rotating User-Agent, optional
 * proxy routing, and failure classification into transient/fatal errors.
 */
export class RedditGateway implements FetchGateway {
  private readonly http: AxiosInstance;
  private readonly userAgents: string[];
  private readonly random: () => number;

  constructor(private readonly options: RedditGatewayOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
      });
    this.userAgents = options.userAgents && options.userAgents.length > 0 ? options.userAgents : defaultUserAgents;
    this.random = options.random ?? Math.random;
  }

  describe(): GatewayInfo {
    return {
      baseUrl: this.options.baseUrl,
      proxyConfigured: this.options.proxy !== null,
      proxyMode: this.options.proxyMode,
      timeoutMs: this.options.timeoutMs,
      userAgents: this.userAgents.length,
    };
  }

  async fetchPage<C extends RecordCategory>(request: FetchPageRequest<C>): Promise<FetchPageResult<C>> {
    const endpoint = this.endpointFor(request);
    if (!endpoint) return { records: [], nextCursor: null };

    const response = await this.send(endpoint, request.signal);
    return this.parse(request, endpoint, response.data);
  }

  /**
   * Sends directly or through the proxy depending on `proxyMode`; in
   * fallback mode a blocked direct call is repeated once through the proxy.
   */
  private async send(endpoint: Endpoint, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    const { proxy, proxyMode } = this.options;
    if (!proxy) return this.request(endpoint, null, signal);
    if (proxyMode === 'always') return this.request(endpoint, proxy, signal);

    try {
      return await this.request(endpoint, null, signal);
    } catch (error) {
      if (error instanceof FatalFetchError && error.code === 'BLOCKED') {
        logger.warn(`🛡️ Direct request to ${endpoint.path} blocked, retrying through proxy`);
        return this.request(endpoint, proxy, signal);
      }
      throw error;
    }
  }

  private async request(endpoint: Endpoint, proxy: ProxyConfig | null, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(endpoint.path, {
        params: { ...endpoint.params, raw_json: 1 },
        headers: { 'User-Agent': this.pickUserAgent(), Accept: 'application/json' },
        proxy: proxy ? this.toAxiosProxy(proxy) : false,
        timeout: this.options.timeoutMs,
        signal,
        validateStatus: () => true,
      });
    } catch (error) {
      throw classifyTransportError(error, proxy !== null);
    }

    const failure = classifyStatus(response.status, { 'retry-after': response.headers['retry-after'] });
    if (failure) throw failure;
    return response;
  }

  private parse<C extends RecordCategory>(
    request: FetchPageRequest<C>,
    endpoint: Endpoint,
    body: unknown,
  ): FetchPageResult<C> {
    const context = { baseUrl: this.options.baseUrl };
    let things: Thing[];
    let nextCursor: string | null = null;
    let postTitle: string | undefined;

    if (endpoint.shape === 'listing') {
      const listing = listingSchema.safeParse(body);
      if (!listing.success) throw this.unexpectedShape(endpoint);
      things = listing.data.data.children;
      nextCursor = listing.data.data.after ?? null;
    } else if (endpoint.shape === 'about') {
      const about = aboutSchema.safeParse(body);
      if (!about.success) throw this.unexpectedShape(endpoint);
      things = [about.data];
    } else {
      const thread = postThreadSchema.safeParse(body);
      if (!thread.success) throw this.unexpectedShape(endpoint);
      const [postListing, commentListing] = thread.data;
      const title = postListing.data.children[0]?.data.title;
      postTitle = typeof title === 'string' ? title : undefined;
      things = endpoint.shape === 'thread-post' ? postListing.data.children : commentListing.data.children;
    }

    const parseThing = RECORD_PARSERS[request.category];
    const records: RecordByCategory[C][] = [];
    for (const thing of things) {
      const record = parseThing(thing, { ...context, postTitle });
      if (record !== null) records.push(record);
    }

    return { records, nextCursor };
  }

  private endpointFor(request: FetchPageRequest): Endpoint | null {
    const { resource, category, cursor, pageSize, sort, timeFilter } = request;
    const paging: Record<string, string | number> = { limit: pageSize };
    if (cursor) paging.after = cursor;
    const listingSort = sort === 'relevance' ? 'hot' : sort;

    switch (resource.type) {
      case 'search': {
        const q = resource.query;
        if (category === 'communities') {
          return { path: '/subreddits/search.json', params: { q, ...paging }, shape: 'listing' };
        }
        const type = { posts: 'link', comments: 'comment', users: 'user' }[category];
        return { path: '/search.json', params: { q, sort, t: timeFilter, type, ...paging }, shape: 'listing' };
      }
      case 'subreddit': {
        const base = `/r/${encodeURIComponent(resource.name)}`;
        if (category === 'posts') {
          return { path: `${base}/${listingSort}.json`, params: { t: timeFilter, ...paging }, shape: 'listing' };
        }
        if (category === 'comments') return { path: `${base}/comments.json`, params: paging, shape: 'listing' };
        if (category === 'communities') return { path: `${base}/about.json`, params: {}, shape: 'about' };
        return null;
      }
      case 'user': {
        const base = `/user/${encodeURIComponent(resource.username)}`;
        if (category === 'posts') {
          return { path: `${base}/submitted.json`, params: { sort: listingSort, t: timeFilter, ...paging }, shape: 'listing' };
        }
        if (category === 'comments') {
          return { path: `${base}/comments.json`, params: { sort: listingSort, t: timeFilter, ...paging }, shape: 'listing' };
        }
        if (category === 'users') return { path: `${base}/about.json`, params: {}, shape: 'about' };
        return null;
      }
      case 'post': {
        const path = `/r/${encodeURIComponent(resource.subreddit)}/comments/${encodeURIComponent(resource.postId)}.json`;
        if (category === 'posts') return { path, params: { limit: pageSize }, shape: 'thread-post' };
        if (category === 'comments') return { path, params: { limit: pageSize }, shape: 'thread-comments' };
        return null;
      }
      default:
        return null;
    }
  }

  private pickUserAgent(): string {
    return this.userAgents[Math.floor(this.random() * this.userAgents.length) % this.userAgents.length];
  }

  private toAxiosProxy(proxy: ProxyConfig): AxiosProxyConfig {
    return {
      protocol: 'http',
      host: proxy.host,
      port: proxy.port,
      ...(proxy.username ? { auth: { username: proxy.username, password: proxy.password ?? '' } } : {}),
    };
  }

  private unexpectedShape(endpoint: Endpoint): TransientFetchError {
    return new TransientFetchError('NETWORK', 'Unexpected response body from Reddit', endpoint.path);
  }
}
