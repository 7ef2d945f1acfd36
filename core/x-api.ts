import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import {
  X_API_BASE_URL,
  X_API_EXPANSIONS,
  X_API_RATE_LIMIT_RESET_HEADER,
  X_API_RECENT_SEARCH_PATH,
  X_API_TWEET_FIELDS,
  X_API_USAGE_CAP_TITLE,
  X_API_USER_FIELDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../config/constants';
import { buildStatusUrl, type PostRecord } from '../types/post';
import { apiProblemSchema, searchResponseSchema, type XTweet, type XUser } from '../types/x-api';
import { DateUtils } from '../utils/date-utils';
import { ErrorClassifier, SearchError, SearchErrors } from './errors';
import type { SearchEndpoint, SearchPage, SearchPageRequest } from './search-runner.types';

export interface XApiClientOptions {
  bearerToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Axios instance to send requests through; one is created when omitted */
  http?: AxiosInstance;
}

/**
 * Read-only client for the X API v2 recent search endpoint.
 *
 * Sends one request per call: retrying is the search runner's decision, and
 * it only ever retries after a rate limit.
 */
export class XApiClient implements SearchEndpoint {
  private readonly bearerToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: XApiClientOptions) {
    if (!options.bearerToken) {
      throw SearchErrors.invalidConfiguration('XApiClient requires a bearer token');
    }
    this.bearerToken = options.bearerToken;
    this.baseUrl = options.baseUrl ?? X_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.http = options.http ?? axios.create({ proxy: false });
  }

  private buildRequestConfig(request: SearchPageRequest): AxiosRequestConfig {
    const params: Record<string, string | number> = {
      query: request.query,
      max_results: request.maxResults,
      'tweet.fields': X_API_TWEET_FIELDS.join(','),
      expansions: X_API_EXPANSIONS.join(','),
      'user.fields': X_API_USER_FIELDS.join(','),
    };
    if (request.startTime) params.start_time = DateUtils.toRfc3339(request.startTime);
    if (request.endTime) params.end_time = DateUtils.toRfc3339(request.endTime);
    if (request.cursor) params.next_token = request.cursor;

    return {
      baseURL: this.baseUrl,
      params,
      timeout: this.timeoutMs,
      headers: {
        authorization: `Bearer ${this.bearerToken}`,
        accept: 'application/json',
      },
      // Handle status codes manually
      validateStatus: () => true,
    };
  }

  async searchRecent(request: SearchPageRequest): Promise<SearchPage> {
    const context = { operation: 'searchRecent', query: request.query };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(X_API_RECENT_SEARCH_PATH, this.buildRequestConfig(request));
    } catch (error) {
      throw ErrorClassifier.classify(error, context);
    }

    if (response.status < 200 || response.status >= 300) {
      throw this.toHttpError(response, context);
    }

    return this.decodeSearchPage(response.data, context);
  }

  private toHttpError(response: AxiosResponse<unknown>, context: Record<string, unknown>): SearchError {
    const problem = apiProblemSchema.safeParse(response.data);
    const title = problem.success ? problem.data.title : undefined;
    const detail = problem.success ? problem.data.detail || problem.data.message || title : undefined;
    const usageCapExceeded = title === X_API_USAGE_CAP_TITLE;

    return SearchError.fromHttpResponse(
      {
        status: response.status,
        statusText: response.statusText,
        detail,
        resetAt: response.status === 429 ? parseResetHeader(response.headers[X_API_RATE_LIMIT_RESET_HEADER]) : undefined,
      },
      usageCapExceeded ? { ...context, usageCapExceeded } : context
    );
  }

  private decodeSearchPage(body: unknown, context: Record<string, unknown>): SearchPage {
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw SearchErrors.malformedResponse(`Unexpected search response: ${issues.slice(0, 3).join('; ')}`, {
        ...context,
        issues,
      });
    }

    const { data, includes, meta, errors } = parsed.data;
    if (errors && errors.length > 0 && !data && !meta) {
      const first = errors[0];
      throw SearchErrors.apiError(first.detail || first.message || first.title || 'Search request returned errors', 200, {
        ...context,
        errors,
      });
    }

    const users = mapUsers(includes?.users ?? []);
    const posts = (data ?? []).map((tweet) => toPostRecord(tweet, users));

    return {
      posts,
      nextCursor: meta?.next_token ?? null,
      resultCount: meta?.result_count ?? posts.length,
    };
  }
}

function parseResetHeader(value: unknown): Date | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const epochSeconds = Number(value);
  if (!Number.isFinite(epochSeconds) || epochSeconds <= 0) return undefined;
  return new Date(epochSeconds * 1000);
}

function mapUsers(users: XUser[]): Map<string, { username: string; name: string }> {
  const byId = new Map<string, { username: string; name: string }>();
  for (const user of users) {
    byId.set(user.id, { username: user.username ?? '', name: user.name ?? '' });
  }
  return byId;
}

export function toPostRecord(tweet: XTweet, users: Map<string, { username: string; name: string }>): PostRecord {
  const author = (tweet.author_id && users.get(tweet.author_id)) || { username: '', name: '' };
  const metrics = tweet.public_metrics;
  const externalUrls: string[] = [];
  for (const entity of tweet.entities?.urls ?? []) {
    const expanded = entity.expanded_url || entity.url;
    if (expanded) externalUrls.push(expanded);
  }

  return Object.freeze({
    id: tweet.id,
    createdAt: tweet.created_at,
    username: author.username,
    displayName: author.name,
    text: tweet.text,
    likeCount: metrics?.like_count ?? 0,
    retweetCount: metrics?.retweet_count ?? 0,
    replyCount: metrics?.reply_count ?? 0,
    quoteCount: metrics?.quote_count ?? 0,
    lang: tweet.lang ?? null,
    url: buildStatusUrl(tweet.id),
    externalUrls: Object.freeze(externalUrls),
  });
}
