import type { PostRecord } from '../types/post';
import type { DiagnosticsReporter } from './diagnostics';
import type { SearchError } from './errors';

export interface SearchPageRequest {
  /** Full search expression, language operator included */
  query: string;
  /** Already clamped to the endpoint's accepted range */
  maxResults: number;
  startTime?: Date;
  endTime?: Date;
  cursor?: string;
}

export interface SearchPage {
  posts: PostRecord[];
  /** null when the API has no further pages */
  nextCursor: string | null;
  /** meta.result_count as reported by the API */
  resultCount: number;
}

/**
 * One page of recent search. Implementations throw a SearchError; a
 * RATE_LIMIT_EXCEEDED error may carry `resetAt`.
 */
export interface SearchEndpoint {
  searchRecent(request: SearchPageRequest): Promise<SearchPage>;
}

export interface SearchRunnerOptions {
  endpoint: SearchEndpoint;
  /** Sleep until the rate window resets (true) or return partial results (false) */
  waitOnRateLimit: boolean;
  /** Page size cap, 10-100 */
  pageSize?: number;
  /** Wait used when a 429 carries no reset hint */
  rateLimitFallbackMs?: number;
  /** Upper bound on any single rate-limit wait */
  rateLimitMaxWaitMs?: number;
  diagnostics?: DiagnosticsReporter;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export type RunStatus = 'completed' | 'partially_completed' | 'aborted';

interface RunOutcomeBase {
  posts: readonly PostRecord[];
  pagesFetched: number;
}

export interface CompletedOutcome extends RunOutcomeBase {
  status: 'completed';
  reason: 'limit_reached' | 'no_more_data';
}

export interface PartiallyCompletedOutcome extends RunOutcomeBase {
  status: 'partially_completed';
  reason: 'rate_limited';
  error: SearchError;
}

export interface AbortedOutcome extends RunOutcomeBase {
  status: 'aborted';
  error: SearchError;
}

export type RunOutcome = CompletedOutcome | PartiallyCompletedOutcome | AbortedOutcome;
