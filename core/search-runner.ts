import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_RATE_LIMIT_FALLBACK_MS,
  DEFAULT_RATE_LIMIT_MAX_WAIT_MS,
  RATE_LIMIT_RESET_BUFFER_MS,
  X_API_MAX_PAGE_SIZE,
  X_API_MIN_PAGE_SIZE,
} from '../config/constants';
import { NoopDiagnosticsReporter, type DiagnosticsReporter } from './diagnostics';
import { ErrorClassifier, ErrorCode, SearchError, SearchErrors } from './errors';
import { toSearchExpression, type QueryDescriptor } from './query-builder';
import { ResultAccumulator } from './result-accumulator';
import type {
  AbortedOutcome,
  CompletedOutcome,
  PartiallyCompletedOutcome,
  RunOutcome,
  SearchEndpoint,
  SearchPage,
  SearchPageRequest,
  SearchRunnerOptions,
} from './search-runner.types';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type Termination =
  | Pick<CompletedOutcome, 'status' | 'reason'>
  | Pick<PartiallyCompletedOutcome, 'status' | 'reason' | 'error'>
  | Pick<AbortedOutcome, 'status' | 'error'>;

/**
 * Drives recent search page by page until the requested maximum is reached,
 * the API runs out of data, a rate limit ends the run, or a request fails.
 *
 * One request is in flight at a time. The only suspension besides the
 * request itself is the rate-limit wait, which happens at most once per page
 * and is capped at `rateLimitMaxWaitMs`. Whatever was accumulated before the
 * run ends is returned with the outcome.
 */
export class SearchRunner {
  private readonly endpoint: SearchEndpoint;
  private readonly waitOnRateLimit: boolean;
  private readonly pageSize: number;
  private readonly rateLimitFallbackMs: number;
  private readonly rateLimitMaxWaitMs: number;
  private readonly diagnostics: DiagnosticsReporter;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: SearchRunnerOptions) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < X_API_MIN_PAGE_SIZE || pageSize > X_API_MAX_PAGE_SIZE) {
      throw SearchErrors.invalidConfiguration(
        `Page size must be an integer between ${X_API_MIN_PAGE_SIZE} and ${X_API_MAX_PAGE_SIZE}, got ${pageSize}`
      );
    }

    this.endpoint = options.endpoint;
    this.waitOnRateLimit = options.waitOnRateLimit;
    this.pageSize = pageSize;
    this.rateLimitFallbackMs = options.rateLimitFallbackMs ?? DEFAULT_RATE_LIMIT_FALLBACK_MS;
    this.rateLimitMaxWaitMs = options.rateLimitMaxWaitMs ?? DEFAULT_RATE_LIMIT_MAX_WAIT_MS;
    this.diagnostics = options.diagnostics ?? new NoopDiagnosticsReporter();
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  async run(descriptor: QueryDescriptor): Promise<RunOutcome> {
    const accumulator = new ResultAccumulator();
    const query = toSearchExpression(descriptor);
    const limit = descriptor.maxResults;

    this.diagnostics.runStarted({
      query,
      descriptor,
      pageSize: this.pageSize,
      waitOnRateLimit: this.waitOnRateLimit,
    });

    let cursor: string | undefined;
    let pagesFetched = 0;
    let waitedForThisPage = false;

    while (true) {
      const remaining = limit - accumulator.count();
      const request: SearchPageRequest = {
        query,
        maxResults: this.requestSize(remaining),
        startTime: descriptor.since ?? undefined,
        endTime: descriptor.until ?? undefined,
        cursor,
      };
      const pageIndex = pagesFetched + 1;

      let page: SearchPage;
      try {
        page = await this.endpoint.searchRecent(request);
      } catch (error) {
        const searchError = ErrorClassifier.classify(error, { pageIndex });

        if (searchError.code !== ErrorCode.RATE_LIMIT_EXCEEDED) {
          return this.finish(accumulator, pagesFetched, { status: 'aborted', error: searchError });
        }

        const usageCapExceeded = searchError.context.usageCapExceeded === true;

        if (!this.waitOnRateLimit) {
          this.diagnostics.rateLimited({
            pageIndex,
            waitMs: null,
            resetAt: searchError.resetAt,
            usedFallback: false,
            usageCapExceeded,
          });
          return this.finish(accumulator, pagesFetched, {
            status: 'partially_completed',
            reason: 'rate_limited',
            error: searchError,
          });
        }

        if (waitedForThisPage) {
          this.diagnostics.rateLimited({
            pageIndex,
            waitMs: null,
            resetAt: searchError.resetAt,
            usedFallback: false,
            usageCapExceeded,
          });
          return this.finish(accumulator, pagesFetched, { status: 'aborted', error: searchError });
        }

        const { waitMs, usedFallback } = this.computeWait(searchError);
        this.diagnostics.rateLimited({
          pageIndex,
          waitMs,
          resetAt: searchError.resetAt,
          usedFallback,
          usageCapExceeded,
        });
        await this.sleep(waitMs);
        waitedForThisPage = true;
        continue;
      }

      waitedForThisPage = false;
      pagesFetched = pageIndex;

      // max_results has a floor of 10, so a page can exceed what is left
      const batch = page.posts.slice(0, remaining);
      accumulator.append(batch);

      this.diagnostics.pageReceived({
        pageIndex,
        received: page.posts.length,
        resultCount: page.resultCount,
        total: accumulator.count(),
        nextCursor: page.nextCursor,
      });

      if (accumulator.count() >= limit) {
        return this.finish(accumulator, pagesFetched, { status: 'completed', reason: 'limit_reached' });
      }

      // A cursor that points back at the page just read would loop forever
      if (!page.nextCursor || page.nextCursor === cursor) {
        return this.finish(accumulator, pagesFetched, { status: 'completed', reason: 'no_more_data' });
      }

      cursor = page.nextCursor;
    }
  }

  private requestSize(remaining: number): number {
    return Math.max(X_API_MIN_PAGE_SIZE, Math.min(this.pageSize, remaining));
  }

  /**
   * Time until the rate window resets, from the API's hint when present.
   */
  computeWait(error: SearchError): { waitMs: number; usedFallback: boolean } {
    if (error.resetAt) {
      const untilReset = error.resetAt.getTime() - this.now().getTime() + RATE_LIMIT_RESET_BUFFER_MS;
      return {
        waitMs: Math.min(Math.max(untilReset, 0), this.rateLimitMaxWaitMs),
        usedFallback: false,
      };
    }
    return {
      waitMs: Math.min(this.rateLimitFallbackMs, this.rateLimitMaxWaitMs),
      usedFallback: true,
    };
  }

  private finish(accumulator: ResultAccumulator, pagesFetched: number, termination: Termination): RunOutcome {
    const posts = accumulator.seal();
    const outcome: RunOutcome = { ...termination, posts, pagesFetched };
    this.diagnostics.runFinished(outcome);
    return outcome;
  }
}
