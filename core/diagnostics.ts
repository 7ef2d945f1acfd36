/**
 * Diagnostics for a search run: per-page counts, cursor presence,
 * rate-limit decisions and troubleshooting tips. Reporters only observe;
 * the runner never reads anything back from them.
 */

import * as readline from 'readline';
import { createModuleLogger, type ModuleLogger } from '../utils/logger';
import type { QueryDescriptor } from './query-builder';
import type { RunOutcome } from './search-runner.types';
import { ErrorCode } from './errors';

export interface RunStartedEvent {
  query: string;
  descriptor: QueryDescriptor;
  pageSize: number;
  waitOnRateLimit: boolean;
}

export interface PageReceivedEvent {
  /** 1-based */
  pageIndex: number;
  received: number;
  /** meta.result_count as reported by the API */
  resultCount: number;
  total: number;
  nextCursor: string | null;
}

export interface RateLimitEvent {
  pageIndex: number;
  /** Computed wait, or null when waiting was skipped */
  waitMs: number | null;
  resetAt?: Date;
  /** Set when the hint was missing and the fallback duration was used */
  usedFallback: boolean;
  usageCapExceeded: boolean;
}

export interface DiagnosticsReporter {
  runStarted(event: RunStartedEvent): void;
  pageReceived(event: PageReceivedEvent): void;
  rateLimited(event: RateLimitEvent): void;
  runFinished(outcome: RunOutcome): void;
}

export class NoopDiagnosticsReporter implements DiagnosticsReporter {
  runStarted(): void {}
  pageReceived(): void {}
  rateLimited(): void {}
  runFinished(): void {}
}

const CURSOR_PREVIEW_LENGTH = 20;

export function previewCursor(cursor: string): string {
  return cursor.length > CURSOR_PREVIEW_LENGTH ? `${cursor.slice(0, CURSOR_PREVIEW_LENGTH)}...` : cursor;
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.ceil(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

/**
 * Troubleshooting hints for a finished run
 */
export function buildTips(outcome: RunOutcome): string[] {
  if (outcome.status === 'partially_completed') {
    return ['Wait ~15 minutes for the rate window to reset, or drop --no-wait to sleep through it'];
  }

  if (outcome.status === 'aborted') {
    switch (outcome.error.code) {
      case ErrorCode.AUTH_FAILED:
        return ['Check X_BEARER_TOKEN in your .env file'];
      case ErrorCode.BAD_REQUEST:
        return ['Check your query syntax or date range (recent search covers the last 7 days)'];
      case ErrorCode.RATE_LIMIT_EXCEEDED:
        return outcome.error.context.usageCapExceeded === true
          ? ['Monthly quota exhausted (check the X Developer Portal)']
          : ['Still rate limited after waiting; try again later'];
      case ErrorCode.NETWORK_ERROR:
      case ErrorCode.TIMEOUT:
        return ['Check your network connection and retry'];
      default:
        return [];
    }
  }

  if (outcome.posts.length === 0) {
    return [
      'Monthly quota exhausted (check the X Developer Portal)',
      'No recent posts match your query (recent search covers the last 7 days)',
      'Try removing --lang or widening the date range',
    ];
  }

  return [];
}

/**
 * Writes diagnostics through the winston module logger.
 */
export class LoggerDiagnosticsReporter implements DiagnosticsReporter {
  constructor(private readonly log: ModuleLogger = createModuleLogger('Diagnostics')) {}

  runStarted(event: RunStartedEvent): void {
    const { descriptor } = event;
    this.log.info(`🔍 Query: ${event.query}`);
    this.log.info(
      `📅 Time range: ${descriptor.since?.toISOString() ?? 'any'} to ${descriptor.until?.toISOString() ?? 'now'}`
    );
    this.log.info(`📊 Max per page: ${event.pageSize}, limit: ${descriptor.maxResults}`);
    this.log.info(`⏱️  Wait on rate limit: ${event.waitOnRateLimit}`);
  }

  pageReceived(event: PageReceivedEvent): void {
    this.log.info(
      `📄 Page ${event.pageIndex}: ${event.received} posts (result_count ${event.resultCount}, total ${event.total})`
    );
    if (event.nextCursor) {
      this.log.info(`➡️  Next token available: ${previewCursor(event.nextCursor)}`);
    } else {
      this.log.info('⏹️  No next token');
    }
  }

  rateLimited(event: RateLimitEvent): void {
    if (event.usageCapExceeded) {
      this.log.warn(`⏰ Monthly usage cap hit on page ${event.pageIndex}`);
    } else {
      this.log.warn(`⏰ Rate limit exceeded on page ${event.pageIndex}`);
    }

    if (event.waitMs === null) {
      this.log.warn('💡 Not waiting (--no-wait); returning partial results');
      return;
    }

    const source = event.usedFallback ? 'fallback window' : `reset at ${event.resetAt?.toISOString() ?? 'unknown'}`;
    this.log.warn(`💤 Waiting ${formatDuration(event.waitMs)} (${source}) before retrying page ${event.pageIndex}`);
  }

  runFinished(outcome: RunOutcome): void {
    const summary = `🏁 Run ${outcome.status}: ${outcome.posts.length} posts in ${outcome.pagesFetched} page(s)`;
    if (outcome.status === 'aborted') {
      this.log.error(summary, outcome.error);
      this.log.error(`❌ ${outcome.error.getUserMessage()}`);
    } else {
      this.log.info(outcome.status === 'completed' ? `${summary} (${outcome.reason})` : summary);
    }

    for (const tip of buildTips(outcome)) {
      this.log.info(`💡 Tip: ${tip}`);
    }
  }
}

const PROGRESS_BAR_WIDTH = 30;

export function formatProgressBar(current: number, total: number, action: string): string {
  const percentage = total > 0 ? Math.min(100, Math.round((current / total) * 100)) : 0;
  const filled = Math.round((PROGRESS_BAR_WIDTH * percentage) / 100);
  const bar = '█'.repeat(filled) + '░'.repeat(PROGRESS_BAR_WIDTH - filled);
  return `[${bar}] ${current}/${total} (${percentage}%) | ${action}`;
}

/**
 * Default reporter: a progress bar on stderr, redrawn in place on a TTY and
 * written line by line otherwise. stdout stays free for the run summary.
 */
export class ProgressDiagnosticsReporter implements DiagnosticsReporter {
  private current = 0;
  private limit = 0;
  private lastAction: string | null = null;
  private readonly interactive: boolean;

  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {
    this.interactive = 'isTTY' in stream && stream.isTTY === true;
  }

  runStarted(event: RunStartedEvent): void {
    this.limit = event.descriptor.maxResults;
    this.update('Fetching posts');
  }

  pageReceived(event: PageReceivedEvent): void {
    this.current = event.total;
    this.update(`page ${event.pageIndex}`);
  }

  rateLimited(event: RateLimitEvent): void {
    const what = event.usageCapExceeded ? 'Monthly usage cap hit' : 'Rate limit hit';
    const next = event.waitMs === null ? 'not waiting' : `waiting ${formatDuration(event.waitMs)} before retrying`;
    this.notice(`⏰ ${what} on page ${event.pageIndex}; ${next}`);
  }

  runFinished(): void {
    if (this.interactive && this.lastAction !== null) {
      this.clearLine();
      this.lastAction = null;
    }
  }

  private update(action: string): void {
    this.lastAction = action;
    const line = formatProgressBar(this.current, this.limit, action);
    if (this.interactive) {
      this.clearLine();
      this.stream.write(line);
    } else {
      this.stream.write(`${line}\n`);
    }
  }

  private notice(message: string): void {
    if (this.interactive) this.clearLine();
    this.stream.write(`${message}\n`);
    if (this.interactive && this.lastAction !== null) {
      this.stream.write(formatProgressBar(this.current, this.limit, this.lastAction));
    }
  }

  private clearLine(): void {
    readline.clearLine(this.stream, 0);
    readline.cursorTo(this.stream, 0);
  }
}
