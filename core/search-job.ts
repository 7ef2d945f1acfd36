import { writeRunOutput, type OutputFormat } from '../utils/export';
import { createModuleLogger, type ModuleLogger } from '../utils/logger';
import {
  buildTips,
  LoggerDiagnosticsReporter,
  ProgressDiagnosticsReporter,
  type DiagnosticsReporter,
} from './diagnostics';
import type { AppConfig } from './env';
import { buildQueryDescriptor, isOutsideRecentWindow, type QueryInput } from './query-builder';
import type { PresetResolver } from './presets';
import { SearchRunner } from './search-runner';
import type { RunOutcome, SearchEndpoint } from './search-runner.types';
import { XApiClient } from './x-api';

export interface SearchJobOptions {
  query: QueryInput;
  waitOnRateLimit: boolean;
  format: OutputFormat;
  /** Overrides config.outputDir */
  outputDir?: string;
  debug?: boolean;
}

export interface SearchJobDependencies {
  config: AppConfig;
  /** Defaults to an XApiClient built from config */
  endpoint?: SearchEndpoint;
  diagnostics?: DiagnosticsReporter;
  presets?: PresetResolver;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: ModuleLogger;
}

export interface SearchJobResult {
  outcome: RunOutcome;
  /** null when nothing was written */
  outputPath: string | null;
  exitCode: 0 | 1;
  /** Operator-facing summary lines */
  summary: string[];
}

/**
 * Aborted runs are only persisted when they fetched something.
 */
export function shouldPersist(outcome: RunOutcome): boolean {
  return outcome.status !== 'aborted' || outcome.posts.length > 0;
}

export function summarize(outcome: RunOutcome, outputPath: string | null): string[] {
  const lines: string[] = [];
  const count = outcome.posts.length;

  if (outcome.status === 'aborted') {
    lines.push(`❌ Run aborted after ${outcome.pagesFetched} page(s): ${outcome.error.getUserMessage()}`);
    lines.push(outputPath ? `💾 Saved ${count} partial posts to ${outputPath}` : '💾 Nothing was saved');
  } else if (count === 0) {
    lines.push('⚠️  No posts found. Possible reasons:');
    const reasons =
      outcome.status === 'partially_completed' ? ['Rate limit exceeded (wait ~15 minutes)'] : buildTips(outcome);
    lines.push(...reasons.map((reason) => `   • ${reason}`));
    if (outputPath) lines.push(`💾 Empty result saved to ${outputPath}`);
  } else {
    lines.push(`✅ Saved ${count} posts to ${outputPath ?? '(not saved)'}`);
    if (outcome.status === 'partially_completed') {
      lines.push('⏰ Stopped early on a rate limit; results are partial');
    }
  }

  return lines;
}

/**
 * Build the query, run the search and persist the outcome.
 * Query validation errors are thrown before any request is sent.
 */
export async function executeSearch(options: SearchJobOptions, deps: SearchJobDependencies): Promise<SearchJobResult> {
  const log = deps.logger ?? createModuleLogger('SearchJob');
  const now = deps.now ?? (() => new Date());
  const { config } = deps;

  const descriptor = buildQueryDescriptor(options.query, { now: now(), presets: deps.presets });

  if (isOutsideRecentWindow(descriptor, now())) {
    log.warn('Start date is older than the 7-day recent search window; the API may reject it', {
      since: descriptor.since?.toISOString(),
    });
  }

  const endpoint =
    deps.endpoint ??
    new XApiClient({
      bearerToken: config.bearerToken,
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.requestTimeoutMs,
    });

  const diagnostics =
    deps.diagnostics ?? (options.debug ? new LoggerDiagnosticsReporter() : new ProgressDiagnosticsReporter());

  const runner = new SearchRunner({
    endpoint,
    waitOnRateLimit: options.waitOnRateLimit,
    pageSize: config.pageSize,
    rateLimitFallbackMs: config.rateLimitFallbackMs,
    rateLimitMaxWaitMs: config.rateLimitMaxWaitMs,
    diagnostics,
    sleep: deps.sleep,
    now,
  });

  const outcome = await runner.run(descriptor);

  let outputPath: string | null = null;
  if (shouldPersist(outcome)) {
    outputPath = await writeRunOutput(outcome.posts, {
      format: options.format,
      outputDir: options.outputDir ?? config.outputDir,
      timestamp: now(),
    });
    log.debug('Run output written', { outputPath, count: outcome.posts.length });
  }

  if (outcome.status === 'aborted') {
    log.error('Search run aborted', outcome.error, { pagesFetched: outcome.pagesFetched });
  }

  return {
    outcome,
    outputPath,
    exitCode: outcome.status === 'aborted' ? 1 : 0,
    summary: summarize(outcome, outputPath),
  };
}
