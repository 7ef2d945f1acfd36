/**
 * Core Module Exports
 */

export {
  buildTips,
  type DiagnosticsReporter,
  LoggerDiagnosticsReporter,
  NoopDiagnosticsReporter,
  ProgressDiagnosticsReporter,
  type PageReceivedEvent,
  type RateLimitEvent,
  type RunStartedEvent,
} from './diagnostics';
export { type AppConfig, loadAppConfig } from './env';
// Errors
export {
  ErrorClassifier,
  ErrorCode,
  type ErrorContext,
  SearchError,
  SearchErrors,
} from './errors';
export { listPresets, type PresetResolver, resolvePreset, StaticPresetResolver } from './presets';
export {
  buildQueryDescriptor,
  isOutsideRecentWindow,
  type QueryDescriptor,
  type QueryInput,
  toSearchExpression,
} from './query-builder';
export { ResultAccumulator } from './result-accumulator';
export { executeSearch, type SearchJobOptions, type SearchJobResult } from './search-job';
export { SearchRunner } from './search-runner';
export type {
  RunOutcome,
  RunStatus,
  SearchEndpoint,
  SearchPage,
  SearchPageRequest,
  SearchRunnerOptions,
} from './search-runner.types';
export { XApiClient, type XApiClientOptions } from './x-api';

// Output
export { type ExportOptions, type OutputFormat, serializeCsv, serializeJson, writeRunOutput } from '../utils/export';
export { createModuleLogger, type ModuleLogger, setLogLevel } from '../utils/logger';
