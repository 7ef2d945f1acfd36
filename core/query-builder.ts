/**
 * Query Builder
 *
 * Turns CLI-level input (terms or a preset, language, YYYY-MM-DD dates, limit)
 * into an immutable QueryDescriptor, and renders the descriptor as a recent
 * search expression. No I/O: the clock and the preset resolver are injected.
 */

import { END_TIME_SAFETY_MARGIN_MS, RECENT_SEARCH_HISTORY_DAYS } from '../config/constants';
import { DateUtils } from '../utils/date-utils';
import { SearchErrors } from './errors';
import { defaultPresetResolver, type PresetResolver } from './presets';

export interface QueryInput {
  terms?: readonly string[];
  preset?: string;
  language?: string;
  /** YYYY-MM-DD, inclusive */
  since?: string;
  /** YYYY-MM-DD, inclusive; today means "up to now" */
  until?: string;
  maxResults: number;
}

export interface QueryBuilderOptions {
  now?: Date;
  presets?: PresetResolver;
  endTimeMarginMs?: number;
}

export interface QueryDescriptor {
  readonly terms: readonly string[];
  readonly language: string | null;
  readonly since: Date | null;
  readonly until: Date | null;
  readonly maxResults: number;
}

const LANGUAGE_PATTERN = /^[a-z]{2,3}$/;

function cleanTerms(terms: readonly string[] | undefined): string[] {
  return (terms ?? []).map((term) => term.trim()).filter((term) => term.length > 0);
}

function resolveTerms(input: QueryInput, presets: PresetResolver): string[] {
  const direct = cleanTerms(input.terms);
  if (direct.length > 0) return direct;

  if (input.preset) {
    const fromPreset = cleanTerms(presets.resolve(input.preset));
    if (fromPreset.length > 0) return fromPreset;
  }

  throw SearchErrors.emptyQuery(input.preset);
}

function parseDateOption(name: 'since' | 'until', value: string): Date {
  const parsed = DateUtils.parseYmd(value);
  if (!parsed) {
    throw SearchErrors.validation(`--${name} must be a date in YYYY-MM-DD format, got "${value}"`, {
      [name]: value,
    });
  }
  return parsed;
}

export function buildQueryDescriptor(input: QueryInput, options: QueryBuilderOptions = {}): QueryDescriptor {
  const now = options.now ?? new Date();
  const presets = options.presets ?? defaultPresetResolver;
  const margin = options.endTimeMarginMs ?? END_TIME_SAFETY_MARGIN_MS;

  if (!Number.isInteger(input.maxResults) || input.maxResults <= 0) {
    throw SearchErrors.validation(`Maximum result count must be a positive integer, got ${input.maxResults}`);
  }

  const terms = resolveTerms(input, presets);

  let language: string | null = null;
  if (input.language !== undefined && input.language.trim() !== '') {
    language = input.language.trim().toLowerCase();
    if (!LANGUAGE_PATTERN.test(language)) {
      throw SearchErrors.validation(`--lang must be an ISO 639-1 code such as "es" or "en", got "${input.language}"`);
    }
  }

  const sinceDay = input.since ? parseDateOption('since', input.since) : null;
  const untilDay = input.until ? parseDateOption('until', input.until) : null;

  if (sinceDay && untilDay && sinceDay.getTime() > untilDay.getTime()) {
    throw SearchErrors.invalidRange(DateUtils.toUtcYmd(sinceDay), DateUtils.toUtcYmd(untilDay));
  }

  let until: Date | null = null;
  if (untilDay) {
    const today = DateUtils.startOfUtcDay(now);
    // today (or a future day) becomes "up to now"
    if (untilDay.getTime() >= today.getTime()) {
      until = new Date(Math.max(now.getTime() - margin, today.getTime()));
    } else {
      until = DateUtils.endOfUtcDay(untilDay);
    }
  }

  // e.g. --since today in the first seconds of the UTC day, or a future --since
  if (sinceDay && until && until.getTime() <= sinceDay.getTime()) {
    throw SearchErrors.validation(
      `Search window is empty: --until resolves to ${DateUtils.toRfc3339(until)}, which is not after --since ${DateUtils.toUtcYmd(sinceDay)}`,
      { since: DateUtils.toRfc3339(sinceDay), until: DateUtils.toRfc3339(until) }
    );
  }

  return Object.freeze({
    terms: Object.freeze(terms),
    language,
    since: sinceDay,
    until,
    maxResults: input.maxResults,
  });
}

/**
 * (#a OR #b) lang:es
 */
export function toSearchExpression(descriptor: QueryDescriptor): string {
  const parts = [`(${descriptor.terms.join(' OR ')})`];
  if (descriptor.language) {
    parts.push(`lang:${descriptor.language}`);
  }
  return parts.join(' ');
}

/**
 * True when `since` reaches back further than recent search can see.
 */
export function isOutsideRecentWindow(descriptor: QueryDescriptor, now: Date = new Date()): boolean {
  if (!descriptor.since) return false;
  const horizon = DateUtils.startOfUtcDay(DateUtils.addDays(now, -RECENT_SEARCH_HISTORY_DAYS));
  return descriptor.since.getTime() < horizon.getTime();
}
