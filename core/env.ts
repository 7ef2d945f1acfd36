import { z } from 'zod';
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PAGE_SIZE,
  DEFAULT_RATE_LIMIT_FALLBACK_MS,
  DEFAULT_RATE_LIMIT_MAX_WAIT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  X_API_BASE_URL,
  X_API_MAX_PAGE_SIZE,
  X_API_MIN_PAGE_SIZE,
} from '../config/constants';
import { SearchErrors } from './errors';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .default(String(fallback))
    .transform((val) => parseInt(val, 10));

const envSchema = z.object({
  // Credentials (TWITTER_BEARER_TOKEN is the older name)
  X_BEARER_TOKEN: z.string().trim().optional(),
  TWITTER_BEARER_TOKEN: z.string().trim().optional(),

  // X API
  X_API_BASE_URL: z.string().url().default(X_API_BASE_URL),
  SEARCH_PAGE_SIZE: intFromEnv(DEFAULT_PAGE_SIZE).pipe(
    z.number().int().min(X_API_MIN_PAGE_SIZE).max(X_API_MAX_PAGE_SIZE)
  ),
  REQUEST_TIMEOUT_MS: intFromEnv(DEFAULT_REQUEST_TIMEOUT_MS),

  // Rate limiting
  RATE_LIMIT_FALLBACK_MS: intFromEnv(DEFAULT_RATE_LIMIT_FALLBACK_MS),
  RATE_LIMIT_MAX_WAIT_MS: intFromEnv(DEFAULT_RATE_LIMIT_MAX_WAIT_MS),

  // Output
  OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export interface AppConfig {
  bearerToken: string;
  apiBaseUrl: string;
  pageSize: number;
  requestTimeoutMs: number;
  rateLimitFallbackMs: number;
  rateLimitMaxWaitMs: number;
  outputDir: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

/**
 * Validate the environment into an AppConfig. The result is passed to the
 * client and runner explicitly; nothing here is cached.
 */
export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw SearchErrors.invalidConfiguration(`Invalid environment: ${issues.join('; ')}`, { issues });
  }

  const env = parsed.data;
  const bearerToken = env.X_BEARER_TOKEN || env.TWITTER_BEARER_TOKEN;
  if (!bearerToken) {
    throw SearchErrors.invalidConfiguration('Missing X_BEARER_TOKEN in .env');
  }

  return {
    bearerToken,
    apiBaseUrl: env.X_API_BASE_URL,
    pageSize: env.SEARCH_PAGE_SIZE,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    rateLimitFallbackMs: env.RATE_LIMIT_FALLBACK_MS,
    rateLimitMaxWaitMs: env.RATE_LIMIT_MAX_WAIT_MS,
    outputDir: env.OUTPUT_DIR,
    logLevel: env.LOG_LEVEL,
  };
}
