/**
 * Application Constants
 *
 * This file contains ONLY immutable values of the X API and of the output
 * layout. Values an operator may tune (page size, rate-limit waits, timeouts)
 * live in core/env.ts.
 */

// ==================== X API ====================

export const X_API_BASE_URL = "https://api.twitter.com/2";

export const X_API_RECENT_SEARCH_PATH = "/tweets/search/recent";

/** Bounds the recent search endpoint accepts for max_results */
export const X_API_MIN_PAGE_SIZE = 10;
export const X_API_MAX_PAGE_SIZE = 100;

export const X_API_TWEET_FIELDS = ["id", "created_at", "lang", "public_metrics", "entities", "author_id"];
export const X_API_USER_FIELDS = ["id", "name", "username"];
export const X_API_EXPANSIONS = ["author_id"];

/** Epoch seconds at which the current rate window resets */
export const X_API_RATE_LIMIT_RESET_HEADER = "x-rate-limit-reset";

/** Problem title X returns with a 429 once the monthly post cap is spent */
export const X_API_USAGE_CAP_TITLE = "UsageCapExceeded";

/** Recent search only covers this many trailing days */
export const RECENT_SEARCH_HISTORY_DAYS = 7;

/**
 * end_time must be at least 10 seconds before the request; "today" is
 * resolved to now minus this margin.
 */
export const END_TIME_SAFETY_MARGIN_MS = 20 * 1000;

// ==================== 搜索默认值 ====================

export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_RESULT_LIMIT = 100;
export const DEFAULT_RATE_LIMIT_FALLBACK_MS = 15 * 60 * 1000;
export const DEFAULT_RATE_LIMIT_MAX_WAIT_MS = 20 * 60 * 1000;
/** Added to the reset hint so the retry lands after the window flips */
export const RATE_LIMIT_RESET_BUFFER_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

// ==================== 输出 ====================

export const DEFAULT_OUTPUT_DIR = "data";
export const OUTPUT_FILE_PREFIX = "tweets";
export const OUTPUT_FORMATS = ["csv", "json"] as const;
