/**
 * Error handling module for tagsweep
 * Defines error types, codes, and classification logic
 */

import { isAxiosError } from 'axios';

/**
 * Standard error codes
 */
export enum ErrorCode {
  // Pre-flight (query and configuration)
  INVALID_RANGE = "INVALID_RANGE",
  EMPTY_QUERY = "EMPTY_QUERY",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",

  // Network Errors
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",

  // Authentication Errors
  AUTH_FAILED = "AUTH_FAILED",

  // Rate Limiting
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

  // API Errors
  API_ERROR = "API_ERROR",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  BAD_REQUEST = "BAD_REQUEST",
  SERVER_ERROR = "SERVER_ERROR",

  // System Errors
  FILE_SYSTEM_ERROR = "FILE_SYSTEM_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  url?: string;
  query?: string;
  operation?: string;
  statusCode?: number;
  pageIndex?: number;
  [key: string]: unknown;
}

export interface SearchErrorOptions {
  retryable?: boolean;
  context?: ErrorContext;
  originalError?: Error;
  statusCode?: number;
  /** When the API expects the current rate window to reset */
  resetAt?: Date;
}

export class SearchError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;
  public readonly resetAt?: Date;

  constructor(code: ErrorCode, message: string, options: SearchErrorOptions = {}) {
    super(message);
    this.name = "SearchError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;
    this.resetAt = options.resetAt;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SearchError);
    }
  }

  /**
   * Get a user-friendly error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.RATE_LIMIT_EXCEEDED:
        return this.context.usageCapExceeded === true
          ? "Monthly usage cap exceeded. Check your plan in the X Developer Portal."
          : "Rate limit exceeded. Wait ~15 minutes before the next run.";
      case ErrorCode.AUTH_FAILED:
        return "Authentication failed. Check X_BEARER_TOKEN in your .env file.";
      case ErrorCode.NETWORK_ERROR:
        return "Network error. Please check your internet connection.";
      case ErrorCode.TIMEOUT:
        return "Request timed out.";
      case ErrorCode.BAD_REQUEST:
        return `Bad request: ${this.message}. Check your query syntax or date range.`;
      default:
        return this.message;
    }
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      statusCode: this.statusCode,
      resetAt: this.resetAt?.toISOString(),
      timestamp: this.timestamp,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }

  /**
   * Map a non-2xx HTTP response onto an error code
   */
  public static fromHttpResponse(
    response: { status: number; statusText?: string; detail?: string; resetAt?: Date },
    context?: ErrorContext
  ): SearchError {
    const statusCode = response.status;
    const detail = response.detail || response.statusText || String(statusCode);

    if (statusCode === 429) {
      return new SearchError(ErrorCode.RATE_LIMIT_EXCEEDED, `Rate limit exceeded: ${detail}`, {
        retryable: true,
        statusCode,
        context,
        resetAt: response.resetAt,
      });
    }

    if (statusCode === 401 || statusCode === 403) {
      return new SearchError(ErrorCode.AUTH_FAILED, `Authentication failed: ${detail}`, {
        retryable: false,
        statusCode,
        context,
      });
    }

    if (statusCode === 400) {
      return new SearchError(ErrorCode.BAD_REQUEST, detail, {
        retryable: false,
        statusCode,
        context,
      });
    }

    if (statusCode >= 500) {
      return new SearchError(ErrorCode.SERVER_ERROR, `Server error: ${detail}`, {
        retryable: true,
        statusCode,
        context,
      });
    }

    return new SearchError(ErrorCode.API_ERROR, `HTTP ${statusCode}: ${detail}`, {
      retryable: false,
      statusCode,
      context,
    });
  }
}

/**
 * Factory for creating common errors
 */
export const SearchErrors = {
  invalidRange: (since: string, until: string) =>
    new SearchError(ErrorCode.INVALID_RANGE, `Invalid date range: since ${since} is after until ${until}`, {
      context: { since, until },
    }),

  emptyQuery: (preset?: string) =>
    new SearchError(
      ErrorCode.EMPTY_QUERY,
      preset ? `Preset "${preset}" resolved to no terms` : "No hashtags or terms supplied",
      { context: preset ? { preset } : {} }
    ),

  validation: (message: string, context?: ErrorContext) =>
    new SearchError(ErrorCode.VALIDATION_ERROR, message, { context }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new SearchError(ErrorCode.CONFIG_ERROR, message, { context }),

  rateLimitExceeded: (message: string = "Rate limit exceeded", resetAt?: Date, context?: ErrorContext) =>
    new SearchError(ErrorCode.RATE_LIMIT_EXCEEDED, message, {
      retryable: true,
      statusCode: 429,
      resetAt,
      context,
    }),

  authenticationFailed: (message: string, statusCode?: number, context?: ErrorContext) =>
    new SearchError(ErrorCode.AUTH_FAILED, message, {
      retryable: false,
      statusCode,
      context,
    }),

  networkError: (message: string, originalError?: Error, context?: ErrorContext) =>
    new SearchError(ErrorCode.NETWORK_ERROR, message, {
      retryable: true,
      originalError,
      context,
    }),

  timeout: (message: string, originalError?: Error, context?: ErrorContext) =>
    new SearchError(ErrorCode.TIMEOUT, message, {
      retryable: true,
      originalError,
      context,
    }),

  malformedResponse: (message: string, context?: ErrorContext) =>
    new SearchError(ErrorCode.INVALID_RESPONSE, message, {
      retryable: false,
      context,
    }),

  apiError: (message: string, statusCode?: number, context?: ErrorContext) =>
    new SearchError(ErrorCode.API_ERROR, message, {
      retryable: false,
      statusCode,
      context,
    }),

  fileSystem: (message: string, originalError?: Error, context?: ErrorContext) =>
    new SearchError(ErrorCode.FILE_SYSTEM_ERROR, message, {
      originalError,
      context,
    }),

  internal: (message: string, context?: ErrorContext) =>
    new SearchError(ErrorCode.INTERNAL_ERROR, message, { context }),
};

// "status code 429", "HTTP 401", "status: 403"
const STATUS_IN_MESSAGE = /\b(?:status(?: code)?|http)[\s:]+(\d{3})\b/;

function statusInMessage(lowerMessage: string): number | undefined {
  const match = STATUS_IN_MESSAGE.exec(lowerMessage);
  return match ? Number(match[1]) : undefined;
}

/**
 * Utility to classify unknown errors
 */
export class ErrorClassifier {
  public static classify(error: unknown, context?: ErrorContext): SearchError {
    if (error instanceof SearchError) {
      if (context) {
        Object.assign(error.context, context);
      }
      return error;
    }

    if (isAxiosError(error)) {
      if (error.response) {
        return SearchError.fromHttpResponse(
          { status: error.response.status, statusText: error.response.statusText },
          context
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return SearchErrors.timeout(error.message, error, context);
      }
      return SearchErrors.networkError(error.message, error, context);
    }

    const message = error instanceof Error ? error.message : String(error);
    const originalError = error instanceof Error ? error : undefined;
    const lowerMessage = message.toLowerCase();

    const status = statusInMessage(lowerMessage);

    if (lowerMessage.includes("rate limit") || lowerMessage.includes("too many requests") || status === 429) {
      return new SearchError(ErrorCode.RATE_LIMIT_EXCEEDED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (
      lowerMessage.includes("network") ||
      lowerMessage.includes("econnrefused") ||
      lowerMessage.includes("econnreset") ||
      lowerMessage.includes("socket hang up") ||
      lowerMessage.includes("fetch failed")
    ) {
      return new SearchError(ErrorCode.NETWORK_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (lowerMessage.includes("timeout") || lowerMessage.includes("timed out")) {
      return new SearchError(ErrorCode.TIMEOUT, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (
      lowerMessage.includes("unauthorized") ||
      lowerMessage.includes("forbidden") ||
      status === 401 ||
      status === 403
    ) {
      return new SearchError(ErrorCode.AUTH_FAILED, message, {
        retryable: false,
        context,
        originalError,
      });
    }

    return new SearchError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    });
  }
}
