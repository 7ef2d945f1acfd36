/**
 * Winston-based logger with structured output.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import { SearchError } from '../core/errors';

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json()
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, module, service: _service, ...meta }) => {
    const scope = typeof module === 'string' ? `[${module}] ` : '';
    let msg = `${String(timestamp)} [${level}]: ${scope}${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

export const logger: Logger = createWinstonLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'tagsweep' },
  transports: [
    new transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn'],
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

const fileLogDirs = new Set<string>();

/**
 * Add error.log and combined.log under logDir. Called again once .env is
 * loaded, so LOG_DIR may come from either place; each directory is added once.
 */
export function enableFileLogging(logDir: string | undefined): void {
  if (!logDir) return;
  const dir = path.resolve(logDir);
  if (fileLogDirs.has(dir)) return;
  fileLogDirs.add(dir);

  logger.add(
    new transports.File({
      filename: path.join(dir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
  logger.add(
    new transports.File({
      filename: path.join(dir, 'combined.log'),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

enableFileLogging(process.env.LOG_DIR);

export interface ModuleLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

function normalizeErrorMeta(
  error: Error | undefined,
  extraMeta: Record<string, unknown>,
): Record<string, unknown> {
  if (!error) {
    return extraMeta;
  }

  const meta: Record<string, unknown> = { ...extraMeta };

  if (error instanceof SearchError) {
    meta.errorCode = error.code;
    meta.retryable = error.retryable;
    meta.errorContext = error.context;
    if (error.statusCode !== undefined) {
      meta.statusCode = error.statusCode;
    }
    if (error.originalError) {
      meta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message,
      };
    }
  } else {
    meta.errorName = error.name;
    meta.errorMessage = error.message;
  }

  return meta;
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(message, { module, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(message, { module, ...meta }),
    error: (message: string, error?: Error, meta: Record<string, unknown> = {}) =>
      logger.error(message, normalizeErrorMeta(error, { module, ...meta })),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(message, { module, ...meta }),
  };
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
} as const;

export type LogLevel = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
