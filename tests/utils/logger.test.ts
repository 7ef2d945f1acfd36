import { describe, test, expect, vi, afterEach } from 'vitest';
/**
 * Logger 单元测试
 */

import { createModuleLogger, logger, setLogLevel, LOG_LEVELS } from '../../utils/logger';
import { SearchErrors } from '../../core/errors';

describe('createModuleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel(LOG_LEVELS.INFO);
  });

  test('should tag messages with the module name', () => {
    const spy = vi.spyOn(logger, 'info');

    createModuleLogger('SearchJob').info('Run output written', { count: 3 });

    expect(spy).toHaveBeenCalledWith('Run output written', { module: 'SearchJob', count: 3 });
  });

  test('should flatten SearchError details into the metadata', () => {
    const spy = vi.spyOn(logger, 'error');
    const error = SearchErrors.authenticationFailed('Authentication failed: Unauthorized', 401, { pageIndex: 1 });

    createModuleLogger('SearchJob').error('Search run aborted', error, { pagesFetched: 0 });

    expect(spy).toHaveBeenCalledWith('Search run aborted', {
      module: 'SearchJob',
      pagesFetched: 0,
      errorCode: 'AUTH_FAILED',
      retryable: false,
      errorContext: { pageIndex: 1 },
      statusCode: 401,
    });
  });

  test('should record name and message of plain errors', () => {
    const spy = vi.spyOn(logger, 'error');

    createModuleLogger('CLI').error('boom', new TypeError('bad value'));

    expect(spy).toHaveBeenCalledWith('boom', { module: 'CLI', errorName: 'TypeError', errorMessage: 'bad value' });
  });

  test('setLogLevel should change the winston level', () => {
    setLogLevel(LOG_LEVELS.DEBUG);

    expect(logger.level).toBe('debug');
  });
});
