import { describe, it, expect, vi } from 'vitest';
import {
  ConfigurationError,
  ParseError,
  PermanentFetchError,
  RequestAbortedError,
  RequestTimeoutError,
  TransientFetchError,
  categorizeError,
  isAbortError,
  isCollectorError
} from '../lib/errors';
import { createLogger } from '../lib/logger';

describe('error taxonomy', () => {
  it('maps errors to metric categories', () => {
    expect(categorizeError(new TransientFetchError('HTTP 503', { statusCode: 503 }))).toBe('transient');
    expect(categorizeError(new RequestTimeoutError('slow', { timeout: 10 }))).toBe('transient');
    expect(categorizeError(new PermanentFetchError('HTTP 404', { statusCode: 404 }))).toBe('permanent');
    expect(categorizeError(new ParseError('bad feed', { format: 'feed' }))).toBe('parse');
    expect(categorizeError(new RequestAbortedError())).toBe('cancelled');
    expect(categorizeError(new Error('boom'))).toBe('transient');
  });

  it('recognizes native abort errors', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new Error('nope'))).toBe(false);
  });

  it('keeps codes, URLs and causes', () => {
    const cause = new Error('socket hang up');
    const error = new TransientFetchError('Network error', { url: 'https://a.example.com', cause });
    const timeout = new RequestTimeoutError('slow', { timeout: 5000 });

    expect(isCollectorError(error)).toBe(true);
    expect(error.code).toBe('TRANSIENT_FETCH_ERROR');
    expect(error.url).toBe('https://a.example.com');
    expect(error.cause).toBe(cause);
    expect(timeout.code).toBe('REQUEST_TIMEOUT');
    expect(timeout.timeout).toBe(5000);
    expect(new ConfigurationError('bad', { issues: ['x: y'] }).issues).toEqual(['x: y']);
  });
});

describe('createLogger', () => {
  it('tags lines with the scope and honours the level', () => {
    const write = vi.fn();
    const logger = createLogger({ level: 'info', write });

    logger.debug('hidden');
    logger.info('🚀 starting');
    logger.child('Fetch').warn('🔄 retrying', { attempt: 2 });

    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenNthCalledWith(1, 'info', '[Collector] 🚀 starting', undefined);
    expect(write).toHaveBeenNthCalledWith(2, 'warn', '[Collector:Fetch] 🔄 retrying', { attempt: 2 });
  });

  it('writes nothing when silent', () => {
    const write = vi.fn();
    const logger = createLogger({ level: 'silent', write });

    logger.error('ignored');

    expect(write).not.toHaveBeenCalled();
  });
});
