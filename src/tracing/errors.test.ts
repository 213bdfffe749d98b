import { describe, it, expect } from 'vitest';
import {
  ExportError,
  HttpExportError,
  TraceTimeoutError,
  isRetryableError,
  isRetryableStatus,
  toError,
} from './errors.js';

describe('isRetryableStatus', () => {
  it.each([
    [500, true],
    [503, true],
    [408, true],
    [429, true],
    [400, false],
    [401, false],
    [404, false],
    [422, false],
  ])('classifies %i as retryable=%s', (status, expected) => {
    expect(isRetryableStatus(status)).toBe(expected);
  });
});

describe('isRetryableError', () => {
  it('follows the classification of export errors', () => {
    expect(isRetryableError(new ExportError('x', { retryable: false }))).toBe(false);
    expect(isRetryableError(new HttpExportError('x', 502))).toBe(true);
  });

  it('treats anything unclassified as transient', () => {
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
    expect(isRetryableError('ECONNRESET')).toBe(true);
  });
});

describe('TraceTimeoutError', () => {
  it('names the trace and the timeout', () => {
    const error = new TraceTimeoutError('abc', 5000);
    expect(error.message).toBe('Trace abc exceeded the 5000ms timeout and was closed');
    expect(error.code).toBe('TRACE_TIMEOUT');
  });
});

describe('toError', () => {
  it('keeps errors and wraps everything else', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError(42).message).toBe('42');
  });
});
