/**
 * Unit tests for error normalization and retry classification
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  ErrorSeverity,
  SelectorError,
  attempt,
  createApiError,
  createStorageError,
  isRetryable,
  normalizeError
} from './error-handler.js';

const httpError = (message: string, status: number) => Object.assign(new Error(message), { status });

describe('normalizeError', () => {
  it('should map HTTP statuses onto API error codes', () => {
    expect(normalizeError(httpError('Bad credentials', 401)).code).toBe(ErrorCode.API_UNAUTHORIZED);
    expect(normalizeError(httpError('Forbidden', 403)).code).toBe(ErrorCode.API_RATE_LIMIT);
    expect(normalizeError(httpError('Too Many Requests', 429)).code).toBe(ErrorCode.API_RATE_LIMIT);
    expect(normalizeError(httpError('Not Found', 404)).code).toBe(ErrorCode.API_NOT_FOUND);
    expect(normalizeError(httpError('Bad Gateway', 502))).toMatchObject({
      code: ErrorCode.API_SERVER_ERROR,
      context: { statusCode: 502 }
    });
  });

  it('should recognize network failures by code and name', () => {
    expect(normalizeError(Object.assign(new Error('reset'), { code: 'ECONNRESET' })).code)
      .toBe(ErrorCode.API_NETWORK_ERROR);

    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    expect(normalizeError(timeout).code).toBe(ErrorCode.API_NETWORK_ERROR);
  });

  it('should wrap anything else as unknown', () => {
    const normalized = normalizeError('plain string');

    expect(normalized).toBeInstanceOf(SelectorError);
    expect(normalized.code).toBe(ErrorCode.UNKNOWN);
    expect(normalized.message).toBe('plain string');
  });

  it('should pass SelectorErrors through unchanged', () => {
    const original = createStorageError('disk full', 'repositories.db');

    expect(normalizeError(original)).toBe(original);
  });
});

describe('isRetryable', () => {
  it('should retry rate limits, network errors and gateway failures only', () => {
    expect(isRetryable(createApiError('limited', 429))).toBe(true);
    expect(isRetryable(normalizeError(Object.assign(new Error('x'), { code: 'ETIMEDOUT' })))).toBe(true);
    expect(isRetryable(createApiError('gateway', 504))).toBe(true);
    expect(isRetryable(createApiError('server', 500))).toBe(false);
    expect(isRetryable(createApiError('missing', 404))).toBe(false);
  });
});

describe('attempt', () => {
  it('should capture a value or a normalized failure', async () => {
    expect(await attempt(async () => 42)).toEqual({ ok: true, value: 42 });

    const failed = await attempt(async () => {
      throw httpError('Not Found', 404);
    });
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.reason).toBe('Not Found');
      expect(failed.error.code).toBe(ErrorCode.API_NOT_FOUND);
    }
  });
});

describe('SelectorError', () => {
  it('should format its message with context', () => {
    const error = new SelectorError('boom', ErrorCode.SEARCH_FAILED, ErrorSeverity.HIGH, {
      component: 'search',
      operation: 'findFreshCandidates'
    });

    expect(error.getFormattedMessage()).toBe('[SEARCH_FAILED] boom (Component: search) (Operation: findFreshCandidates)');
  });

  it('should fall back to default suggestions for the error code', () => {
    const error = createStorageError('locked');

    expect(error.getRecoverySuggestions()).toEqual([
      'Check that the database path is writable',
      'Run `repo-scout backup` before repairing the database'
    ]);
  });
});
