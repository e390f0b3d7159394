import { describe, it, expect, vi } from 'vitest';
import { isRetryableError, statusOf, withRetry } from '../../../src/domains/google-core/providers/retry.js';
import { httpError } from '../../helpers/gmail-fixtures.js';

describe('statusOf', () => {
  it('reads status, numeric code and response.status', () => {
    expect(statusOf({ status: 503 })).toBe(503);
    expect(statusOf({ code: 404 })).toBe(404);
    expect(statusOf({ code: 'ECONNRESET', response: { status: 502 } })).toBe(502);
  });

  it('returns undefined for errors without a status', () => {
    expect(statusOf(new Error('boom'))).toBeUndefined();
    expect(statusOf('boom')).toBeUndefined();
    expect(statusOf(null)).toBeUndefined();
  });
});

describe('isRetryableError', () => {
  it.each([
    [429, true],
    [500, true],
    [503, true],
    [400, false],
    [401, false],
    [404, false],
  ])('status %i → %s', (status, expected) => {
    expect(isRetryableError({ status })).toBe(expected);
  });

  it('does not retry errors without a status', () => {
    expect(isRetryableError(new Error('socket hang up'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { retryDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures until one succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(httpError(503, 'Backend Error'))
      .mockRejectedValueOnce(httpError(429, 'Rate Limit Exceeded'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { retryDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('gives up after maxRetries and throws the last error', async () => {
    const fn = vi.fn().mockRejectedValue(httpError(500, 'Internal Error'));

    await expect(withRetry(fn, { retryDelayMs: 0, maxRetries: 2 })).rejects.toThrow('Internal Error');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('throws non-retryable errors immediately', async () => {
    const fn = vi.fn().mockRejectedValue(httpError(404, 'Requested entity was not found.'));

    await expect(withRetry(fn, { retryDelayMs: 0 })).rejects.toThrow('Requested entity was not found.');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
