/**
 * @fileoverview Retry helper for Google API calls.
 *
 * Retries on 429/5xx with linear backoff. Everything else is thrown
 * immediately so callers can map it (404 → not found, etc.).
 */

import type { AppLogger } from '../../../utils/observability/index.js';
import { createLogger } from '../../../utils/observability/index.js';

/** Retry configuration for Google API calls. */
export const MAX_RETRIES = 2;
export const RETRY_DELAY_MS = 1000;

export interface RetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  operation?: string;
  logger?: AppLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status carried by a googleapis (gaxios) error, if any.
 * Gaxios sets a numeric `code` or `status`, and always `response.status`.
 */
export function statusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.code === 'number') return error.code;
  if (isRecord(error.response) && typeof error.response.status === 'number') {
    return error.response.status;
  }
  return undefined;
}

/**
 * Check if an error is retryable (429 or 5xx).
 */
export function isRetryableError(error: unknown): boolean {
  const status = statusOf(error);
  if (status === undefined) return false;
  return status === 429 || (status >= 500 && status < 600);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  const logger = options.logger ?? createLogger({ domain: 'google' });

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < maxRetries && isRetryableError(error)) {
        logger.warn('google_api_retry', {
          operation: options.operation,
          attempt: attempt + 1,
          maxRetries,
          status: statusOf(error),
        });
        await sleep(retryDelayMs * (attempt + 1));
      } else {
        throw error;
      }
    }
  }
  throw lastError;
}
