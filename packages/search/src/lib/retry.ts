/**
 * Retry with exponential backoff for transient provider errors.
 */

import { getErrorMessage } from '@scriptdex/core';
import { createLogger } from './logger.js';

const log = createLogger('retry');

export interface RetryOptions {
  /** Total number of attempts, including the first (default 3). */
  attempts?: number;
  /** Base delay in ms for exponential backoff (default 1000). */
  baseDelayMs?: number;
  /** Decides whether an error is worth another attempt (default: every error). */
  isRetryable?: (err: unknown) => boolean;
  /** Included in log lines to identify the operation. */
  label?: string;
}

/** Delay before retry number `attempt` (0-based): base * 2^attempt. */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Execute `fn`, retrying failures with exponential backoff.
 * Non-retryable errors and the last failure propagate.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options?.attempts ?? 3);
  const baseDelayMs = options?.baseDelayMs ?? 1000;
  const isRetryable = options?.isRetryable ?? (() => true);

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (!isRetryable(err) || attempt === attempts - 1) {
        throw err;
      }
      const delay = backoffDelay(baseDelayMs, attempt);
      log.warn(`Attempt ${attempt + 1}/${attempts} failed, retrying in ${delay}ms`, {
        label: options?.label,
        message: getErrorMessage(err),
      });
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }
  // Unreachable, but TypeScript needs it
  throw lastError;
}
