/**
 * Retry utility with exponential backoff
 */

import { env } from '../../config/env';
import {
  FetchError,
  FetchErrorType,
  RetryExhaustedError,
  classifyError,
} from '../errors/fetch-errors';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;                  // First transient delay, doubled per attempt
  rateLimitDelay?: number;             // Used when a rate limit gives no retry-after
  classify?: (error: unknown) => FetchError;
  onRetry?: (error: FetchError, attempt: number, delay: number) => void;
  sleep?: Sleep;
}

/**
 * Delay before the next attempt. Rate limits wait a fixed interval,
 * everything else backs off exponentially.
 */
export function calculateRetryDelay(
  error: FetchError,
  attempt: number,
  baseDelay: number,
  rateLimitDelay: number
): number {
  if (error.type === FetchErrorType.RATE_LIMITED) {
    return error.retryAfter ?? rateLimitDelay;
  }
  return baseDelay * Math.pow(2, attempt);
}

/**
 * Retry mechanism with exponential backoff.
 * Non-retryable errors are rethrown as they are; an exhausted budget
 * raises RetryExhaustedError with the last failure as its cause.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = env.MAX_RETRIES,
    baseDelay = env.RETRY_BACKOFF_BASE,
    rateLimitDelay = env.RATE_LIMIT_SLEEP_MS,
    classify = classifyError,
    onRetry,
    sleep: wait = sleep,
  } = options;

  let lastError: unknown = null;
  let lastClassified: FetchError | null = null;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      const classified = classify(error);
      if (!classified.retryable) {
        throw error;
      }

      lastError = error;
      lastClassified = classified;

      if (attempt < maxRetries - 1) {
        const delay = calculateRetryDelay(classified, attempt, baseDelay, rateLimitDelay);
        if (onRetry) {
          onRetry(classified, attempt + 1, delay);
        }
        await wait(delay);
      }
    }
  }

  throw new RetryExhaustedError(
    `Exhausted ${maxRetries} retries: ${lastClassified?.message ?? 'no attempts made'}`,
    maxRetries,
    { cause: lastError }
  );
}
