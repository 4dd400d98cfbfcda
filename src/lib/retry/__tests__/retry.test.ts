/**
 * Retry Tests
 */

import { calculateRetryDelay, retryWithBackoff } from '../retry';
import {
  FetchErrorType,
  HttpStatusError,
  RateLimitedError,
  RetryExhaustedError,
} from '../../errors/fetch-errors';

describe('retryWithBackoff', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn<Promise<void>, [number]>(async () => undefined);
  });

  it('should return the first successful result', async () => {
    const fn = jest.fn(async (_attempt: number) => 'ok');

    await expect(retryWithBackoff(fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledWith(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should back off exponentially on transient failures', async () => {
    const onRetry = jest.fn();
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new HttpStatusError(503, 'unavailable'))
      .mockRejectedValueOnce(new HttpStatusError(502, 'bad gateway'))
      .mockResolvedValueOnce('ok');

    const result = await retryWithBackoff(fn, { maxRetries: 5, baseDelay: 100, sleep, onRetry });

    expect(result).toBe('ok');
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(onRetry).toHaveBeenNthCalledWith(1, expect.objectContaining({ type: FetchErrorType.SERVER_ERROR }), 1, 100);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.objectContaining({ type: FetchErrorType.SERVER_ERROR }), 2, 200);
  });

  it('should rethrow a permanent failure without retrying', async () => {
    const error = new HttpStatusError(401, 'bad credentials');
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, { sleep })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should give up after the retry budget with the last failure as cause', async () => {
    const last = new HttpStatusError(500, 'still down');
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new HttpStatusError(500, 'down'))
      .mockRejectedValueOnce(new HttpStatusError(500, 'down'))
      .mockRejectedValueOnce(last);

    const error = await retryWithBackoff(fn, { maxRetries: 3, baseDelay: 10, sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.message).toBe('Exhausted 3 retries: Server error');
      expect(error.attempts).toBe(3);
      expect(error.cause).toBe(last);
    }
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
  });

  it('should wait the server-provided interval on rate limits', async () => {
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new RateLimitedError('slow down', 5000))
      .mockResolvedValueOnce('ok');

    await retryWithBackoff(fn, { baseDelay: 10, rateLimitDelay: 60000, sleep });

    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('should wait the fixed rate-limit interval when the server gives none', async () => {
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new RateLimitedError('slow down'))
      .mockResolvedValueOnce('ok');

    await retryWithBackoff(fn, { baseDelay: 10, rateLimitDelay: 777, sleep });

    expect(sleep).toHaveBeenCalledWith(777);
  });
});

describe('calculateRetryDelay', () => {
  it('should double per attempt for transient errors', () => {
    const error = { type: FetchErrorType.NETWORK_ERROR, message: 'down', retryable: true };

    expect(calculateRetryDelay(error, 0, 1000, 60000)).toBe(1000);
    expect(calculateRetryDelay(error, 3, 1000, 60000)).toBe(8000);
  });

  it('should ignore the attempt number for rate limits', () => {
    const error = { type: FetchErrorType.RATE_LIMITED, message: 'limited', retryable: true };

    expect(calculateRetryDelay(error, 4, 1000, 60000)).toBe(60000);
  });
});
