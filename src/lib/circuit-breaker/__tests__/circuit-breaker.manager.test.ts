/**
 * Circuit Breaker Tests
 */

import { CircuitBreaker, createCircuitBreaker } from '../circuit-breaker.manager';
import { CircuitBreakerEvent, CircuitState } from '../circuit-breaker.types';
import { FetchErrorType, classifyError } from '../../errors/fetch-errors';

describe('CircuitBreaker', () => {
  const breakers: Array<CircuitBreaker<[number], number>> = [];

  afterEach(() => {
    breakers.splice(0).forEach((breaker) => breaker.shutdown());
  });

  function track(breaker: CircuitBreaker<[number], number>): CircuitBreaker<[number], number> {
    breakers.push(breaker);
    return breaker;
  }

  it('should pass calls through while closed', async () => {
    const breaker = track(createCircuitBreaker(async (value: number) => value * 2, { name: 'double' }));

    await expect(breaker.execute(21)).resolves.toBe(42);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats()).toMatchObject({ successes: 1, failures: 0, totalRequests: 1, errorRate: 0 });
  });

  it('should open after enough failures and reject without calling through', async () => {
    const fn = jest.fn(async (_value: number): Promise<number> => {
      throw new Error('upstream down');
    });
    const breaker = track(
      new CircuitBreaker(fn, { errorThresholdPercentage: 50, minimumRequests: 2, resetTimeout: 60000 })
    );
    const opened = jest.fn();
    breaker.on(CircuitBreakerEvent.OPEN, opened);

    await expect(breaker.execute(1)).rejects.toThrow('upstream down');
    await expect(breaker.execute(2)).rejects.toThrow('upstream down');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(opened).toHaveBeenCalledTimes(1);

    const rejected = await breaker.execute(3).catch((error: unknown) => error);
    expect(classifyError(rejected).type).toBe(FetchErrorType.CIRCUIT_OPEN);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(breaker.getStats()).toMatchObject({ failures: 2, rejections: 1, errorRate: 100 });
  });

  it('should report closed when disabled', async () => {
    const breaker = track(new CircuitBreaker(async (value: number) => value, { enabled: false }));

    await breaker.execute(1);

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });
});
