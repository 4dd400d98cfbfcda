/**
 * Circuit Breaker Manager
 * Circuit breaker implementation using opossum library
 */

import CircuitBreakerLib from 'opossum';
import { EventEmitter } from 'events';
import {
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
  CircuitBreakerEvent,
} from './circuit-breaker.types';

export class CircuitBreaker<TArgs extends unknown[], TResult> extends EventEmitter {
  private breaker: CircuitBreakerLib<TArgs, TResult>;
  private config: Required<CircuitBreakerConfig>;
  private failures: number = 0;
  private successes: number = 0;
  private rejections: number = 0;
  private lastFailureTime?: number;

  constructor(fn: (...args: TArgs) => Promise<TResult>, config?: CircuitBreakerConfig) {
    super();

    this.config = {
      timeout: config?.timeout ?? 10000,
      errorThresholdPercentage: config?.errorThresholdPercentage ?? 50,
      resetTimeout: config?.resetTimeout ?? 30000,
      monitoringPeriod: config?.monitoringPeriod ?? 60000,
      minimumRequests: config?.minimumRequests ?? 5,
      enabled: config?.enabled !== false,
      name: config?.name ?? 'CircuitBreaker',
    };

    this.breaker = new CircuitBreakerLib(fn, {
      timeout: this.config.timeout,
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeout,
      rollingCountTimeout: this.config.monitoringPeriod,
      rollingCountBuckets: 10,
      volumeThreshold: this.config.minimumRequests,
      name: this.config.name,
      enabled: this.config.enabled,
    });

    // Track statistics
    this.breaker.on('success', () => {
      this.successes++;
      this.emit(CircuitBreakerEvent.SUCCESS);
    });

    this.breaker.on('failure', () => {
      this.failures++;
      this.lastFailureTime = Date.now();
      this.emit(CircuitBreakerEvent.FAILURE);
    });

    this.breaker.on('reject', () => {
      this.rejections++;
    });

    this.breaker.on('open', () => {
      this.emit(CircuitBreakerEvent.OPEN);
    });

    this.breaker.on('halfOpen', () => {
      this.emit(CircuitBreakerEvent.HALF_OPEN);
    });

    this.breaker.on('close', () => {
      this.emit(CircuitBreakerEvent.CLOSE);
    });
  }

  /**
   * Execute function through circuit breaker
   */
  execute(...args: TArgs): Promise<TResult> {
    return this.breaker.fire(...args);
  }

  /**
   * Get current state
   */
  getState(): CircuitState {
    if (!this.config.enabled) {
      return CircuitState.CLOSED;
    }

    return this.breaker.opened ? CircuitState.OPEN :
           this.breaker.halfOpen ? CircuitState.HALF_OPEN :
           CircuitState.CLOSED;
  }

  /**
   * Get statistics
   */
  getStats(): CircuitBreakerStats {
    const state = this.getState();
    const totalRequests = this.failures + this.successes;
    const errorRate = totalRequests > 0
      ? (this.failures / totalRequests) * 100
      : 0;

    const nextAttempt = state === CircuitState.OPEN && this.lastFailureTime
      ? this.lastFailureTime + this.config.resetTimeout
      : undefined;

    return {
      state,
      failures: this.failures,
      successes: this.successes,
      rejections: this.rejections,
      totalRequests,
      lastFailureTime: this.lastFailureTime,
      nextAttempt,
      errorRate,
    };
  }

  /**
   * Stop internal timers
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}

/**
 * Create a circuit breaker wrapper for a function
 */
export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  config?: CircuitBreakerConfig
): CircuitBreaker<TArgs, TResult> {
  return new CircuitBreaker(fn, config);
}
