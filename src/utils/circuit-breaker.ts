import { logger } from './logger.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold?: number;
  resetTimeout?: number;
  halfOpenSuccessThreshold?: number;
  /** Clock override, used by tests */
  now?: () => number;
}

/**
 * Raised instead of calling through while the circuit is OPEN
 */
export class CircuitOpenError extends Error {
  constructor(name: string, retryInMs: number) {
    super(`Circuit breaker ${name} is OPEN. Retry in ${Math.ceil(retryInMs / 1000)}s`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit breaker around an unreliable remote call
 *
 * States:
 * - CLOSED: calls pass through, consecutive failures are counted
 * - OPEN: calls are rejected immediately until resetTimeout has elapsed
 * - HALF_OPEN: calls pass through; enough successes close the circuit, one failure reopens it
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'CLOSED';

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeout: number;
  private readonly halfOpenSuccessThreshold: number;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000;
    this.halfOpenSuccessThreshold = options.halfOpenSuccessThreshold ?? 2;
    this.now = options.now ?? Date.now;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = this.now() - (this.lastFailureTime ?? 0);

      if (elapsed < this.resetTimeout) {
        throw new CircuitOpenError(this.name, this.resetTimeout - elapsed);
      }

      logger.info(`Circuit breaker ${this.name} transitioning to HALF_OPEN`, {
        elapsedMs: elapsed,
      });
      this.state = 'HALF_OPEN';
      this.successCount = 0;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state !== 'HALF_OPEN') return;

    this.successCount++;
    if (this.successCount >= this.halfOpenSuccessThreshold) {
      logger.info(`Circuit breaker ${this.name} transitioning to CLOSED`, {
        successCount: this.successCount,
      });
      this.state = 'CLOSED';
      this.successCount = 0;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    this.successCount = 0;

    if (this.state === 'HALF_OPEN') {
      logger.warn(`Circuit breaker ${this.name} failed in HALF_OPEN, reopening`);
      this.state = 'OPEN';
      this.failureCount = 0;
    } else if (this.failureCount >= this.failureThreshold) {
      logger.error(`Circuit breaker ${this.name} opening due to failures`, {
        failureCount: this.failureCount,
        threshold: this.failureThreshold,
      });
      this.state = 'OPEN';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}
