/**
 * =============================================================================
 * CIRCUIT BREAKER - Graceful Failure Handling
 * =============================================================================
 *
 * Guards calls to the distance provider so a dead or throttled Google
 * endpoint fails fast instead of stalling every optimization request.
 *
 * STATES:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Service is failing, requests are rejected immediately
 * - HALF_OPEN: Testing if service has recovered
 *
 * USAGE:
 * ```typescript
 * const breaker = new CircuitBreaker({
 *   name: 'google-distance-matrix',
 *   failureThreshold: 5,    // Open after 5 failures
 *   resetTimeout: 30000,    // Try again after 30 seconds
 *   requestTimeout: 10000   // Deadline for a single provider call
 * });
 *
 * const rows = await breaker.execute(() => fetchRows(origins, destinations));
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { ErrorCode, ServiceUnavailableError } from '../../core';

/**
 * Circuit breaker states
 */
export enum CircuitState {
  CLOSED = 'CLOSED',     // Normal operation
  OPEN = 'OPEN',         // Failing, reject requests
  HALF_OPEN = 'HALF_OPEN' // Testing recovery
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Number of failures before opening circuit */
  failureThreshold?: number;
  /** Number of successes in half-open to close circuit */
  successThreshold?: number;
  /** Time to wait before trying again (ms) */
  resetTimeout?: number;
  /** Time window for counting failures (ms) */
  monitorTimeout?: number;
  /** Timeout for individual requests (ms) */
  requestTimeout?: number;
  /** Function to determine if error should count as failure */
  isFailure?: (error: Error) => boolean;
}

/**
 * Default configuration
 */
const DEFAULT_OPTIONS: Required<Omit<CircuitBreakerOptions, 'name' | 'isFailure'>> = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeout: 30000,
  monitorTimeout: 60000,
  requestTimeout: 10000
};

/**
 * Error thrown when circuit is open
 */
export class CircuitOpenError extends ServiceUnavailableError {
  constructor(public readonly circuitName: string) {
    super(
      `Circuit breaker '${circuitName}' is OPEN - service unavailable`,
      ErrorCode.CIRCUIT_BREAKER_OPEN,
      { circuit: circuitName }
    );
  }
}

/**
 * Error thrown when request times out
 */
export class CircuitTimeoutError extends ServiceUnavailableError {
  constructor(public readonly circuitName: string, public readonly timeout: number) {
    super(
      `Circuit breaker '${circuitName}' request timed out after ${timeout}ms`,
      ErrorCode.TIMEOUT_ERROR,
      { circuit: circuitName, timeout }
    );
  }
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  nextAttemptTime: number | null;
}

/**
 * Circuit Breaker Implementation
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number = 0;
  private successes: number = 0;
  private lastFailureTime: number = 0;
  private nextAttemptTime: number = 0;
  private options: Required<Omit<CircuitBreakerOptions, 'isFailure'>> &
    Pick<CircuitBreakerOptions, 'isFailure'>;

  constructor(options: CircuitBreakerOptions) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options
    };

    logger.debug(`Circuit breaker '${this.options.name}' initialized`, {
      failureThreshold: this.options.failureThreshold,
      resetTimeout: this.options.resetTimeout,
      requestTimeout: this.options.requestTimeout
    });
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    // Check if circuit should transition from OPEN to HALF_OPEN
    if (this.state === CircuitState.OPEN) {
      if (Date.now() >= this.nextAttemptTime) {
        this.transitionTo(CircuitState.HALF_OPEN);
      } else {
        throw new CircuitOpenError(this.options.name);
      }
    }

    try {
      const result = await this.executeWithTimeout(fn);
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  /**
   * Execute with timeout protection
   */
  private executeWithTimeout<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        reject(new CircuitTimeoutError(this.options.name, this.options.requestTimeout));
      }, this.options.requestTimeout);

      fn()
        .then((result) => {
          clearTimeout(timeoutId);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeoutId);
          reject(error);
        });
    });
  }

  /**
   * Record a successful execution
   */
  private recordSuccess(): void {
    this.failures = 0;
    this.successes++;

    if (this.state === CircuitState.HALF_OPEN && this.successes >= this.options.successThreshold) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  /**
   * Record a failed execution
   */
  private recordFailure(error: Error): void {
    if (this.options.isFailure && !this.options.isFailure(error)) {
      return;
    }

    const now = Date.now();

    // Failures outside the monitoring window start a fresh count
    if (this.lastFailureTime > 0 && now - this.lastFailureTime > this.options.monitorTimeout) {
      this.failures = 0;
    }

    this.successes = 0;
    this.failures++;
    this.lastFailureTime = now;

    logger.warn(`Circuit '${this.options.name}' failure ${this.failures}/${this.options.failureThreshold}`, {
      error: error.message
    });

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in half-open immediately opens the circuit
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.options.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  /**
   * Transition to a new state
   */
  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;

    logger.info(`Circuit '${this.options.name}' state change: ${oldState} -> ${newState}`);

    if (newState === CircuitState.OPEN) {
      this.nextAttemptTime = Date.now() + this.options.resetTimeout;
      logger.warn(`Circuit '${this.options.name}' OPEN - will retry at ${new Date(this.nextAttemptTime).toISOString()}`);
    } else if (newState === CircuitState.CLOSED) {
      this.failures = 0;
      this.successes = 0;
    } else {
      this.successes = 0;
    }
  }

  /**
   * Get current state
   */
  getState(): CircuitState {
    return this.state;
  }

  /**
   * Get circuit statistics
   */
  getStats(): CircuitBreakerStats {
    return {
      name: this.options.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime || null,
      nextAttemptTime: this.state === CircuitState.OPEN ? this.nextAttemptTime : null
    };
  }
}
