/**
 * Error-Ratio Circuit Breaker
 *
 * Opens when errors / max(requests, 1) exceeds the threshold after more than
 * `minRequests` requests. An open circuit fails fast until reset(), or, when a
 * reset timeout is configured, until one half-open probe succeeds.
 */

import { CircuitState } from '../models/enums';

export interface CircuitBreakerConfig {
  errorThreshold: number;
  minRequests: number;
  /** Undefined: stay open until reset() */
  resetTimeoutMs?: number;
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  requestCount: number;
  errorCount: number;
  openedAt?: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  errorThreshold: 0.5,
  minRequests: 10,
};

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private requestCount = 0;
  private errorCount = 0;
  private openedAt?: number;
  private probeInFlight = false;

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Whether a call may go through right now.
   * In HALF_OPEN only one probe is admitted at a time.
   */
  allowRequest(): boolean {
    if (this.state === CircuitState.CLOSED) {
      return true;
    }

    if (this.state === CircuitState.OPEN) {
      const { resetTimeoutMs } = this.config;
      if (resetTimeoutMs === undefined || this.openedAt === undefined) {
        return false;
      }
      if (this.now() - this.openedAt < resetTimeoutMs) {
        return false;
      }
      this.state = CircuitState.HALF_OPEN;
    }

    if (this.probeInFlight) {
      return false;
    }
    this.probeInFlight = true;
    return true;
  }

  recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.reset();
      return;
    }
    this.requestCount++;
    this.evaluate();
  }

  recordFailure(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.probeInFlight = false;
      this.trip();
      return;
    }
    this.requestCount++;
    this.errorCount++;
    this.evaluate();
  }

  /**
   * Give back an admitted half-open probe without an outcome
   */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.requestCount = 0;
    this.errorCount = 0;
    this.openedAt = undefined;
    this.probeInFlight = false;
  }

  isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  getState(): CircuitState {
    return this.state;
  }

  getSnapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      requestCount: this.requestCount,
      errorCount: this.errorCount,
      openedAt: this.openedAt,
    };
  }

  private evaluate(): void {
    if (this.state !== CircuitState.CLOSED) {
      return;
    }
    const errorRatio = this.errorCount / Math.max(this.requestCount, 1);
    if (errorRatio > this.config.errorThreshold && this.requestCount > this.config.minRequests) {
      this.trip();
    }
  }

  private trip(): void {
    this.state = CircuitState.OPEN;
    this.openedAt = this.now();
  }
}
