/**
 * Resilience Module Index
 */

export { SlidingWindowRateLimiter, RATE_LIMIT_WINDOW_MS, type RateLimitResult } from './rate-limiter';
export {
  CircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreakerConfig,
  type CircuitBreakerSnapshot,
} from './circuit-breaker';
export {
  RetryStrategy,
  RequestTimeoutError,
  classifyFailure,
  calculateBackoff,
  runWithTimeout,
  type AttemptContext,
  type RetryEvent,
  type RetryEventType,
  type RetryStrategyOptions,
} from './retry-strategy';
export { ResponseCache, computeCacheKey } from './response-cache';
