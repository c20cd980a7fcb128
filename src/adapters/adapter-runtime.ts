/**
 * Adapter Runtime
 *
 * Resilience wrapper composed into adapters. One run() per execute():
 * count, cache lookup, circuit check, rate-limit check, then the attempt
 * loop with timeout, retry and optional fallback. run() never rejects.
 *
 * Counters are only touched between awaits, so updates from concurrent
 * pipeline steps sharing one adapter cannot interleave.
 */

import { resolveAdapterConfig, type AdapterConfig } from '../config/adapter-config';
import { ErrorCode } from '../errors/error-codes';
import { AdapterError, describeError } from '../errors/pipeline-error';
import { getPipelineLogger, type PipelineLogger } from '../logging/pipeline-logger';
import { CircuitState, FailureKind, FailureReason } from '../models/enums';
import {
  createErrorResponse,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../models/envelope';
import { CircuitBreaker, type CircuitBreakerSnapshot } from '../resilience/circuit-breaker';
import { SlidingWindowRateLimiter } from '../resilience/rate-limiter';
import { ResponseCache, computeCacheKey } from '../resilience/response-cache';
import { RetryStrategy, type AttemptContext, type RetryEvent } from '../resilience/retry-strategy';

/**
 * One backend attempt. Throw AdapterError to classify the failure.
 */
export type AttemptHandler = (
  request: RequestEnvelope,
  attempt: AttemptContext
) => Promise<ResponseEnvelope>;

export interface AdapterRuntimeOptions {
  config?: Partial<AdapterConfig>;
  logger?: PipelineLogger;
  /** Clock for the rate limiter and circuit breaker */
  now?: () => number;
}

export interface RunOptions {
  /**
   * Permit one extra attempt on the fallback model once retries run out.
   * Only meaningful when the request started on a different model.
   */
  allowFallback?: boolean;
}

export interface AdapterRuntimeStats {
  request_count: number;
  error_count: number;
  cache_hits: number;
  cache_size: number;
  rate_limit_window_count: number;
  circuit: CircuitBreakerSnapshot;
}

export class AdapterRuntime {
  public readonly config: AdapterConfig;

  private requestCount = 0;
  private errorCount = 0;
  private cacheHits = 0;
  private readonly breaker: CircuitBreaker;
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly cache?: ResponseCache;
  private readonly logger: PipelineLogger;

  constructor(
    private readonly adapterName: string,
    options: AdapterRuntimeOptions = {}
  ) {
    this.config = resolveAdapterConfig(options.config);
    this.logger = options.logger ?? getPipelineLogger();
    const now = options.now ?? Date.now;

    this.breaker = new CircuitBreaker(
      {
        errorThreshold: this.config.circuit_error_threshold,
        minRequests: this.config.circuit_min_requests,
        resetTimeoutMs: this.config.circuit_reset_timeout_ms,
      },
      now
    );
    this.limiter = new SlidingWindowRateLimiter(this.config.requests_per_minute, undefined, now);
    if (this.config.enable_caching) {
      this.cache = new ResponseCache(this.config.max_cache_size);
    }
  }

  public async run(
    request: RequestEnvelope,
    handler: AttemptHandler,
    options: RunOptions = {}
  ): Promise<ResponseEnvelope> {
    this.requestCount++;
    const requestId = request.request_id;

    const cacheKey = this.cache ? computeCacheKey(request) : undefined;
    if (this.cache && cacheKey !== undefined) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.cacheHits++;
        this.logger.debug('CACHE', `Cache hit on ${this.adapterName}`, { requestId });
        return {
          ...cached,
          request_id: requestId,
          metadata: { ...cached.metadata, cache_hit: true },
        };
      }
    }

    if (!this.breaker.allowRequest()) {
      this.errorCount++;
      this.logger.warn('CIRCUIT', `Circuit open on ${this.adapterName}, request rejected`, { requestId });
      return createErrorResponse(
        request,
        new AdapterError(
          ErrorCode.E303_CIRCUIT_OPEN,
          { kind: FailureKind.TERMINAL, reason: FailureReason.CIRCUIT_OPEN },
          this.adapterName
        )
      );
    }

    const rate = this.limiter.tryAcquire();
    if (!rate.allowed) {
      this.releaseProbe();
      this.errorCount++;
      this.logger.warn('RATE_LIMIT', `Rate limit reached on ${this.adapterName}`, {
        requestId,
        details: { limit: rate.limit, retry_after_ms: rate.retryAfterMs },
      });
      return createErrorResponse(
        request,
        new AdapterError(
          ErrorCode.E304_RATE_LIMITED,
          { kind: FailureKind.TERMINAL, reason: FailureReason.RATE_LIMIT },
          `${this.adapterName}: ${rate.limit} requests per minute, retry in ${rate.retryAfterMs}ms`
        )
      );
    }

    const retry = new RetryStrategy({
      policy: request.retry_policy ?? this.config.default_retry_policy,
      backoffBaseMs: this.config.backoff_base_ms,
      timeoutMs: request.timeout_ms ?? this.config.default_timeout_ms,
      allowFallback: this.config.fallback_model !== undefined && options.allowFallback === true,
      onEvent: (event) => this.logRetryEvent(event, requestId),
    });

    try {
      const response = await retry.executeWithRetry((attempt) => handler(request, attempt));
      this.breaker.recordSuccess();
      if (this.cache && cacheKey !== undefined) {
        this.cache.set(cacheKey, response);
      }
      return response;
    } catch (error) {
      this.errorCount++;
      const before = this.breaker.getState();
      this.breaker.recordFailure();
      if (before !== CircuitState.OPEN && this.breaker.isOpen()) {
        this.logger.error('CIRCUIT', `Circuit opened on ${this.adapterName}`, {
          requestId,
          details: { ...this.breaker.getSnapshot() },
        });
      }
      this.logger.error('ERROR', `${this.adapterName} failed: ${describeError(error)}`, { requestId });
      return createErrorResponse(request, error);
    }
  }

  public getRequestCount(): number {
    return this.requestCount;
  }

  public getErrorCount(): number {
    return this.errorCount;
  }

  public getCircuitState(): CircuitState {
    return this.breaker.getState();
  }

  public resetCircuit(): void {
    this.breaker.reset();
    this.logger.info('CIRCUIT', `Circuit reset on ${this.adapterName}`);
  }

  public clearCache(): void {
    this.cache?.clear();
  }

  public getStats(): AdapterRuntimeStats {
    return {
      request_count: this.requestCount,
      error_count: this.errorCount,
      cache_hits: this.cacheHits,
      cache_size: this.cache?.size() ?? 0,
      rate_limit_window_count: this.limiter.getCurrentCount(),
      circuit: this.breaker.getSnapshot(),
    };
  }

  /**
   * A half-open probe that never reached the backend must not hold the slot
   */
  private releaseProbe(): void {
    if (this.breaker.getState() === CircuitState.HALF_OPEN) {
      this.breaker.releaseProbe();
    }
  }

  private logRetryEvent(event: RetryEvent, requestId: string): void {
    if (event.type === 'RETRY') {
      this.logger.warn(
        'RETRY',
        `${this.adapterName} attempt ${event.attempt + 1} failed (${event.failure.reason}), retrying in ${event.delay_ms}ms`,
        { requestId, details: { message: event.message } }
      );
      return;
    }
    this.logger.warn(
      'FALLBACK',
      `${this.adapterName} retries exhausted, trying fallback model ${this.config.fallback_model ?? ''}`,
      { requestId, details: { message: event.message } }
    );
  }
}
