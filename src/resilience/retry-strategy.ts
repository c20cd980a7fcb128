/**
 * Retry Strategy
 *
 * Exponential backoff over classified failures. Only RETRYABLE failures
 * (rate limit, upstream 5xx, timeout, network) are retried; TERMINAL ones
 * are rethrown at once. When retries run out, one extra attempt may be made
 * on a fallback model.
 */

import { AdapterError, describeError, type FailureClassification } from '../errors/pipeline-error';
import { ErrorCode } from '../errors/error-codes';
import { FailureKind, FailureReason } from '../models/enums';
import type { RetryPolicy } from '../models/envelope';

/**
 * Raised when a single attempt exceeds its timeout
 */
export class RequestTimeoutError extends AdapterError {
  constructor(timeoutMs: number) {
    super(
      ErrorCode.E306_REQUEST_TIMEOUT,
      { kind: FailureKind.RETRYABLE, reason: FailureReason.TIMEOUT },
      `no response within ${timeoutMs}ms`
    );
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Map any thrown value to a retry classification
 */
export function classifyFailure(error: unknown): FailureClassification {
  if (error instanceof AdapterError) {
    return error.failure;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return { kind: FailureKind.RETRYABLE, reason: FailureReason.TIMEOUT };
  }
  return { kind: FailureKind.TERMINAL, reason: FailureReason.UNKNOWN };
}

/**
 * Wait before retry number `attempt + 1` (attempt counts from 0)
 */
export function calculateBackoff(attempt: number, backoffFactor: number, baseMs: number): number {
  return Math.pow(backoffFactor, attempt) * baseMs;
}

/**
 * Passed to every attempt
 */
export interface AttemptContext {
  /** 0 for the first try */
  attempt: number;
  /** True on the single extra attempt made against the fallback model */
  fallback: boolean;
  /** Aborted when the attempt times out */
  signal: AbortSignal;
}

export type RetryEventType = 'RETRY' | 'FALLBACK';

export interface RetryEvent {
  type: RetryEventType;
  attempt: number;
  delay_ms: number;
  failure: FailureClassification;
  message: string;
}

export interface RetryStrategyOptions {
  policy: RetryPolicy;
  backoffBaseMs: number;
  timeoutMs: number;
  allowFallback: boolean;
  onEvent?: (event: RetryEvent) => void;
}

/**
 * Run a task, rejecting with RequestTimeoutError (and aborting the signal)
 * after `timeoutMs`
 */
export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new RequestTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class RetryStrategy {
  private readonly policy: RetryPolicy;
  private readonly backoffBaseMs: number;
  private readonly timeoutMs: number;
  private readonly allowFallback: boolean;
  private readonly onEvent?: (event: RetryEvent) => void;

  constructor(options: RetryStrategyOptions) {
    this.policy = options.policy;
    this.backoffBaseMs = options.backoffBaseMs;
    this.timeoutMs = options.timeoutMs;
    this.allowFallback = options.allowFallback;
    this.onEvent = options.onEvent;
  }

  /**
   * Execute a task with retry.
   * @throws the TERMINAL error as-is, or AdapterError (E305) once retries
   *         and the fallback attempt are used up
   */
  public async executeWithRetry<T>(task: (context: AttemptContext) => Promise<T>): Promise<T> {
    let lastError: unknown;
    let lastFailure: FailureClassification = { kind: FailureKind.TERMINAL, reason: FailureReason.UNKNOWN };

    for (let attempt = 0; attempt <= this.policy.max_retries; attempt++) {
      try {
        return await runWithTimeout((signal) => task({ attempt, fallback: false, signal }), this.timeoutMs);
      } catch (error) {
        const failure = classifyFailure(error);
        if (failure.kind === FailureKind.TERMINAL) {
          throw error;
        }
        lastError = error;
        lastFailure = failure;

        if (attempt < this.policy.max_retries) {
          const delay = calculateBackoff(attempt, this.policy.backoff_factor, this.backoffBaseMs);
          this.emit({ type: 'RETRY', attempt, delay_ms: delay, failure, message: describeError(error) });
          await this.sleep(delay);
        }
      }
    }

    const attempts = this.policy.max_retries + 1;

    if (this.allowFallback) {
      this.emit({
        type: 'FALLBACK',
        attempt: attempts,
        delay_ms: 0,
        failure: lastFailure,
        message: describeError(lastError),
      });
      try {
        return await runWithTimeout(
          (signal) => task({ attempt: attempts, fallback: true, signal }),
          this.timeoutMs
        );
      } catch (error) {
        lastError = error;
        lastFailure = classifyFailure(error);
      }
    }

    throw new AdapterError(
      ErrorCode.E305_UPSTREAM_FAILURE,
      { kind: FailureKind.TERMINAL, reason: lastFailure.reason },
      `retries exhausted after ${attempts} attempt(s): ${describeError(lastError)}`,
      lastError instanceof AdapterError ? lastError.statusCode : undefined
    );
  }

  public getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  private emit(event: RetryEvent): void {
    if (this.onEvent) {
      this.onEvent(event);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
