import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  RetryStrategy,
  RequestTimeoutError,
  calculateBackoff,
  classifyFailure,
  runWithTimeout,
  type AttemptContext,
  type RetryEvent,
} from '../../../src/resilience/retry-strategy';
import { AdapterError, PipelineError } from '../../../src/errors/pipeline-error';
import { ErrorCode } from '../../../src/errors/error-codes';
import { FailureKind, FailureReason } from '../../../src/models/enums';

function serverError(): AdapterError {
  return new AdapterError(
    ErrorCode.E305_UPSTREAM_FAILURE,
    { kind: FailureKind.RETRYABLE, reason: FailureReason.SERVER_ERROR },
    'HTTP 503',
    503
  );
}

function createStrategy(maxRetries: number, allowFallback: boolean, events: RetryEvent[] = []): RetryStrategy {
  return new RetryStrategy({
    policy: { max_retries: maxRetries, backoff_factor: 2 },
    backoffBaseMs: 0,
    timeoutMs: 1_000,
    allowFallback,
    onEvent: (event) => events.push(event),
  });
}

describe('classifyFailure', () => {
  it('should use the classification carried by an AdapterError', () => {
    assert.deepStrictEqual(classifyFailure(serverError()), {
      kind: FailureKind.RETRYABLE,
      reason: FailureReason.SERVER_ERROR,
    });
  });

  it('should treat an abort as a retryable timeout', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    assert.deepStrictEqual(classifyFailure(abort), { kind: FailureKind.RETRYABLE, reason: FailureReason.TIMEOUT });
  });

  it('should treat anything else as terminal', () => {
    assert.deepStrictEqual(classifyFailure(new TypeError('bug')), {
      kind: FailureKind.TERMINAL,
      reason: FailureReason.UNKNOWN,
    });
    assert.deepStrictEqual(classifyFailure(new PipelineError(ErrorCode.E101_EMPTY_PIPELINE)), {
      kind: FailureKind.TERMINAL,
      reason: FailureReason.UNKNOWN,
    });
  });
});

describe('calculateBackoff', () => {
  it('should grow by the backoff factor per attempt', () => {
    assert.strictEqual(calculateBackoff(0, 2, 1000), 1000);
    assert.strictEqual(calculateBackoff(1, 2, 1000), 2000);
    assert.strictEqual(calculateBackoff(3, 2, 1000), 8000);
  });
});

describe('runWithTimeout', () => {
  it('should resolve with the task result', async () => {
    assert.strictEqual(await runWithTimeout(async () => 'done', 1_000), 'done');
  });

  it('should reject and abort the signal when the task is too slow', async () => {
    let captured: AbortSignal | undefined;
    await assert.rejects(
      runWithTimeout((signal) => {
        captured = signal;
        return new Promise<string>(() => undefined);
      }, 10),
      (error: unknown) =>
        error instanceof RequestTimeoutError &&
        error.code === ErrorCode.E306_REQUEST_TIMEOUT &&
        error.message === '[E306] Request timed out: no response within 10ms'
    );
    assert.strictEqual(captured?.aborted, true);
  });
});

describe('RetryStrategy', () => {
  it('should return the first successful attempt', async () => {
    const strategy = createStrategy(3, false);
    let calls = 0;
    const result = await strategy.executeWithRetry(async () => {
      calls++;
      if (calls < 2) {
        throw serverError();
      }
      return 'ok';
    });
    assert.strictEqual(result, 'ok');
    assert.strictEqual(calls, 2);
  });

  it('should fail with E305 after max_retries + 1 attempts', async () => {
    const events: RetryEvent[] = [];
    const strategy = createStrategy(2, false, events);
    let calls = 0;

    await assert.rejects(
      strategy.executeWithRetry(async () => {
        calls++;
        throw serverError();
      }),
      (error: unknown) =>
        error instanceof AdapterError &&
        error.message ===
          '[E305] Upstream request failed: retries exhausted after 3 attempt(s): [E305] Upstream request failed: HTTP 503' &&
        error.statusCode === 503 &&
        error.failure.kind === FailureKind.TERMINAL &&
        error.failure.reason === FailureReason.SERVER_ERROR
    );
    assert.strictEqual(calls, 3);
    assert.deepStrictEqual(
      events.map((e) => [e.type, e.attempt, e.delay_ms]),
      [
        ['RETRY', 0, 0],
        ['RETRY', 1, 0],
      ]
    );
  });

  it('should rethrow a terminal failure without retrying', async () => {
    const strategy = createStrategy(3, true);
    const terminal = new AdapterError(
      ErrorCode.E308_AUTHENTICATION_FAILED,
      { kind: FailureKind.TERMINAL, reason: FailureReason.AUTHENTICATION },
      'HTTP 401',
      401
    );
    let calls = 0;
    await assert.rejects(
      strategy.executeWithRetry(async () => {
        calls++;
        throw terminal;
      }),
      (error: unknown) => error === terminal
    );
    assert.strictEqual(calls, 1);
  });

  it('should make one fallback attempt once retries run out', async () => {
    const events: RetryEvent[] = [];
    const strategy = createStrategy(2, true, events);
    const contexts: Array<Pick<AttemptContext, 'attempt' | 'fallback'>> = [];

    const result = await strategy.executeWithRetry(async ({ attempt, fallback }) => {
      contexts.push({ attempt, fallback });
      if (!fallback) {
        throw serverError();
      }
      return 'fallback-ok';
    });

    assert.strictEqual(result, 'fallback-ok');
    assert.deepStrictEqual(contexts, [
      { attempt: 0, fallback: false },
      { attempt: 1, fallback: false },
      { attempt: 2, fallback: false },
      { attempt: 3, fallback: true },
    ]);
    assert.deepStrictEqual(
      events.map((e) => e.type),
      ['RETRY', 'RETRY', 'FALLBACK']
    );
  });

  it('should report E305 when the fallback attempt fails too', async () => {
    const strategy = createStrategy(0, true);
    let calls = 0;
    await assert.rejects(
      strategy.executeWithRetry(async () => {
        calls++;
        throw serverError();
      }),
      (error: unknown) => error instanceof AdapterError && error.code === ErrorCode.E305_UPSTREAM_FAILURE
    );
    assert.strictEqual(calls, 2);
  });

  it('should expose a copy of its policy', () => {
    const strategy = createStrategy(1, false);
    const policy = strategy.getPolicy();
    policy.max_retries = 99;
    assert.deepStrictEqual(strategy.getPolicy(), { max_retries: 1, backoff_factor: 2 });
  });
});
