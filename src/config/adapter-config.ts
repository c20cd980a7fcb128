/**
 * Adapter Configuration
 *
 * Defaults for the shared resilience wrapper, validation of user overrides
 * and UMF_* environment variable overrides.
 */

import { ErrorCode } from '../errors/error-codes';
import { PipelineError } from '../errors/pipeline-error';
import {
  DEFAULT_RETRY_POLICY,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  isValidTimeoutMs,
  type RetryPolicy,
} from '../models/envelope';

export interface AdapterConfig {
  /** Cache successful responses keyed by task type, payload and metadata */
  enable_caching: boolean;
  max_cache_size: number;
  /** Sliding 60 second window ceiling */
  requests_per_minute: number;
  /** Error ratio above which the circuit opens */
  circuit_error_threshold: number;
  /** Requests that must be seen before the circuit may open */
  circuit_min_requests: number;
  /** Half-open probe delay; undefined keeps the circuit open until reset() */
  circuit_reset_timeout_ms?: number;
  /** Used when a request does not carry its own timeout */
  default_timeout_ms: number;
  default_retry_policy: RetryPolicy;
  /** Backoff wait is backoff_factor ** attempt * backoff_base_ms */
  backoff_base_ms: number;
  /** Cheaper model tried once after retries are exhausted */
  fallback_model?: string;
}

export const DEFAULT_ADAPTER_CONFIG: Readonly<AdapterConfig> = {
  enable_caching: false,
  max_cache_size: 1000,
  requests_per_minute: 60,
  circuit_error_threshold: 0.5,
  circuit_min_requests: 10,
  default_timeout_ms: DEFAULT_TIMEOUT_MS,
  default_retry_policy: { ...DEFAULT_RETRY_POLICY },
  backoff_base_ms: 1000,
};

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new PipelineError(
      ErrorCode.E307_INVALID_ADAPTER_CONFIG,
      `${name} must be a positive integer (got ${value})`
    );
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new PipelineError(
      ErrorCode.E307_INVALID_ADAPTER_CONFIG,
      `${name} must be a non-negative number (got ${value})`
    );
  }
}

/**
 * Merge overrides onto the defaults and validate the result
 * @throws PipelineError (E307) on out-of-range values
 */
export function resolveAdapterConfig(overrides: Partial<AdapterConfig> = {}): AdapterConfig {
  const config: AdapterConfig = {
    ...DEFAULT_ADAPTER_CONFIG,
    ...overrides,
    default_retry_policy: {
      ...DEFAULT_ADAPTER_CONFIG.default_retry_policy,
      ...overrides.default_retry_policy,
    },
  };

  requirePositiveInteger('max_cache_size', config.max_cache_size);
  requirePositiveInteger('requests_per_minute', config.requests_per_minute);
  requirePositiveInteger('circuit_min_requests', config.circuit_min_requests);
  if (!isValidTimeoutMs(config.default_timeout_ms)) {
    throw new PipelineError(
      ErrorCode.E307_INVALID_ADAPTER_CONFIG,
      `default_timeout_ms must be an integer in [1, ${MAX_TIMEOUT_MS}] (got ${config.default_timeout_ms})`
    );
  }
  requireNonNegative('backoff_base_ms', config.backoff_base_ms);
  requireNonNegative('default_retry_policy.backoff_factor', config.default_retry_policy.backoff_factor);

  if (!Number.isInteger(config.default_retry_policy.max_retries) || config.default_retry_policy.max_retries < 0) {
    throw new PipelineError(
      ErrorCode.E307_INVALID_ADAPTER_CONFIG,
      `default_retry_policy.max_retries must be a non-negative integer (got ${config.default_retry_policy.max_retries})`
    );
  }

  if (!(config.circuit_error_threshold > 0 && config.circuit_error_threshold <= 1)) {
    throw new PipelineError(
      ErrorCode.E307_INVALID_ADAPTER_CONFIG,
      `circuit_error_threshold must be in (0, 1] (got ${config.circuit_error_threshold})`
    );
  }

  if (config.circuit_reset_timeout_ms !== undefined) {
    requirePositiveInteger('circuit_reset_timeout_ms', config.circuit_reset_timeout_ms);
  }

  return config;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new PipelineError(ErrorCode.E307_INVALID_ADAPTER_CONFIG, `${name} is not a number: '${raw}'`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new PipelineError(ErrorCode.E307_INVALID_ADAPTER_CONFIG, `${name} is not a boolean: '${raw}'`);
}

/**
 * Collect UMF_* overrides from the environment.
 * Only variables that are set appear in the result.
 */
export function loadAdapterConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AdapterConfig> {
  const overrides: Partial<AdapterConfig> = {};

  const rpm = readNumber(env, 'UMF_REQUESTS_PER_MINUTE');
  if (rpm !== undefined) overrides.requests_per_minute = rpm;

  const caching = readBoolean(env, 'UMF_ENABLE_CACHING');
  if (caching !== undefined) overrides.enable_caching = caching;

  const cacheSize = readNumber(env, 'UMF_MAX_CACHE_SIZE');
  if (cacheSize !== undefined) overrides.max_cache_size = cacheSize;

  const timeout = readNumber(env, 'UMF_DEFAULT_TIMEOUT_MS');
  if (timeout !== undefined) overrides.default_timeout_ms = timeout;

  const maxRetries = readNumber(env, 'UMF_MAX_RETRIES');
  const backoffFactor = readNumber(env, 'UMF_BACKOFF_FACTOR');
  if (maxRetries !== undefined || backoffFactor !== undefined) {
    overrides.default_retry_policy = {
      max_retries: maxRetries ?? DEFAULT_RETRY_POLICY.max_retries,
      backoff_factor: backoffFactor ?? DEFAULT_RETRY_POLICY.backoff_factor,
    };
  }

  return overrides;
}
