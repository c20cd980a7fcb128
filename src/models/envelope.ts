/**
 * UMF Envelope Model
 *
 * Request and response envelopes shared by every adapter. Envelopes are
 * created per call and never mutated after construction.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Payload } from './payload';
import { FailureKind, FailureReason } from './enums';
import { AdapterError, PipelineError, describeError } from '../errors/pipeline-error';
import { ErrorCode } from '../errors/error-codes';

/**
 * A conversation entry as received from the caller (not yet validated)
 */
export type RawContextEntry = Readonly<Record<string, Payload>>;

/**
 * A validated conversation entry
 */
export interface ContextEntry extends RawContextEntry {
  readonly role: string;
  readonly content: Payload;
}

export interface RetryPolicy {
  max_retries: number;
  backoff_factor: number;
}

export type EnvelopeMetadata = Readonly<Record<string, Payload>>;

export interface RequestEnvelope {
  readonly task_type: string;
  readonly payload: Payload;
  /** Stable for the life of the request; echoed by the response */
  readonly request_id: string;
  readonly context: readonly RawContextEntry[];
  readonly metadata: EnvelopeMetadata;
  readonly priority: number;
  /** Per-call bound; the adapter's default_timeout_ms applies when absent */
  readonly timeout_ms?: number;
  /** The adapter's default_retry_policy applies when absent */
  readonly retry_policy?: Readonly<RetryPolicy>;
  /** Epoch ms */
  readonly created_at: number;
}

export interface CostInfo {
  estimated_cost: number;
  error?: boolean;
  error_code?: string;
  error_message?: string;
  input_cost?: number;
  output_cost?: number;
}

export interface ResponseEnvelope {
  readonly task_type: string;
  readonly result: Payload;
  readonly request_id: string;
  readonly cost_info: Readonly<CostInfo>;
  readonly execution_time_ms: number;
  readonly metadata: EnvelopeMetadata;
  readonly model_info: EnvelopeMetadata;
  readonly quality_metrics: Readonly<Record<string, number>>;
}

export interface RequestOptions {
  request_id?: string;
  context?: readonly RawContextEntry[];
  metadata?: EnvelopeMetadata;
  priority?: number;
  timeout_ms?: number;
  retry_policy?: Partial<RetryPolicy>;
}

export const DEFAULT_PRIORITY = 0;
export const DEFAULT_TIMEOUT_MS = 300_000;
/** Largest delay a Node timer honours; longer ones fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function isValidTimeoutMs(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_TIMEOUT_MS;
}
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  max_retries: 3,
  backoff_factor: 2,
};

/**
 * Create a new request envelope
 * @throws PipelineError (E102) when task_type is empty, (E107) when
 *         timeout_ms is out of range
 */
export function createRequestEnvelope(
  taskType: string,
  payload: Payload,
  options: RequestOptions = {}
): RequestEnvelope {
  if (typeof taskType !== 'string' || taskType.trim().length === 0) {
    throw new PipelineError(ErrorCode.E102_INVALID_TASK_TYPE, `'${String(taskType)}'`);
  }
  if (options.timeout_ms !== undefined && !isValidTimeoutMs(options.timeout_ms)) {
    throw new PipelineError(
      ErrorCode.E107_INVALID_TIMEOUT,
      `timeout_ms must be an integer in [1, ${MAX_TIMEOUT_MS}] (got ${options.timeout_ms})`
    );
  }

  return {
    task_type: taskType,
    payload,
    request_id: options.request_id ?? uuidv4(),
    context: options.context ?? [],
    metadata: options.metadata ?? {},
    priority: options.priority ?? DEFAULT_PRIORITY,
    timeout_ms: options.timeout_ms,
    retry_policy: options.retry_policy
      ? { ...DEFAULT_RETRY_POLICY, ...options.retry_policy }
      : undefined,
    created_at: Date.now(),
  };
}

export interface ResponseFields {
  cost_info?: CostInfo;
  metadata?: EnvelopeMetadata;
  model_info?: EnvelopeMetadata;
  quality_metrics?: Record<string, number>;
  execution_time_ms?: number;
}

/**
 * Create a response envelope answering a request
 */
export function createResponseEnvelope(
  request: RequestEnvelope,
  result: Payload,
  fields: ResponseFields = {}
): ResponseEnvelope {
  return {
    task_type: request.task_type,
    result,
    request_id: request.request_id,
    cost_info: { estimated_cost: 0, ...fields.cost_info },
    execution_time_ms: fields.execution_time_ms ?? Math.max(0, Date.now() - request.created_at),
    metadata: fields.metadata ?? {},
    model_info: fields.model_info ?? {},
    quality_metrics: fields.quality_metrics ?? {},
  };
}

/**
 * Wrap a failure as a well-formed response.
 * The result is a human-readable message, the cost is zero.
 */
export function createErrorResponse(
  request: RequestEnvelope,
  error: unknown,
  prefix = 'Error'
): ResponseEnvelope {
  const message = describeError(error);
  const costInfo: CostInfo = {
    estimated_cost: 0,
    error: true,
    error_message: message,
  };
  if (error instanceof PipelineError) {
    costInfo.error_code = error.code;
  }

  return createResponseEnvelope(request, `${prefix}: ${message}`, { cost_info: costInfo });
}

export function isErrorResponse(response: ResponseEnvelope): boolean {
  return response.cost_info.error === true;
}

export function isContextEntry(entry: RawContextEntry): entry is ContextEntry {
  return typeof entry.role === 'string' && entry.role.length > 0 && 'content' in entry;
}

/**
 * Validate conversation entries before anything is sent to a backend
 * @throws AdapterError (E302) naming the first malformed entry
 */
export function validateContext(context: readonly RawContextEntry[]): ContextEntry[] {
  const valid: ContextEntry[] = [];
  context.forEach((entry, index) => {
    if (!isContextEntry(entry)) {
      throw new AdapterError(
        ErrorCode.E302_INVALID_CONTEXT,
        { kind: FailureKind.TERMINAL, reason: FailureReason.INVALID_REQUEST },
        `entry ${index} must contain 'role' and 'content': ${JSON.stringify(entry)}`
      );
    }
    valid.push(entry);
  });
  return valid;
}
