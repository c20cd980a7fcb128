/**
 * Enumerations for the UMF orchestrator
 */

/**
 * Known task types.
 * Routing keys: every adapter declares a subset of these as its capabilities.
 * New variants are admitted per pipeline through `extra_task_types`.
 */
export enum TaskType {
  CODE_GENERATION = 'code_generation',
  CODE_OPTIMIZATION = 'code_optimization',
  CODE_DEPLOYMENT = 'code_deployment',
  TEXT_GENERATION = 'text_generation',
  IMAGE_GENERATION = 'image_generation',
  ANALYSIS = 'analysis',
}

/**
 * All built-in task type values
 */
export const BUILTIN_TASK_TYPES: readonly string[] = Object.values(TaskType);

/**
 * Check if a value is one of the allowed task types
 */
export function isAllowedTaskType(
  value: unknown,
  allowed: ReadonlySet<string> = new Set(BUILTIN_TASK_TYPES)
): value is string {
  return typeof value === 'string' && allowed.has(value);
}

/**
 * Pipeline execution mode
 */
export enum ExecutionMode {
  SEQUENTIAL = 'sequential',
  PARALLEL = 'parallel',
}

export function isExecutionMode(value: unknown): value is ExecutionMode {
  return value === ExecutionMode.SEQUENTIAL || value === ExecutionMode.PARALLEL;
}

/**
 * Per-execution state of a pipeline run
 * VALIDATING -> RUNNING -> (SUCCEEDED | FAILED)
 */
export enum PipelineRunState {
  IDLE = 'IDLE',
  VALIDATING = 'VALIDATING',
  RUNNING = 'RUNNING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
}

/**
 * Circuit breaker state
 */
export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

/**
 * Whether a failed attempt may be retried
 */
export enum FailureKind {
  RETRYABLE = 'RETRYABLE',
  TERMINAL = 'TERMINAL',
}

/**
 * Cause of a failed adapter attempt
 */
export enum FailureReason {
  RATE_LIMIT = 'RATE_LIMIT',
  SERVER_ERROR = 'SERVER_ERROR',
  TIMEOUT = 'TIMEOUT',
  NETWORK = 'NETWORK',
  AUTHENTICATION = 'AUTHENTICATION',
  INVALID_REQUEST = 'INVALID_REQUEST',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  UPSTREAM = 'UPSTREAM',
  UNKNOWN = 'UNKNOWN',
}
