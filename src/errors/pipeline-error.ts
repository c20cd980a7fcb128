/**
 * Pipeline Error - base error class for the UMF orchestrator
 */

import { ErrorCode, ErrorCategory, getErrorMessage, getErrorCategory } from './error-codes';
import { FailureKind, FailureReason } from '../models/enums';

/**
 * Base error class. Configuration and routing failures are thrown as this.
 */
export class PipelineError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: string;

  constructor(code: ErrorCode, context?: string) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }
}

/**
 * Classification consumed by the retry loop
 */
export interface FailureClassification {
  kind: FailureKind;
  reason: FailureReason;
}

/**
 * Error raised inside an adapter attempt.
 * Never escapes AdapterRuntime.run(); it becomes an error-flagged response.
 */
export class AdapterError extends PipelineError {
  public readonly failure: FailureClassification;
  public readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    failure: FailureClassification,
    context?: string,
    statusCode?: number
  ) {
    super(code, context);
    this.name = 'AdapterError';
    this.failure = failure;
    this.statusCode = statusCode;
  }

  get retryable(): boolean {
    return this.failure.kind === FailureKind.RETRYABLE;
  }
}

/**
 * Extract a message from any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
