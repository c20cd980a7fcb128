/**
 * Error Codes for the UMF orchestrator
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  ROUTING = 'ROUTING',
  ADAPTER = 'ADAPTER',
}

/**
 * Error Codes
 * E1xx: Configuration Errors - raised before any adapter call
 * E2xx: Routing Errors - raised at adapter selection, fatal to the execute() call
 * E3xx: Adapter Errors - absorbed into an error-flagged response (except E301/E307,
 *       which are raised while constructing an adapter)
 */
export enum ErrorCode {
  // E1xx: Configuration Errors
  E101_EMPTY_PIPELINE = 'E101',
  E102_INVALID_TASK_TYPE = 'E102',
  E103_UNAUTHORIZED_TASK_TYPE = 'E103',
  E104_DUPLICATE_STEP_NAME = 'E104',
  E105_PIPELINE_LOCKED = 'E105',
  E106_INVALID_PIPELINE_DEFINITION = 'E106',
  E107_INVALID_TIMEOUT = 'E107',

  // E2xx: Routing Errors
  E201_NO_ADAPTER = 'E201',
  E202_NO_AUTHORIZED_ADAPTER = 'E202',
  E203_NO_HEALTHY_ADAPTER = 'E203',

  // E3xx: Adapter Errors
  E301_INVALID_API_KEY = 'E301',
  E302_INVALID_CONTEXT = 'E302',
  E303_CIRCUIT_OPEN = 'E303',
  E304_RATE_LIMITED = 'E304',
  E305_UPSTREAM_FAILURE = 'E305',
  E306_REQUEST_TIMEOUT = 'E306',
  E307_INVALID_ADAPTER_CONFIG = 'E307',
  E308_AUTHENTICATION_FAILED = 'E308',
}

const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.E101_EMPTY_PIPELINE]: 'Pipeline has no steps configured',
  [ErrorCode.E102_INVALID_TASK_TYPE]: 'Invalid task type',
  [ErrorCode.E103_UNAUTHORIZED_TASK_TYPE]: 'Unauthorized task type',
  [ErrorCode.E104_DUPLICATE_STEP_NAME]: 'Duplicate step name',
  [ErrorCode.E105_PIPELINE_LOCKED]: 'Pipeline steps cannot change while an execution is running',
  [ErrorCode.E106_INVALID_PIPELINE_DEFINITION]: 'Invalid pipeline definition',
  [ErrorCode.E107_INVALID_TIMEOUT]: 'Invalid timeout',
  [ErrorCode.E201_NO_ADAPTER]: 'No adapter found for task type',
  [ErrorCode.E202_NO_AUTHORIZED_ADAPTER]: 'No authorized adapter found for task type',
  [ErrorCode.E203_NO_HEALTHY_ADAPTER]: 'No healthy adapter available for task type',
  [ErrorCode.E301_INVALID_API_KEY]: 'Invalid API key format',
  [ErrorCode.E302_INVALID_CONTEXT]: 'Invalid context format',
  [ErrorCode.E303_CIRCUIT_OPEN]: 'Circuit breaker is open',
  [ErrorCode.E304_RATE_LIMITED]: 'Rate limit exceeded',
  [ErrorCode.E305_UPSTREAM_FAILURE]: 'Upstream request failed',
  [ErrorCode.E306_REQUEST_TIMEOUT]: 'Request timed out',
  [ErrorCode.E307_INVALID_ADAPTER_CONFIG]: 'Invalid adapter configuration',
  [ErrorCode.E308_AUTHENTICATION_FAILED]: 'Upstream authentication failed',
};

/**
 * Get the base message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

/**
 * Get the category an error code belongs to
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  switch (code.charAt(1)) {
    case '1':
      return ErrorCategory.CONFIGURATION;
    case '2':
      return ErrorCategory.ROUTING;
    default:
      return ErrorCategory.ADAPTER;
  }
}
