/**
 * Errors Module Index
 */

export { ErrorCategory, ErrorCode, getErrorMessage, getErrorCategory } from './error-codes';
export {
  PipelineError,
  AdapterError,
  describeError,
  type FailureClassification,
} from './pipeline-error';
