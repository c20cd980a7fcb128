/**
 * Logging Module Index
 */

export {
  PipelineLogger,
  getPipelineLogger,
  resetPipelineLogger,
  createConsoleSubscriber,
  formatLogEntry,
  maskSensitiveData,
  MASKING_PATTERNS,
  type PipelineLogLevel,
  type PipelineLogCategory,
  type PipelineLogEntry,
  type PipelineLogSubscriber,
  type LogOptions,
} from './pipeline-logger';
