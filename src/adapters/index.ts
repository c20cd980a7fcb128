/**
 * Adapters Module Index
 */

export type { IAdapter } from './adapter';
export {
  AdapterRuntime,
  type AdapterRuntimeOptions,
  type AdapterRuntimeStats,
  type AttemptHandler,
} from './adapter-runtime';
export { assertValidApiKey, isApiKeyFormatValid, RESERVED_API_KEYS, MIN_API_KEY_LENGTH } from './api-key';
export {
  OpenAIChatAdapter,
  classifyHttpStatus,
  costForModel,
  estimateTokens,
  parseChatCompletion,
  scoreQuality,
  MODEL_COSTS,
  DEFAULT_BASE_URL,
  DEFAULT_PRIMARY_MODEL,
  DEFAULT_FALLBACK_MODEL,
  MAX_TOKENS_CEILING,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatMessage,
  type ChatUsage,
  type FetchLike,
  type OpenAIChatAdapterOptions,
  type TokenCost,
  type TranslateOptions,
} from './openai-chat-adapter';
export {
  CodeOptimizerAdapter,
  escapeHtml,
  OPTIMIZATION_NOTES,
  type CodeOptimizerAdapterOptions,
  type CodeOptimizerRequest,
} from './code-optimizer-adapter';
