/**
 * OpenAI-compatible Chat Adapter
 *
 * Talks to a `/chat/completions` endpoint with the global fetch (or an
 * injected stand-in). Cheap requests go to the fallback model; large,
 * high-priority or explicitly flagged ones go to the primary model.
 */

import type { IAdapter } from './adapter';
import { AdapterRuntime, type AdapterRuntimeOptions } from './adapter-runtime';
import { assertValidApiKey } from './api-key';
import { ErrorCode } from '../errors/error-codes';
import { AdapterError, describeError, type FailureClassification } from '../errors/pipeline-error';
import { getPipelineLogger, type PipelineLogger } from '../logging/pipeline-logger';
import { FailureKind, FailureReason, TaskType } from '../models/enums';
import {
  createResponseEnvelope,
  validateContext,
  type ContextEntry,
  type EnvelopeMetadata,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../models/envelope';
import { payloadToText } from '../models/payload';
import { runWithTimeout } from '../resilience/retry-strategy';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ChatMessage {
  role: string;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionResponse {
  model: string;
  content: string;
  finish_reason: string;
  usage: ChatUsage;
}

export interface TokenCost {
  input: number;
  output: number;
}

/**
 * USD per token
 */
export const MODEL_COSTS: Readonly<Record<string, TokenCost>> = {
  'gpt-4': { input: 0.00003, output: 0.00006 },
  'gpt-3.5-turbo': { input: 0.0000015, output: 0.000002 },
};

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_PRIMARY_MODEL = 'gpt-4';
export const DEFAULT_FALLBACK_MODEL = 'gpt-3.5-turbo';
export const MAX_TOKENS_CEILING = 4000;
export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_MAX_CONTEXT_TOKENS = 2000;
export const COMPLEXITY_THRESHOLD = 1000;
export const HEALTH_CHECK_TIMEOUT_MS = 10_000;

const SYSTEM_PROMPTS: Readonly<Record<string, string>> = {
  [TaskType.CODE_GENERATION]:
    'You write production-ready code. Handle errors, document public functions and keep the code secure.',
  [TaskType.TEXT_GENERATION]:
    'You write clear, accurate professional text for the stated audience.',
  [TaskType.ANALYSIS]:
    'You analyse data and report findings with metrics, risks and concrete recommendations.',
};

const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

export interface OpenAIChatAdapterOptions extends AdapterRuntimeOptions {
  api_key: string;
  name?: string;
  base_url?: string;
  primary_model?: string;
  /** Model for simple requests and for the final fallback attempt */
  fallback_model?: string;
  fetch_impl?: FetchLike;
  health_timeout_ms?: number;
}

export interface TranslateOptions {
  /** Force the fallback model */
  fallback?: boolean;
}

/**
 * Map an HTTP status to a retry classification
 */
export function classifyHttpStatus(status: number): FailureClassification {
  if (status === 429) {
    return { kind: FailureKind.RETRYABLE, reason: FailureReason.RATE_LIMIT };
  }
  if (status >= 500) {
    return { kind: FailureKind.RETRYABLE, reason: FailureReason.SERVER_ERROR };
  }
  if (status === 401 || status === 403) {
    return { kind: FailureKind.TERMINAL, reason: FailureReason.AUTHENTICATION };
  }
  return { kind: FailureKind.TERMINAL, reason: FailureReason.UPSTREAM };
}

/**
 * Roughly 1.3 tokens per whitespace-separated word
 */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  return words * 1.3;
}

function numberParam(metadata: EnvelopeMetadata, key: string, fallback: number): number {
  const value = metadata[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readCount(usage: Record<string, unknown>, key: string): number {
  const value = usage[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Validate a `/chat/completions` body
 * @throws AdapterError (E305) when the body is not a completion
 */
export function parseChatCompletion(body: unknown): ChatCompletionResponse {
  const malformed = (detail: string): AdapterError =>
    new AdapterError(
      ErrorCode.E305_UPSTREAM_FAILURE,
      { kind: FailureKind.TERMINAL, reason: FailureReason.UPSTREAM },
      `malformed completion: ${detail}`
    );

  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) {
    throw malformed('no choices');
  }
  const choice: unknown = body.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message) || typeof choice.message.content !== 'string') {
    throw malformed('first choice has no message content');
  }
  const usage = isRecord(body.usage) ? body.usage : {};
  const promptTokens = readCount(usage, 'prompt_tokens');
  const completionTokens = readCount(usage, 'completion_tokens');

  return {
    model: typeof body.model === 'string' ? body.model : '',
    content: choice.message.content,
    finish_reason: typeof choice.finish_reason === 'string' ? choice.finish_reason : 'unknown',
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: readCount(usage, 'total_tokens') || promptTokens + completionTokens,
    },
  };
}

/**
 * Per-token rates for a model id; dated variants ("gpt-4-0613") match their
 * family, unknown models are charged at primary rates
 */
export function costForModel(model: string): TokenCost {
  const family: string | undefined = Object.keys(MODEL_COSTS)
    .filter((key) => model === key || model.startsWith(`${key}-`))
    .sort((a, b) => b.length - a.length)[0];
  return MODEL_COSTS[family ?? DEFAULT_PRIMARY_MODEL];
}

/**
 * Heuristic confidence in [0, 1], two decimals
 */
export function scoreQuality(content: string, taskType: string): number {
  let score = 0.8;
  if (content.length > 100) {
    score += 0.1;
  }
  if (taskType === TaskType.CODE_GENERATION) {
    if (/\b(def|class|function)\s/.test(content)) {
      score += 0.1;
    }
    if (/\b(try|except|catch)\b/.test(content)) {
      score += 0.05;
    }
  }
  return Math.round(Math.min(score, 1) * 100) / 100;
}

export class OpenAIChatAdapter implements IAdapter<ChatCompletionRequest, ChatCompletionResponse> {
  public readonly name: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly primaryModel: string;
  private readonly fallbackModel: string;
  private readonly fetchImpl: FetchLike;
  private readonly healthTimeoutMs: number;
  private readonly runtime: AdapterRuntime;
  private readonly logger: PipelineLogger;

  constructor(options: OpenAIChatAdapterOptions) {
    this.name = options.name ?? 'openai-chat';
    this.apiKey = assertValidApiKey(this.name, options.api_key);
    this.baseUrl = (options.base_url ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.primaryModel = options.primary_model ?? DEFAULT_PRIMARY_MODEL;
    this.fallbackModel = options.config?.fallback_model ?? options.fallback_model ?? DEFAULT_FALLBACK_MODEL;
    this.fetchImpl = options.fetch_impl ?? ((url, init) => fetch(url, init));
    this.healthTimeoutMs = options.health_timeout_ms ?? HEALTH_CHECK_TIMEOUT_MS;
    this.logger = options.logger ?? getPipelineLogger();
    this.runtime = new AdapterRuntime(this.name, {
      ...options,
      logger: this.logger,
      config: { ...options.config, fallback_model: this.fallbackModel },
    });
  }

  public capabilities(): readonly string[] {
    return [TaskType.CODE_GENERATION, TaskType.TEXT_GENERATION, TaskType.ANALYSIS];
  }

  public translateRequest(request: RequestEnvelope, options: TranslateOptions = {}): ChatCompletionRequest {
    const context = validateContext(request.context);
    const { metadata } = request;

    const messages: ChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPTS[request.task_type] ?? DEFAULT_SYSTEM_PROMPT },
      ...this.truncateContext(context, numberParam(metadata, 'max_context_tokens', DEFAULT_MAX_CONTEXT_TOKENS)),
      { role: 'user', content: this.applyTemplate(payloadToText(request.payload), request.task_type) },
    ];

    return {
      model: options.fallback ? this.fallbackModel : this.selectModel(request),
      messages,
      max_tokens: Math.min(numberParam(metadata, 'max_tokens', DEFAULT_MAX_TOKENS), MAX_TOKENS_CEILING),
      temperature: numberParam(metadata, 'temperature', 0.7),
      top_p: numberParam(metadata, 'top_p', 1),
      frequency_penalty: numberParam(metadata, 'frequency_penalty', 0),
      presence_penalty: numberParam(metadata, 'presence_penalty', 0),
    };
  }

  public translateResponse(completion: ChatCompletionResponse, request: RequestEnvelope): ResponseEnvelope {
    const rates = costForModel(completion.model);
    const inputCost = completion.usage.prompt_tokens * rates.input;
    const outputCost = completion.usage.completion_tokens * rates.output;
    const quality = scoreQuality(completion.content, request.task_type);

    return createResponseEnvelope(request, completion.content, {
      cost_info: {
        estimated_cost: inputCost + outputCost,
        input_cost: inputCost,
        output_cost: outputCost,
      },
      metadata: {
        tokens_used: completion.usage.total_tokens,
        prompt_tokens: completion.usage.prompt_tokens,
        completion_tokens: completion.usage.completion_tokens,
        model: completion.model,
        finish_reason: completion.finish_reason,
      },
      model_info: {
        provider: 'openai',
        adapter: this.name,
        model: completion.model,
      },
      quality_metrics: {
        confidence_score: quality,
        response_length: completion.content.length,
        estimated_accuracy: Math.min(Math.round(quality * 120) / 100, 1),
      },
    });
  }

  public async execute(request: RequestEnvelope): Promise<ResponseEnvelope> {
    return this.runtime.run(
      request,
      async (req, attempt) => {
        const body = this.translateRequest(req, { fallback: attempt.fallback });
        const completion = await this.postCompletion(body, attempt.signal);
        return this.translateResponse(completion, req);
      },
      { allowFallback: this.selectModel(request) !== this.fallbackModel }
    );
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const response = await runWithTimeout(
        (signal) =>
          this.fetchImpl(`${this.baseUrl}/models`, {
            method: 'GET',
            headers: this.headers(),
            signal,
          }),
        this.healthTimeoutMs
      );
      return response.status === 200;
    } catch (error) {
      this.logger.debug('ROUTING', `Health check failed for ${this.name}: ${describeError(error)}`);
      return false;
    }
  }

  public getRequestCount(): number {
    return this.runtime.getRequestCount();
  }

  public getRuntime(): AdapterRuntime {
    return this.runtime;
  }

  /**
   * complexity = payload length + 100 per context entry
   */
  public selectModel(request: RequestEnvelope): string {
    const complexity = payloadToText(request.payload).length + request.context.length * 100;
    if (
      complexity > COMPLEXITY_THRESHOLD ||
      request.priority > 5 ||
      request.metadata.force_primary_model === true
    ) {
      return this.primaryModel;
    }
    return this.fallbackModel;
  }

  /**
   * Keep the most recent entries that fit the token budget, oldest first
   */
  private truncateContext(context: readonly ContextEntry[], maxTokens: number): ChatMessage[] {
    const kept: ChatMessage[] = [];
    let used = 0;
    for (let i = context.length - 1; i >= 0; i--) {
      const content = payloadToText(context[i].content);
      const tokens = estimateTokens(content);
      if (used + tokens > maxTokens) {
        break;
      }
      kept.unshift({ role: context[i].role, content });
      used += tokens;
    }
    return kept;
  }

  private applyTemplate(prompt: string, taskType: string): string {
    switch (taskType) {
      case TaskType.CODE_GENERATION:
        return [
          'Write code for the following requirement:',
          '',
          prompt,
          '',
          'Include error handling, comments and unit tests where they apply.',
        ].join('\n');
      case TaskType.ANALYSIS:
        return [
          'Analyse the following:',
          '',
          prompt,
          '',
          'Give a summary, key findings with metrics, risks and recommendations.',
        ].join('\n');
      default:
        return prompt;
    }
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };
  }

  private async postCompletion(body: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletionResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      throw new AdapterError(
        ErrorCode.E305_UPSTREAM_FAILURE,
        { kind: FailureKind.RETRYABLE, reason: FailureReason.NETWORK },
        `network error: ${describeError(error)}`
      );
    }

    if (!response.ok) {
      const text = await response.text();
      const failure = classifyHttpStatus(response.status);
      const code =
        failure.reason === FailureReason.AUTHENTICATION
          ? ErrorCode.E308_AUTHENTICATION_FAILED
          : ErrorCode.E305_UPSTREAM_FAILURE;
      throw new AdapterError(code, failure, `HTTP ${response.status}: ${text.slice(0, 200)}`, response.status);
    }

    return parseChatCompletion(await response.json());
  }
}
