/**
 * Pipeline Loader
 *
 * Reads pipeline definitions from YAML or JSON, validates them and builds a
 * Pipeline with its adapters. Example:
 *
 *   name: codegen
 *   mode: sequential
 *   adapters:
 *     - type: openai-chat
 *       api_key_env: OPENAI_API_KEY
 *     - type: code-optimizer
 *   steps:
 *     - name: generate
 *       task_type: code_generation
 *       params: { max_tokens: 500 }
 *     - name: optimize
 *       task_type: code_optimization
 *       timeout_ms: 30000
 *       retry_policy: { max_retries: 1 }
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { IAdapter } from '../adapters/adapter';
import { CodeOptimizerAdapter } from '../adapters/code-optimizer-adapter';
import { OpenAIChatAdapter } from '../adapters/openai-chat-adapter';
import { loadAdapterConfigFromEnv, type AdapterConfig } from '../config/adapter-config';
import { ErrorCode } from '../errors/error-codes';
import { PipelineError, describeError } from '../errors/pipeline-error';
import { getPipelineLogger, type PipelineLogger } from '../logging/pipeline-logger';
import { BUILTIN_TASK_TYPES, ExecutionMode, isExecutionMode } from '../models/enums';
import { DEFAULT_RETRY_POLICY, MAX_TIMEOUT_MS, isValidTimeoutMs, type RetryPolicy } from '../models/envelope';
import { isPayload, isPayloadObject } from '../models/payload';
import { Pipeline, type PipelineOptions, type StepParams } from './pipeline';

export interface AdapterDefinition {
  type: string;
  name?: string;
  /** Environment variable holding the API key */
  api_key_env?: string;
  base_url?: string;
  config: Partial<AdapterConfig>;
}

export interface StepDefinition {
  name: string;
  task_type: string;
  params: StepParams;
  priority?: number;
  timeout_ms?: number;
  retry_policy?: RetryPolicy;
}

export interface PipelineDefinition {
  name: string;
  mode: ExecutionMode;
  extra_task_types: string[];
  adapters: AdapterDefinition[];
  steps: StepDefinition[];
}

export interface AdapterFactoryContext {
  name?: string;
  api_key?: string;
  base_url?: string;
  config: Partial<AdapterConfig>;
  logger: PipelineLogger;
}

export type AdapterFactory = (context: AdapterFactoryContext) => IAdapter;

export const DEFAULT_ADAPTER_FACTORIES: Readonly<Record<string, AdapterFactory>> = {
  'openai-chat': (context) =>
    new OpenAIChatAdapter({
      api_key: context.api_key ?? '',
      name: context.name,
      base_url: context.base_url,
      config: context.config,
      logger: context.logger,
    }),
  'code-optimizer': (context) =>
    new CodeOptimizerAdapter({
      name: context.name,
      api_key: context.api_key,
      config: context.config,
      logger: context.logger,
    }),
};

export interface PipelineLoaderOptions {
  factories?: Readonly<Record<string, AdapterFactory>>;
  env?: NodeJS.ProcessEnv;
  logger?: PipelineLogger;
}

function invalid(detail: string): PipelineError {
  return new PipelineError(ErrorCode.E106_INVALID_PIPELINE_DEFINITION, detail);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalid(`${where} must be a non-empty string`);
  }
  return value;
}

function optionalString(value: unknown, where: string): string | undefined {
  return value === undefined ? undefined : requireString(value, where);
}

function requireNumber(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(`${where} must be a number`);
  }
  return value;
}

function optionalNumber(value: unknown, where: string): number | undefined {
  return value === undefined ? undefined : requireNumber(value, where);
}

function optionalTimeout(value: unknown, where: string): number | undefined {
  const timeout = optionalNumber(value, where);
  if (timeout !== undefined && !isValidTimeoutMs(timeout)) {
    throw invalid(`${where} must be an integer in [1, ${MAX_TIMEOUT_MS}] (got ${timeout})`);
  }
  return timeout;
}

function requireBoolean(value: unknown, where: string): boolean {
  if (typeof value !== 'boolean') {
    throw invalid(`${where} must be true or false`);
  }
  return value;
}

function requireList(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw invalid(`${where} must be a list`);
  }
  return value;
}

function parseRetryPolicy(value: unknown, where: string): RetryPolicy {
  if (!isRecord(value)) {
    throw invalid(`${where} must be a mapping`);
  }
  return {
    max_retries: optionalNumber(value.max_retries, `${where}.max_retries`) ?? DEFAULT_RETRY_POLICY.max_retries,
    backoff_factor:
      optionalNumber(value.backoff_factor, `${where}.backoff_factor`) ?? DEFAULT_RETRY_POLICY.backoff_factor,
  };
}

/**
 * Step policies reach the retry loop directly, so their ranges are checked here
 */
function parseStepRetryPolicy(value: unknown, where: string): RetryPolicy | undefined {
  if (value === undefined) {
    return undefined;
  }
  const policy = parseRetryPolicy(value, where);
  if (!Number.isInteger(policy.max_retries) || policy.max_retries < 0) {
    throw invalid(`${where}.max_retries must be a non-negative integer (got ${policy.max_retries})`);
  }
  if (policy.backoff_factor < 0) {
    throw invalid(`${where}.backoff_factor must be a non-negative number (got ${policy.backoff_factor})`);
  }
  return policy;
}

/**
 * Range checks happen later, when the adapter resolves its config (E307)
 */
function parseAdapterConfig(value: unknown, where: string): Partial<AdapterConfig> {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw invalid(`${where} must be a mapping`);
  }

  const config: Partial<AdapterConfig> = {};
  for (const [key, raw] of Object.entries(value)) {
    const at = `${where}.${key}`;
    switch (key) {
      case 'enable_caching':
        config.enable_caching = requireBoolean(raw, at);
        break;
      case 'max_cache_size':
        config.max_cache_size = requireNumber(raw, at);
        break;
      case 'requests_per_minute':
        config.requests_per_minute = requireNumber(raw, at);
        break;
      case 'circuit_error_threshold':
        config.circuit_error_threshold = requireNumber(raw, at);
        break;
      case 'circuit_min_requests':
        config.circuit_min_requests = requireNumber(raw, at);
        break;
      case 'circuit_reset_timeout_ms':
        config.circuit_reset_timeout_ms = requireNumber(raw, at);
        break;
      case 'default_timeout_ms':
        config.default_timeout_ms = requireNumber(raw, at);
        break;
      case 'backoff_base_ms':
        config.backoff_base_ms = requireNumber(raw, at);
        break;
      case 'default_retry_policy':
        config.default_retry_policy = parseRetryPolicy(raw, at);
        break;
      case 'fallback_model':
        config.fallback_model = requireString(raw, at);
        break;
      default:
        throw invalid(`${where} has unknown key '${key}'`);
    }
  }
  return config;
}

function parseAdapter(value: unknown, index: number): AdapterDefinition {
  const where = `adapters[${index}]`;
  if (!isRecord(value)) {
    throw invalid(`${where} must be a mapping`);
  }
  return {
    type: requireString(value.type, `${where}.type`),
    name: optionalString(value.name, `${where}.name`),
    api_key_env: optionalString(value.api_key_env, `${where}.api_key_env`),
    base_url: optionalString(value.base_url, `${where}.base_url`),
    config: parseAdapterConfig(value.config, `${where}.config`),
  };
}

function parseStep(value: unknown, index: number): StepDefinition {
  const where = `steps[${index}]`;
  if (!isRecord(value)) {
    throw invalid(`${where} must be a mapping`);
  }

  const params: unknown = value.params ?? {};
  if (!isPayload(params) || !isPayloadObject(params)) {
    throw invalid(`${where}.params must be a mapping of JSON values`);
  }

  return {
    name: requireString(value.name, `${where}.name`),
    task_type: requireString(value.task_type, `${where}.task_type`),
    params,
    priority: optionalNumber(value.priority, `${where}.priority`),
    timeout_ms: optionalTimeout(value.timeout_ms, `${where}.timeout_ms`),
    retry_policy: parseStepRetryPolicy(value.retry_policy, `${where}.retry_policy`),
  };
}

function parseMode(value: unknown): ExecutionMode {
  if (value === undefined) {
    return ExecutionMode.SEQUENTIAL;
  }
  if (isExecutionMode(value)) {
    return value;
  }
  throw invalid(`mode must be '${ExecutionMode.SEQUENTIAL}' or '${ExecutionMode.PARALLEL}' (got '${String(value)}')`);
}

export class PipelineLoader {
  private readonly factories: Readonly<Record<string, AdapterFactory>>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: PipelineLogger;

  constructor(options: PipelineLoaderOptions = {}) {
    this.factories = options.factories ?? DEFAULT_ADAPTER_FACTORIES;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? getPipelineLogger();
  }

  /**
   * Read and validate a .yaml, .yml or .json definition
   */
  async loadFromFile(filePath: string): Promise<PipelineDefinition> {
    const absolutePath = path.resolve(filePath);

    if (!fs.existsSync(absolutePath)) {
      throw invalid(`file not found: ${absolutePath}`);
    }

    const content = fs.readFileSync(absolutePath, 'utf-8');
    const ext = path.extname(filePath).toLowerCase();

    if (ext === '.yaml' || ext === '.yml') {
      return this.parse(content, 'yaml');
    }
    if (ext === '.json') {
      return this.parse(content, 'json');
    }
    throw invalid(`unsupported file format '${ext}'. Use .yaml, .yml or .json`);
  }

  parse(content: string, format: 'yaml' | 'json'): PipelineDefinition {
    let raw: unknown;
    try {
      raw = format === 'yaml' ? yaml.load(content) : JSON.parse(content);
    } catch (error) {
      throw invalid(`cannot parse ${format}: ${describeError(error)}`);
    }
    return this.validate(raw);
  }

  /**
   * @throws PipelineError (E106) naming the first offending field
   */
  validate(raw: unknown): PipelineDefinition {
    if (!isRecord(raw)) {
      throw invalid('top level must be a mapping');
    }

    const name = requireString(raw.name, 'name');
    const mode = parseMode(raw.mode);
    const extraTaskTypes = requireList(raw.extra_task_types ?? [], 'extra_task_types').map((value, index) =>
      requireString(value, `extra_task_types[${index}]`)
    );
    const adapters = requireList(raw.adapters ?? [], 'adapters').map(parseAdapter);
    const steps = requireList(raw.steps, 'steps').map(parseStep);

    if (steps.length === 0) {
      throw invalid('steps must not be empty');
    }

    const allowed = new Set([...BUILTIN_TASK_TYPES, ...extraTaskTypes]);
    const names = new Set<string>();
    for (const step of steps) {
      if (!allowed.has(step.task_type)) {
        throw invalid(`step '${step.name}' has unknown task_type '${step.task_type}'`);
      }
      if (names.has(step.name)) {
        throw invalid(`duplicate step name '${step.name}'`);
      }
      names.add(step.name);
    }

    for (const adapter of adapters) {
      if (!Object.prototype.hasOwnProperty.call(this.factories, adapter.type)) {
        throw invalid(
          `unknown adapter type '${adapter.type}'. Known types: ${Object.keys(this.factories).join(', ')}`
        );
      }
    }

    return {
      name,
      mode,
      extra_task_types: extraTaskTypes,
      adapters,
      steps,
    };
  }

  /**
   * Build a pipeline, constructing adapters through the factory map.
   * Environment overrides apply under each adapter's own config.
   * @throws PipelineError E106 for a missing key variable; adapter
   *         construction errors (E301, E307) propagate
   */
  build(definition: PipelineDefinition, options: Omit<PipelineOptions, 'name' | 'extra_task_types'> = {}): Pipeline {
    const logger = options.logger ?? this.logger;
    const pipeline = new Pipeline({
      ...options,
      logger,
      name: definition.name,
      extra_task_types: definition.extra_task_types,
    });

    const envConfig = loadAdapterConfigFromEnv(this.env);
    for (const adapter of definition.adapters) {
      pipeline.registerAdapter(this.createAdapter(adapter, envConfig, logger));
    }

    for (const step of definition.steps) {
      pipeline.addStep(step.name, step.task_type, step.params, {
        priority: step.priority,
        timeout_ms: step.timeout_ms,
        retry_policy: step.retry_policy,
      });
    }

    return pipeline;
  }

  async loadPipeline(
    filePath: string,
    options: Omit<PipelineOptions, 'name' | 'extra_task_types'> = {}
  ): Promise<{ definition: PipelineDefinition; pipeline: Pipeline }> {
    const definition = await this.loadFromFile(filePath);
    return { definition, pipeline: this.build(definition, options) };
  }

  private createAdapter(
    definition: AdapterDefinition,
    envConfig: Partial<AdapterConfig>,
    logger: PipelineLogger
  ): IAdapter {
    let apiKey: string | undefined;
    if (definition.api_key_env !== undefined) {
      apiKey = this.env[definition.api_key_env];
      if (apiKey === undefined || apiKey.trim() === '') {
        throw invalid(`environment variable ${definition.api_key_env} is not set for adapter '${definition.type}'`);
      }
    }

    const factory = Object.prototype.hasOwnProperty.call(this.factories, definition.type)
      ? this.factories[definition.type]
      : undefined;
    if (!factory) {
      throw invalid(`unknown adapter type '${definition.type}'`);
    }

    return factory({
      name: definition.name,
      api_key: apiKey,
      base_url: definition.base_url,
      config: { ...envConfig, ...definition.config },
      logger,
    });
  }
}
