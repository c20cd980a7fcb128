/**
 * Pipeline Orchestrator
 *
 * Holds an ordered list of named steps and runs them through selected
 * adapters, either chained (sequential) or fanned out from one input
 * (parallel). Per execution: VALIDATING -> RUNNING -> SUCCEEDED | FAILED.
 *
 * Step failures inside an adapter come back as error-flagged responses and
 * do not stop the run; in sequential mode the error text becomes the next
 * step's payload. Validation and routing failures reject execute().
 */

import { v4 as uuidv4 } from 'uuid';
import type { IAdapter } from '../adapters/adapter';
import { ErrorCode } from '../errors/error-codes';
import { PipelineError, describeError } from '../errors/pipeline-error';
import { getPipelineLogger, type PipelineLogger } from '../logging/pipeline-logger';
import { BUILTIN_TASK_TYPES, ExecutionMode, PipelineRunState } from '../models/enums';
import {
  createErrorResponse,
  createRequestEnvelope,
  isErrorResponse,
  isValidTimeoutMs,
  MAX_TIMEOUT_MS,
  type RequestEnvelope,
  type ResponseEnvelope,
  type RetryPolicy,
} from '../models/envelope';
import type { Payload } from '../models/payload';
import { AdapterRegistry } from '../registry/adapter-registry';
import { AdapterSelector } from '../registry/adapter-selector';
import { CostLedger, type CostAnalysis } from './cost-ledger';
import { ParallelExecutor } from './parallel-executor';

export type StepParams = Record<string, Payload>;

export interface StepOptions {
  priority?: number;
  timeout_ms?: number;
  retry_policy?: Partial<RetryPolicy>;
}

export interface PipelineStep {
  readonly name: string;
  readonly task_type: string;
  readonly params: Readonly<StepParams>;
  readonly options: Readonly<StepOptions>;
}

export type PipelineEventType =
  | 'EXECUTION_STARTED'
  | 'STEP_STARTED'
  | 'STEP_COMPLETED'
  | 'EXECUTION_COMPLETED'
  | 'EXECUTION_FAILED';

export interface PipelineEvent {
  type: PipelineEventType;
  timestamp: string;
  pipeline_id: string;
  execution_id: string;
  mode: ExecutionMode;
  step_name?: string;
  step_index?: number;
  adapter?: string;
  cost?: number;
  is_error?: boolean;
  error?: string;
}

export interface PipelineOptions {
  name?: string;
  /** Task types admitted in addition to the built-in ones */
  extra_task_types?: readonly string[];
  /** Consult healthCheck() during selection */
  health_aware_selection?: boolean;
  /** Parallel mode bound; unbounded when absent */
  max_concurrency?: number;
  logger?: PipelineLogger;
  on_event?: (event: PipelineEvent) => void;
  registry?: AdapterRegistry;
}

export type PipelineResult = Map<string, ResponseEnvelope>;

interface ExecutionScope {
  executionId: string;
  mode: ExecutionMode;
}

export class Pipeline {
  public readonly id: string;
  public readonly name: string;

  private readonly steps: PipelineStep[] = [];
  private readonly allowedTaskTypes: ReadonlySet<string>;
  private readonly registry: AdapterRegistry;
  private readonly selector: AdapterSelector;
  private readonly ledger = new CostLedger();
  private readonly executor: ParallelExecutor;
  private readonly logger: PipelineLogger;
  private readonly healthAware: boolean;
  private readonly onEvent?: (event: PipelineEvent) => void;
  private runningExecutions = 0;
  private lastRunState: PipelineRunState = PipelineRunState.IDLE;

  constructor(options: PipelineOptions = {}) {
    this.id = uuidv4();
    this.name = options.name ?? `pipeline_${this.id.slice(0, 8)}`;
    this.allowedTaskTypes = new Set([...BUILTIN_TASK_TYPES, ...(options.extra_task_types ?? [])]);
    this.logger = options.logger ?? getPipelineLogger();
    this.registry = options.registry ?? new AdapterRegistry();
    this.selector = new AdapterSelector(this.registry, this.logger);
    this.executor = new ParallelExecutor(options.max_concurrency);
    this.healthAware = options.health_aware_selection ?? false;
    this.onEvent = options.on_event;
  }

  registerAdapter(adapter: IAdapter): this {
    const added = this.registry.register(adapter);
    this.logger.info('ROUTING', `Registered ${adapter.name} for ${added.join(', ') || 'no new capabilities'}`, {
      pipelineId: this.id,
    });
    return this;
  }

  /**
   * Append a step. Names and task types are checked when execute() runs.
   * @throws PipelineError (E105) while an execution is in flight, (E107)
   *         for an out-of-range timeout_ms
   */
  addStep(name: string, taskType: string, params: StepParams = {}, options: StepOptions = {}): this {
    if (this.runningExecutions > 0) {
      throw new PipelineError(ErrorCode.E105_PIPELINE_LOCKED, `cannot add '${name}'`);
    }
    if (options.timeout_ms !== undefined && !isValidTimeoutMs(options.timeout_ms)) {
      throw new PipelineError(
        ErrorCode.E107_INVALID_TIMEOUT,
        `step '${name}': timeout_ms must be an integer in [1, ${MAX_TIMEOUT_MS}] (got ${options.timeout_ms})`
      );
    }
    this.steps.push({ name, task_type: taskType, params: { ...params }, options: { ...options } });
    return this;
  }

  getSteps(): readonly PipelineStep[] {
    return [...this.steps];
  }

  getRegistry(): AdapterRegistry {
    return this.registry;
  }

  getAllowedTaskTypes(): string[] {
    return [...this.allowedTaskTypes];
  }

  getLastRunState(): PipelineRunState {
    return this.lastRunState;
  }

  getCostAnalysis(): CostAnalysis {
    return this.ledger.analyze();
  }

  /**
   * @returns step name -> response, in declaration order
   * @throws PipelineError on validation (E1xx) or routing (E2xx) failures
   */
  async execute(initialPayload: Payload, mode: ExecutionMode = ExecutionMode.SEQUENTIAL): Promise<PipelineResult> {
    const steps = [...this.steps];
    const scope: ExecutionScope = { executionId: uuidv4(), mode };

    this.lastRunState = PipelineRunState.VALIDATING;
    this.emit(scope, { type: 'EXECUTION_STARTED' });

    this.runningExecutions++;
    try {
      this.validate(steps);
      this.lastRunState = PipelineRunState.RUNNING;
      this.logger.info('VALIDATION', `Pipeline ${this.name} validated: ${steps.length} step(s), ${mode} mode`, {
        pipelineId: this.id,
      });

      const results =
        mode === ExecutionMode.PARALLEL && steps.length > 1
          ? await this.executeParallel(steps, initialPayload, scope)
          : await this.executeSequential(steps, initialPayload, scope);

      this.ledger.recordExecution();
      this.lastRunState = PipelineRunState.SUCCEEDED;
      this.logger.info('COST', `Pipeline ${this.name} total cost ${this.ledger.getTotalCost()}`, {
        pipelineId: this.id,
        details: { cost_by_step: this.ledger.getCostByStep() },
      });
      this.emit(scope, { type: 'EXECUTION_COMPLETED' });
      return results;
    } catch (error) {
      this.lastRunState = PipelineRunState.FAILED;
      this.logger.error('ERROR', `Pipeline ${this.name} failed: ${describeError(error)}`, { pipelineId: this.id });
      this.emit(scope, { type: 'EXECUTION_FAILED', error: describeError(error) });
      throw error;
    } finally {
      this.runningExecutions--;
    }
  }

  private validate(steps: readonly PipelineStep[]): void {
    if (steps.length === 0) {
      throw new PipelineError(ErrorCode.E101_EMPTY_PIPELINE, this.name);
    }

    const names = new Set<string>();
    for (const step of steps) {
      const taskType: unknown = step.task_type;
      if (typeof taskType !== 'string' || taskType.trim().length === 0) {
        throw new PipelineError(ErrorCode.E102_INVALID_TASK_TYPE, `step '${step.name}': '${String(taskType)}'`);
      }
      if (!this.allowedTaskTypes.has(taskType)) {
        throw new PipelineError(ErrorCode.E103_UNAUTHORIZED_TASK_TYPE, `step '${step.name}': '${taskType}'`);
      }
      if (names.has(step.name)) {
        throw new PipelineError(ErrorCode.E104_DUPLICATE_STEP_NAME, `'${step.name}'`);
      }
      names.add(step.name);
    }
  }

  private async executeSequential(
    steps: readonly PipelineStep[],
    initialPayload: Payload,
    scope: ExecutionScope
  ): Promise<PipelineResult> {
    const results: PipelineResult = new Map();
    let payload = initialPayload;

    for (const [index, step] of steps.entries()) {
      const adapter = await this.selectAdapter(step);
      const response = await this.runStep(adapter, step, index, payload, scope);
      results.set(step.name, response);
      payload = response.result;
    }

    return results;
  }

  private async executeParallel(
    steps: readonly PipelineStep[],
    initialPayload: Payload,
    scope: ExecutionScope
  ): Promise<PipelineResult> {
    const adapters: IAdapter[] = [];
    for (const step of steps) {
      adapters.push(await this.selectAdapter(step));
    }

    const responses = await this.executor.executeParallel(
      steps.map((step, index) => () => this.runStep(adapters[index], step, index, initialPayload, scope))
    );

    const results: PipelineResult = new Map();
    steps.forEach((step, index) => results.set(step.name, responses[index]));
    return results;
  }

  private async selectAdapter(step: PipelineStep): Promise<IAdapter> {
    try {
      return this.healthAware
        ? await this.selector.selectHealthy(step.task_type)
        : this.selector.select(step.task_type);
    } catch (error) {
      this.logger.error('ROUTING', `No adapter for step '${step.name}': ${describeError(error)}`, {
        pipelineId: this.id,
      });
      throw error;
    }
  }

  /**
   * Run one step; never rejects
   */
  private async runStep(
    adapter: IAdapter,
    step: PipelineStep,
    index: number,
    payload: Payload,
    scope: ExecutionScope
  ): Promise<ResponseEnvelope> {
    const request = this.buildRequest(step, index, payload, scope);
    const requestId = request.request_id;

    this.emit(scope, { type: 'STEP_STARTED', step_name: step.name, step_index: index, adapter: adapter.name });
    this.logger.info('STEP_START', `Step '${step.name}' -> ${adapter.name}`, { pipelineId: this.id, requestId });

    const startedAt = Date.now();
    let response: ResponseEnvelope;
    try {
      response = await adapter.execute(request);
    } catch (error) {
      response = createErrorResponse(request, error, `Error in step '${step.name}'`);
    }
    const elapsedMs = Date.now() - startedAt;

    this.ledger.record(step.name, response, elapsedMs);

    const isError = isErrorResponse(response);
    const cost = response.cost_info.estimated_cost;
    this.logger.log(isError ? 'warn' : 'info', 'STEP_END', `Step '${step.name}' finished in ${elapsedMs}ms`, {
      pipelineId: this.id,
      requestId,
      details: { cost, error: isError },
    });
    this.emit(scope, {
      type: 'STEP_COMPLETED',
      step_name: step.name,
      step_index: index,
      adapter: adapter.name,
      cost,
      is_error: isError,
    });

    return response;
  }

  private buildRequest(
    step: PipelineStep,
    index: number,
    payload: Payload,
    scope: ExecutionScope
  ): RequestEnvelope {
    return createRequestEnvelope(step.task_type, payload, {
      metadata: {
        ...step.params,
        pipeline_id: this.id,
        pipeline_name: this.name,
        execution_id: scope.executionId,
        step_name: step.name,
        step_index: index,
      },
      priority: step.options.priority,
      timeout_ms: step.options.timeout_ms,
      retry_policy: step.options.retry_policy,
    });
  }

  private emit(scope: ExecutionScope, event: Omit<PipelineEvent, 'timestamp' | 'pipeline_id' | 'execution_id' | 'mode'>): void {
    if (!this.onEvent) {
      return;
    }
    try {
      this.onEvent({
        ...event,
        timestamp: new Date().toISOString(),
        pipeline_id: this.id,
        execution_id: scope.executionId,
        mode: scope.mode,
      });
    } catch (error) {
      this.logger.warn('ERROR', `Event listener failed: ${describeError(error)}`, { pipelineId: this.id });
    }
  }
}
