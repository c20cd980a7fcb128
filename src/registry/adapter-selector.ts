/**
 * Adapter Selector
 *
 * Picks the adapter for a task type: capability re-check, optional health
 * filter, then the lowest request count (registration order breaks ties).
 * Count-based balancing only; no weights or latency.
 */

import type { IAdapter } from '../adapters/adapter';
import { ErrorCode } from '../errors/error-codes';
import { PipelineError, describeError } from '../errors/pipeline-error';
import { getPipelineLogger, type PipelineLogger } from '../logging/pipeline-logger';
import type { AdapterRegistry } from './adapter-registry';

export class AdapterSelector {
  private readonly logger: PipelineLogger;

  constructor(
    private readonly registry: AdapterRegistry,
    logger?: PipelineLogger
  ) {
    this.logger = logger ?? getPipelineLogger();
  }

  /**
   * @throws PipelineError E102 (invalid task type), E201 (none registered),
   *         E202 (none still declares the capability)
   */
  select(taskType: unknown): IAdapter {
    return this.leastLoaded(this.authorizedCandidates(taskType));
  }

  /**
   * select() that also drops adapters whose healthCheck() is false or rejects
   * @throws PipelineError E203 when no authorized adapter is healthy
   */
  async selectHealthy(taskType: unknown): Promise<IAdapter> {
    const candidates = this.authorizedCandidates(taskType);
    const health = await Promise.all(candidates.map((adapter) => this.isHealthy(adapter)));
    const healthy = candidates.filter((_, index) => health[index]);
    if (healthy.length === 0) {
      throw new PipelineError(ErrorCode.E203_NO_HEALTHY_ADAPTER, String(taskType));
    }
    return this.leastLoaded(healthy);
  }

  private authorizedCandidates(taskType: unknown): IAdapter[] {
    if (typeof taskType !== 'string' || taskType.trim().length === 0) {
      throw new PipelineError(ErrorCode.E102_INVALID_TASK_TYPE, `'${String(taskType)}'`);
    }

    const registered = this.registry.getAdapters(taskType);
    if (registered.length === 0) {
      throw new PipelineError(ErrorCode.E201_NO_ADAPTER, taskType);
    }

    const authorized = registered.filter((adapter) => this.declares(adapter, taskType));
    if (authorized.length === 0) {
      throw new PipelineError(ErrorCode.E202_NO_AUTHORIZED_ADAPTER, taskType);
    }
    return authorized;
  }

  private declares(adapter: IAdapter, taskType: string): boolean {
    try {
      return adapter.capabilities().includes(taskType);
    } catch (error) {
      this.logger.warn('ROUTING', `Skipping ${adapter.name}: capabilities() threw ${describeError(error)}`);
      return false;
    }
  }

  private async isHealthy(adapter: IAdapter): Promise<boolean> {
    try {
      return await adapter.healthCheck();
    } catch (error) {
      this.logger.warn('ROUTING', `Health check of ${adapter.name} threw ${describeError(error)}`);
      return false;
    }
  }

  private leastLoaded(candidates: readonly IAdapter[]): IAdapter {
    let chosen = candidates[0];
    for (const adapter of candidates.slice(1)) {
      if (adapter.getRequestCount() < chosen.getRequestCount()) {
        chosen = adapter;
      }
    }
    this.logger.debug('ROUTING', `Selected ${chosen.name} (${chosen.getRequestCount()} prior requests)`);
    return chosen;
  }
}
