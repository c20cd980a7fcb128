/**
 * Cost Ledger
 *
 * Per-pipeline accumulator of step cost and timing. Never reset between
 * executions; per-step figures are sums across all of them, so
 * total_cost always equals the sum of cost_by_step.
 */

import { isErrorResponse, type ResponseEnvelope } from '../models/envelope';

export interface HighestCostStep {
  name: string;
  cost: number;
  /** Fraction of total_cost, 0..1 */
  share: number;
}

export interface CostAnalysis {
  total_cost: number;
  cost_by_step: Record<string, number>;
  time_by_step_ms: Record<string, number>;
  execution_count: number;
  average_cost_per_execution: number;
  /** Error-flagged responses per step */
  error_steps: Record<string, number>;
  highest_cost_step?: HighestCostStep;
  suggestions: string[];
}

/** Share of total cost above which the top step is called out */
export const DOMINANT_STEP_SHARE = 0.5;

export class CostLedger {
  private totalCost = 0;
  private executionCount = 0;
  private readonly costByStep = new Map<string, number>();
  private readonly timeByStep = new Map<string, number>();
  private readonly errorsByStep = new Map<string, number>();

  /**
   * Record one completed step. Synchronous: safe to call from steps that
   * complete concurrently.
   */
  record(stepName: string, response: ResponseEnvelope, elapsedMs: number): void {
    const cost = response.cost_info.estimated_cost;
    this.totalCost += cost;
    this.costByStep.set(stepName, (this.costByStep.get(stepName) ?? 0) + cost);
    this.timeByStep.set(stepName, (this.timeByStep.get(stepName) ?? 0) + elapsedMs);
    if (isErrorResponse(response)) {
      this.errorsByStep.set(stepName, (this.errorsByStep.get(stepName) ?? 0) + 1);
    }
  }

  recordExecution(): void {
    this.executionCount++;
  }

  getTotalCost(): number {
    return this.totalCost;
  }

  getCostByStep(): Record<string, number> {
    return Object.fromEntries(this.costByStep);
  }

  analyze(): CostAnalysis {
    const analysis: CostAnalysis = {
      total_cost: this.totalCost,
      cost_by_step: this.getCostByStep(),
      time_by_step_ms: Object.fromEntries(this.timeByStep),
      execution_count: this.executionCount,
      average_cost_per_execution: this.executionCount > 0 ? this.totalCost / this.executionCount : 0,
      error_steps: Object.fromEntries(this.errorsByStep),
      suggestions: [],
    };

    let highest: [string, number] | undefined;
    for (const entry of this.costByStep) {
      if (!highest || entry[1] > highest[1]) {
        highest = entry;
      }
    }
    if (highest && this.totalCost > 0) {
      const [name, cost] = highest;
      const share = cost / this.totalCost;
      analysis.highest_cost_step = { name, cost, share };
      if (share > DOMINANT_STEP_SHARE && this.costByStep.size > 1) {
        analysis.suggestions.push(
          `Step '${name}' accounts for ${Math.round(share * 100)}% of total cost; consider a cheaper model or caching for it`
        );
      }
    }

    for (const [name, errors] of this.errorsByStep) {
      analysis.suggestions.push(`Step '${name}' returned ${errors} error response(s); check its adapter`);
    }

    return analysis;
  }
}
