import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { CostLedger } from '../../../src/pipeline/cost-ledger';
import { createErrorResponse, createRequestEnvelope, createResponseEnvelope } from '../../../src/models/envelope';

function responseCosting(cost: number) {
  return createResponseEnvelope(createRequestEnvelope('analysis', 'x'), 'ok', { cost_info: { estimated_cost: cost } });
}

describe('CostLedger', () => {
  it('should start empty', () => {
    assert.deepStrictEqual(new CostLedger().analyze(), {
      total_cost: 0,
      cost_by_step: {},
      time_by_step_ms: {},
      execution_count: 0,
      average_cost_per_execution: 0,
      error_steps: {},
      suggestions: [],
    });
  });

  it('should accumulate per step across executions', () => {
    const ledger = new CostLedger();
    ledger.record('a', responseCosting(0.5), 10);
    ledger.record('b', responseCosting(0.25), 5);
    ledger.recordExecution();
    ledger.record('a', responseCosting(0.25), 20);
    ledger.recordExecution();

    const analysis = ledger.analyze();
    assert.strictEqual(analysis.total_cost, 1);
    assert.deepStrictEqual(analysis.cost_by_step, { a: 0.75, b: 0.25 });
    assert.deepStrictEqual(analysis.time_by_step_ms, { a: 30, b: 5 });
    assert.strictEqual(analysis.execution_count, 2);
    assert.strictEqual(analysis.average_cost_per_execution, 0.5);
  });

  it('should call out a step above half of the total cost', () => {
    const ledger = new CostLedger();
    ledger.record('expensive', responseCosting(0.75), 1);
    ledger.record('cheap', responseCosting(0.25), 1);

    const analysis = ledger.analyze();
    assert.deepStrictEqual(analysis.highest_cost_step, { name: 'expensive', cost: 0.75, share: 0.75 });
    assert.deepStrictEqual(analysis.suggestions, [
      "Step 'expensive' accounts for 75% of total cost; consider a cheaper model or caching for it",
    ]);
  });

  it('should not suggest anything for a single-step pipeline', () => {
    const ledger = new CostLedger();
    ledger.record('only', responseCosting(0.5), 1);
    assert.deepStrictEqual(ledger.analyze().suggestions, []);
  });

  it('should count error responses per step', () => {
    const ledger = new CostLedger();
    const request = createRequestEnvelope('analysis', 'x');
    ledger.record('flaky', createErrorResponse(request, new Error('down')), 1);
    ledger.record('flaky', createErrorResponse(request, new Error('down')), 1);

    const analysis = ledger.analyze();
    assert.deepStrictEqual(analysis.error_steps, { flaky: 2 });
    assert.strictEqual(analysis.highest_cost_step, undefined);
    assert.deepStrictEqual(analysis.suggestions, ["Step 'flaky' returned 2 error response(s); check its adapter"]);
  });
});
