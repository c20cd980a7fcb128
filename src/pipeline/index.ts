/**
 * Pipeline Module Index
 */

export {
  Pipeline,
  type PipelineEvent,
  type PipelineEventType,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStep,
  type StepOptions,
  type StepParams,
} from './pipeline';
export { CostLedger, DOMINANT_STEP_SHARE, type CostAnalysis, type HighestCostStep } from './cost-ledger';
export { ParallelExecutor, Semaphore } from './parallel-executor';
export {
  PipelineLoader,
  DEFAULT_ADAPTER_FACTORIES,
  type AdapterDefinition,
  type AdapterFactory,
  type AdapterFactoryContext,
  type PipelineDefinition,
  type PipelineLoaderOptions,
  type StepDefinition,
} from './pipeline-loader';
