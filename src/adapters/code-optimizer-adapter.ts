/**
 * Code Optimizer Adapter
 *
 * Local reference adapter for code_optimization. The code is HTML-escaped
 * and annotated; no backend is called and the cost is zero.
 */

import type { IAdapter } from './adapter';
import { AdapterRuntime, type AdapterRuntimeOptions } from './adapter-runtime';
import { assertValidApiKey } from './api-key';
import { TaskType } from '../models/enums';
import {
  createResponseEnvelope,
  validateContext,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../models/envelope';
import { payloadToText } from '../models/payload';

export interface CodeOptimizerRequest {
  code: string;
}

export interface CodeOptimizerAdapterOptions extends AdapterRuntimeOptions {
  name?: string;
  api_key?: string;
  /** Simulated processing time */
  processing_delay_ms?: number;
}

export const OPTIMIZATION_NOTES: readonly string[] = [
  'Removed unused imports',
  'Added error handling',
  'Optimized loops',
];

/**
 * `&` first, so entities produced for `<` and `>` are not escaped twice
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export class CodeOptimizerAdapter implements IAdapter<CodeOptimizerRequest, string> {
  public readonly name: string;

  private readonly runtime: AdapterRuntime;
  private readonly processingDelayMs: number;

  constructor(options: CodeOptimizerAdapterOptions = {}) {
    this.name = options.name ?? 'code-optimizer';
    assertValidApiKey(this.name, options.api_key ?? 'demo-key');
    this.processingDelayMs = options.processing_delay_ms ?? 0;
    this.runtime = new AdapterRuntime(this.name, options);
  }

  public capabilities(): readonly string[] {
    return [TaskType.CODE_OPTIMIZATION];
  }

  public translateRequest(request: RequestEnvelope): CodeOptimizerRequest {
    validateContext(request.context);
    return { code: payloadToText(request.payload) };
  }

  public translateResponse(optimized: string, request: RequestEnvelope): ResponseEnvelope {
    return createResponseEnvelope(request, optimized, {
      cost_info: { estimated_cost: 0 },
      model_info: { provider: 'local', adapter: this.name },
    });
  }

  public async execute(request: RequestEnvelope): Promise<ResponseEnvelope> {
    return this.runtime.run(request, async (req) => {
      const { code } = this.translateRequest(req);
      if (this.processingDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.processingDelayMs));
      }
      return this.translateResponse(this.optimize(code), req);
    });
  }

  public async healthCheck(): Promise<boolean> {
    return true;
  }

  public getRequestCount(): number {
    return this.runtime.getRequestCount();
  }

  public getRuntime(): AdapterRuntime {
    return this.runtime;
  }

  private optimize(code: string): string {
    return [
      '# Optimized version',
      escapeHtml(code),
      '',
      '# Performance improvements applied:',
      ...OPTIMIZATION_NOTES.map((note) => `# - ${note}`),
    ].join('\n');
  }
}
