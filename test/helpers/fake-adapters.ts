/**
 * Fake adapters and fetch stand-ins for deterministic tests.
 * Nothing here touches the network.
 */

import type { IAdapter } from '../../src/adapters/adapter';
import type { ChatCompletionRequest } from '../../src/adapters/openai-chat-adapter';
import { PipelineLogger } from '../../src/logging/pipeline-logger';
import { DEFAULT_ADAPTER_FACTORIES, type AdapterFactory } from '../../src/pipeline/pipeline-loader';
import {
  createErrorResponse,
  createResponseEnvelope,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../../src/models/envelope';
import type { Payload } from '../../src/models/payload';

export interface FakeAdapterConfig {
  name: string;
  capabilities: string[];
  /** Result for a request; throwing produces an error response */
  respond?: (request: RequestEnvelope) => Payload;
  cost?: number;
  delay_ms?: number;
  healthy?: boolean;
  /** Reject from execute() instead of returning an error response */
  violateContract?: boolean;
}

/**
 * Records every request it receives
 */
export class RecordingAdapter implements IAdapter<Payload, Payload> {
  public readonly name: string;
  public readonly requests: RequestEnvelope[] = [];
  public healthChecks = 0;

  private readonly config: FakeAdapterConfig;
  private requestCount = 0;

  constructor(config: FakeAdapterConfig) {
    this.name = config.name;
    this.config = config;
  }

  capabilities(): readonly string[] {
    return this.config.capabilities;
  }

  translateRequest(request: RequestEnvelope): Payload {
    return request.payload;
  }

  translateResponse(result: Payload, request: RequestEnvelope): ResponseEnvelope {
    return createResponseEnvelope(request, result, {
      cost_info: { estimated_cost: this.config.cost ?? 0 },
      model_info: { adapter: this.name },
    });
  }

  async execute(request: RequestEnvelope): Promise<ResponseEnvelope> {
    this.requestCount++;
    this.requests.push(request);
    if (this.config.delay_ms !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, this.config.delay_ms));
    }
    if (this.config.violateContract) {
      throw new Error(`${this.name} exploded`);
    }
    try {
      const respond = this.config.respond ?? ((req: RequestEnvelope) => req.payload);
      return this.translateResponse(respond(request), request);
    } catch (error) {
      return createErrorResponse(request, error);
    }
  }

  async healthCheck(): Promise<boolean> {
    this.healthChecks++;
    return this.config.healthy ?? true;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  /**
   * Payloads received, in order
   */
  payloads(): Payload[] {
    return this.requests.map((request) => request.payload);
  }
}

/**
 * Logger isolated from the process-wide instance
 */
export function createTestLogger(): PipelineLogger {
  return new PipelineLogger({ maxEntries: 500 });
}

export interface RecordedCall {
  url: string;
  init?: RequestInit;
}

export interface FakeFetch {
  (url: string, init?: RequestInit): Promise<Response>;
  calls: RecordedCall[];
}

/**
 * fetch stand-in answering from a queue of responders; the last responder
 * repeats once the queue is exhausted
 */
export function createFakeFetch(...responders: Array<() => Response | Promise<Response>>): FakeFetch {
  const calls: RecordedCall[] = [];
  const fake = async (url: string, init?: RequestInit): Promise<Response> => {
    calls.push({ url, init });
    const responder = responders[Math.min(calls.length - 1, responders.length - 1)];
    return responder();
  };
  return Object.assign(fake, { calls });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function completionBody(
  content: string,
  usage: { prompt_tokens: number; completion_tokens: number } = { prompt_tokens: 100, completion_tokens: 50 },
  model = 'gpt-3.5-turbo'
): Record<string, unknown> {
  return {
    model,
    choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { ...usage, total_tokens: usage.prompt_tokens + usage.completion_tokens },
  };
}

/**
 * Parse the chat completion body a fake fetch was called with
 */
export function requestBody(call: RecordedCall): ChatCompletionRequest {
  const body = call.init?.body;
  if (typeof body !== 'string') {
    throw new Error(`no JSON body sent to ${call.url}`);
  }
  const parsed: ChatCompletionRequest = JSON.parse(body);
  return parsed;
}

/**
 * Built-in factories plus two local adapter types used by the fixture
 * definitions: `echo` (code_generation) and `broken` (analysis, always fails)
 */
export function createLocalFactories(): Record<string, AdapterFactory> {
  return {
    ...DEFAULT_ADAPTER_FACTORIES,
    echo: (context) =>
      new RecordingAdapter({
        name: context.name ?? 'echo',
        capabilities: ['code_generation'],
        respond: () => 'def f(): pass',
      }),
    broken: (context) =>
      new RecordingAdapter({
        name: context.name ?? 'broken',
        capabilities: ['analysis'],
        respond: () => {
          throw new Error('backend down');
        },
      }),
  };
}
