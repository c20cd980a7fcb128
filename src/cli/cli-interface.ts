/**
 * CLI Interface
 *
 * Argument parsing and the run/validate commands. Output goes through an
 * injected CLIIO so commands can run in-process.
 */

import { describeError } from '../errors/pipeline-error';
import {
  createConsoleSubscriber,
  getPipelineLogger,
  type PipelineLogger,
} from '../logging/pipeline-logger';
import { ExecutionMode, isExecutionMode } from '../models/enums';
import { isErrorResponse } from '../models/envelope';
import { payloadToText } from '../models/payload';
import type { CostAnalysis } from '../pipeline/cost-ledger';
import type { PipelineResult } from '../pipeline/pipeline';
import { PipelineLoader, type PipelineLoaderOptions } from '../pipeline/pipeline-loader';

/**
 * Bad command line
 */
export class CLIError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type CLICommand = 'run' | 'validate';

export interface ParsedArgs {
  command?: CLICommand;
  definitionPath?: string;
  payload?: string;
  mode?: ExecutionMode;
  json?: boolean;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

export interface CLIIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CLIRunOptions extends PipelineLoaderOptions {
  version?: string;
  logger?: PipelineLogger;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** The run finished but at least one step returned an error response */
export const EXIT_STEP_ERRORS = 2;

export const HELP_TEXT = `
umf - run multi-step AI pipelines through vendor-neutral adapters

Usage:
  umf run <definition> --payload <text> [--mode sequential|parallel] [--json] [--verbose]
  umf validate <definition>

Commands:
  run        Load a pipeline definition (.yaml, .yml or .json) and execute it
  validate   Load and validate a pipeline definition without running it

Options:
  --payload <text>   Initial payload for the first step (run only)
  --mode <mode>      Override the definition's execution mode
  --json             Print results as JSON
  --verbose          Log routing, retry and cost decisions to stderr
  -h, --help         Show this help message
  -v, --version      Show version information

Environment:
  UMF_REQUESTS_PER_MINUTE, UMF_ENABLE_CACHING, UMF_MAX_CACHE_SIZE,
  UMF_DEFAULT_TIMEOUT_MS, UMF_MAX_RETRIES, UMF_BACKOFF_FACTOR
`.trim();

function takeValue(args: string[], index: number, option: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CLIError(`${option} requires a value`);
  }
  return value;
}

/**
 * Parse CLI arguments (without the node and script entries)
 * @throws CLIError on unknown options, commands or modes
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--json') {
      result.json = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--payload') {
      result.payload = takeValue(args, i, arg);
      i++;
    } else if (arg === '--mode') {
      const mode = takeValue(args, i, arg);
      if (!isExecutionMode(mode)) {
        throw new CLIError(`--mode must be sequential or parallel (got '${mode}')`);
      }
      result.mode = mode;
      i++;
    } else if (arg.startsWith('-')) {
      throw new CLIError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (result.help || result.version) {
    return result;
  }

  const [command, definitionPath, ...extra] = positionals;
  if (command === undefined) {
    return result;
  }
  if (command !== 'run' && command !== 'validate') {
    throw new CLIError(`Unknown command: ${command}`);
  }
  if (extra.length > 0) {
    throw new CLIError(`Unexpected argument: ${extra[0]}`);
  }
  result.command = command;
  result.definitionPath = definitionPath;
  return result;
}

function formatCost(cost: number): string {
  return `$${cost.toFixed(6)}`;
}

export function formatResults(results: PipelineResult, analysis: CostAnalysis): string[] {
  const lines: string[] = [];
  for (const [name, response] of results) {
    const status = isErrorResponse(response) ? 'ERROR' : 'OK';
    lines.push(`[${name}] ${status} cost=${formatCost(response.cost_info.estimated_cost)} time=${response.execution_time_ms}ms`);
    lines.push(payloadToText(response.result));
    lines.push('');
  }
  lines.push(`Total cost: ${formatCost(analysis.total_cost)}`);
  for (const suggestion of analysis.suggestions) {
    lines.push(`Suggestion: ${suggestion}`);
  }
  return lines;
}

export function resultsToJson(results: PipelineResult, analysis: CostAnalysis): string {
  const steps: Record<string, unknown> = {};
  for (const [name, response] of results) {
    steps[name] = {
      result: response.result,
      request_id: response.request_id,
      cost_info: response.cost_info,
      execution_time_ms: response.execution_time_ms,
      model_info: response.model_info,
      quality_metrics: response.quality_metrics,
    };
  }
  return JSON.stringify({ steps, cost_analysis: analysis }, null, 2);
}

/**
 * Run the CLI. Resolves to the process exit code; never rejects.
 */
export async function runCli(args: string[], io: CLIIO, options: CLIRunOptions = {}): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    io.err(`Error: ${describeError(error)}`);
    io.err('Run "umf --help" for usage information');
    return EXIT_FAILURE;
  }

  if (parsed.version) {
    io.out(`umf v${options.version ?? 'unknown'}`);
    return EXIT_OK;
  }
  if (parsed.help || parsed.command === undefined) {
    io.out(HELP_TEXT);
    return EXIT_OK;
  }
  if (parsed.definitionPath === undefined) {
    io.err(`Error: ${parsed.command} requires a pipeline definition file`);
    return EXIT_FAILURE;
  }

  const logger = options.logger ?? getPipelineLogger();
  const unsubscribe = logger.subscribe(createConsoleSubscriber(parsed.verbose ? 'debug' : 'warn', (line) => io.err(line)));
  const loader = new PipelineLoader({ ...options, logger });

  try {
    const definition = await loader.loadFromFile(parsed.definitionPath);

    if (parsed.command === 'validate') {
      io.out(
        `Pipeline '${definition.name}' is valid: ${definition.steps.length} step(s), ` +
          `${definition.adapters.length} adapter(s), ${definition.mode} mode`
      );
      return EXIT_OK;
    }

    if (parsed.payload === undefined) {
      io.err('Error: run requires --payload <text>');
      return EXIT_FAILURE;
    }

    const pipeline = loader.build(definition, { logger });
    const results = await pipeline.execute(parsed.payload, parsed.mode ?? definition.mode);
    const analysis = pipeline.getCostAnalysis();

    if (parsed.json) {
      io.out(resultsToJson(results, analysis));
    } else {
      io.out(`Pipeline '${pipeline.name}' (${parsed.mode ?? definition.mode})`);
      formatResults(results, analysis).forEach((line) => io.out(line));
    }

    const failedSteps = [...results.values()].filter(isErrorResponse).length;
    return failedSteps > 0 ? EXIT_STEP_ERRORS : EXIT_OK;
  } catch (error) {
    io.err(`Error: ${describeError(error)}`);
    return EXIT_FAILURE;
  } finally {
    unsubscribe();
  }
}
