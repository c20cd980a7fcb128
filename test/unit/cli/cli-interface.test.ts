import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as path from 'path';
import { CLIError, HELP_TEXT, parseArgs, runCli, type CLIIO } from '../../../src/cli/cli-interface';
import { ExecutionMode } from '../../../src/models/enums';
import type { PipelineLogger } from '../../../src/logging/pipeline-logger';
import { createLocalFactories, createTestLogger } from '../../helpers/fake-adapters';

const FIXTURES = path.join(__dirname, '..', '..', 'fixtures', 'pipelines');

const OPTIMIZED_F = [
  '# Optimized version',
  'def f(): pass',
  '',
  '# Performance improvements applied:',
  '# - Removed unused imports',
  '# - Added error handling',
  '# - Optimized loops',
].join('\n');

interface CapturedIO extends CLIIO {
  stdout: string[];
  stderr: string[];
}

function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

function cli(args: string[], logger: PipelineLogger = createTestLogger()) {
  const io = captureIO();
  const run = runCli(args, io, { version: '1.2.3', factories: createLocalFactories(), env: {}, logger });
  return { io, run };
}

function fixture(name: string): string {
  return path.join(FIXTURES, name);
}

function cliError(message: string) {
  return (error: unknown): boolean => error instanceof CLIError && error.message === message;
}

describe('parseArgs', () => {
  it('should parse a full run command', () => {
    assert.deepStrictEqual(parseArgs(['run', 'p.yaml', '--payload', 'hi', '--mode', 'parallel', '--json']), {
      command: 'run',
      definitionPath: 'p.yaml',
      payload: 'hi',
      mode: ExecutionMode.PARALLEL,
      json: true,
    });
  });

  it('should return nothing for no arguments', () => {
    assert.deepStrictEqual(parseArgs([]), {});
  });

  it('should stop at help or version', () => {
    assert.deepStrictEqual(parseArgs(['--help', 'deploy']), { help: true });
    assert.deepStrictEqual(parseArgs(['-v']), { version: true });
  });

  it('should require a value after --payload', () => {
    assert.throws(() => parseArgs(['run', 'p.yaml', '--payload']), cliError('--payload requires a value'));
    assert.throws(() => parseArgs(['run', 'p.yaml', '--payload', '--json']), cliError('--payload requires a value'));
  });

  it('should reject an unknown mode', () => {
    assert.throws(
      () => parseArgs(['run', 'p.yaml', '--mode', 'diagonal']),
      cliError("--mode must be sequential or parallel (got 'diagonal')")
    );
  });

  it('should reject unknown options, commands and extra arguments', () => {
    assert.throws(() => parseArgs(['--bogus']), cliError('Unknown option: --bogus'));
    assert.throws(() => parseArgs(['deploy']), cliError('Unknown command: deploy'));
    assert.throws(() => parseArgs(['run', 'a.yaml', 'b.yaml']), cliError('Unexpected argument: b.yaml'));
  });
});

describe('runCli', () => {
  it('should print the version', async () => {
    const { io, run } = cli(['--version']);
    assert.strictEqual(await run, 0);
    assert.deepStrictEqual(io.stdout, ['umf v1.2.3']);
  });

  it('should print help without a command', async () => {
    const { io, run } = cli([]);
    assert.strictEqual(await run, 0);
    assert.deepStrictEqual(io.stdout, [HELP_TEXT]);
  });

  it('should report argument errors with a usage hint', async () => {
    const { io, run } = cli(['--bogus']);
    assert.strictEqual(await run, 1);
    assert.deepStrictEqual(io.stderr, ['Error: Unknown option: --bogus', 'Run "umf --help" for usage information']);
  });

  it('should require a definition file', async () => {
    const { io, run } = cli(['validate']);
    assert.strictEqual(await run, 1);
    assert.deepStrictEqual(io.stderr, ['Error: validate requires a pipeline definition file']);
  });

  describe('validate', () => {
    it('should summarize a valid definition', async () => {
      const { io, run } = cli(['validate', fixture('fanout.json')]);
      assert.strictEqual(await run, 0);
      assert.deepStrictEqual(io.stdout, ["Pipeline 'fanout' is valid: 2 step(s), 1 adapter(s), parallel mode"]);
    });

    it('should report an invalid definition', async () => {
      const { io, run } = cli(['validate', fixture('invalid-mode.yaml')]);
      assert.strictEqual(await run, 1);
      assert.deepStrictEqual(io.stderr, [
        "Error: [E106] Invalid pipeline definition: mode must be 'sequential' or 'parallel' (got 'diagonal')",
      ]);
    });

    it('should report a missing file', async () => {
      const missing = fixture('absent.yaml');
      const { io, run } = cli(['validate', missing]);
      assert.strictEqual(await run, 1);
      assert.deepStrictEqual(io.stderr, [`Error: [E106] Invalid pipeline definition: file not found: ${missing}`]);
    });
  });

  describe('run', () => {
    it('should require a payload', async () => {
      const { io, run } = cli(['run', fixture('local.yaml')]);
      assert.strictEqual(await run, 1);
      assert.deepStrictEqual(io.stderr, ['Error: run requires --payload <text>']);
    });

    it('should print each step and the total cost', async () => {
      const logger = createTestLogger();
      const { io, run } = cli(['run', fixture('local.yaml'), '--payload', 'write f'], logger);

      assert.strictEqual(await run, 0);
      assert.strictEqual(io.stdout.length, 8);
      assert.strictEqual(io.stdout[0], "Pipeline 'local-demo' (sequential)");
      assert.match(io.stdout[1], /^\[generate\] OK cost=\$0\.000000 time=\d+ms$/);
      assert.strictEqual(io.stdout[2], 'def f(): pass');
      assert.strictEqual(io.stdout[3], '');
      assert.match(io.stdout[4], /^\[optimize\] OK cost=\$0\.000000 time=\d+ms$/);
      assert.strictEqual(io.stdout[5], OPTIMIZED_F);
      assert.strictEqual(io.stdout[7], 'Total cost: $0.000000');
      assert.deepStrictEqual(io.stderr, []);
      assert.strictEqual(logger.getSubscriberCount(), 0);
    });

    it('should honour a mode override', async () => {
      const { io, run } = cli(['run', fixture('local.yaml'), '--payload', 'write f', '--mode', 'parallel']);
      assert.strictEqual(await run, 0);
      assert.strictEqual(io.stdout[0], "Pipeline 'local-demo' (parallel)");
      assert.ok(io.stdout[5].startsWith('# Optimized version\nwrite f\n'));
    });

    it('should print JSON on request', async () => {
      const { io, run } = cli(['run', fixture('local.yaml'), '--payload', 'write f', '--json']);
      assert.strictEqual(await run, 0);
      assert.strictEqual(io.stdout.length, 1);

      const parsed: {
        steps: Record<string, { result: string }>;
        cost_analysis: { execution_count: number; total_cost: number };
      } = JSON.parse(io.stdout[0]);
      assert.deepStrictEqual(Object.keys(parsed.steps), ['generate', 'optimize']);
      assert.strictEqual(parsed.steps.generate.result, 'def f(): pass');
      assert.strictEqual(parsed.cost_analysis.execution_count, 1);
      assert.strictEqual(parsed.cost_analysis.total_cost, 0);
    });

    it('should exit with 2 when a step returns an error', async () => {
      const { io, run } = cli(['run', fixture('failing.yml'), '--payload', 'data']);
      assert.strictEqual(await run, 2);
      assert.match(io.stdout[1], /^\[analyse\] ERROR cost=\$0\.000000 time=\d+ms$/);
      assert.strictEqual(io.stdout[2], 'Error: backend down');
      assert.strictEqual(
        io.stdout[io.stdout.length - 1],
        "Suggestion: Step 'analyse' returned 1 error response(s); check its adapter"
      );
    });

    it('should log routing decisions to stderr with --verbose', async () => {
      const { io, run } = cli(['run', fixture('local.yaml'), '--payload', 'write f', '--verbose']);
      assert.strictEqual(await run, 0);
      assert.ok(io.stderr.some((line) => line.includes(' [ROUTING] Selected echo-gen ')));
    });
  });
});
