import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { assertValidApiKey, isApiKeyFormatValid } from '../../../src/adapters/api-key';
import { PipelineError } from '../../../src/errors/pipeline-error';

describe('API key format', () => {
  it('should accept reserved placeholder keys', () => {
    assert.strictEqual(isApiKeyFormatValid('demo-key'), true);
    assert.strictEqual(isApiKeyFormatValid('test-key'), true);
  });

  it('should require at least ten non-blank characters', () => {
    assert.strictEqual(isApiKeyFormatValid('short'), false);
    assert.strictEqual(isApiKeyFormatValid('   padded   '), false);
    assert.strictEqual(isApiKeyFormatValid('test-secret'), true);
  });

  it('should name the adapter but never the key when rejecting', () => {
    assert.throws(
      () => assertValidApiKey('openai-chat', 'short'),
      (error: unknown) =>
        error instanceof PipelineError &&
        error.message === "[E301] Invalid API key format: adapter 'openai-chat'"
    );
  });

  it('should return a valid key unchanged', () => {
    assert.strictEqual(assertValidApiKey('a', 'test-secret'), 'test-secret');
  });
});
