/**
 * API key format check, run when an adapter is constructed.
 * Keys are never logged or echoed in errors.
 */

import { ErrorCode } from '../errors/error-codes';
import { PipelineError } from '../errors/pipeline-error';

/**
 * Placeholder keys accepted for local and demo adapters
 */
export const RESERVED_API_KEYS: ReadonlySet<string> = new Set(['demo-key', 'test-key']);

export const MIN_API_KEY_LENGTH = 10;

export function isApiKeyFormatValid(key: string): boolean {
  if (RESERVED_API_KEYS.has(key)) {
    return true;
  }
  return key.trim().length >= MIN_API_KEY_LENGTH;
}

/**
 * @throws PipelineError (E301) naming the adapter, never the key
 */
export function assertValidApiKey(adapterName: string, key: string): string {
  if (!isApiKeyFormatValid(key)) {
    throw new PipelineError(ErrorCode.E301_INVALID_API_KEY, `adapter '${adapterName}'`);
  }
  return key;
}
