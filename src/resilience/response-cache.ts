/**
 * Response Cache
 *
 * Bounded FIFO cache of successful responses. Eviction order is held in an
 * explicit insertion queue next to the lookup map: when full, the oldest
 * inserted key goes first, regardless of how recently it was read.
 */

import { createHash } from 'crypto';
import { canonicalize } from '../models/payload';
import type { RequestEnvelope, ResponseEnvelope } from '../models/envelope';

/**
 * Metadata that changes on every run and so never takes part in the key
 */
const PER_EXECUTION_METADATA_KEYS: readonly string[] = ['execution_id'];

/**
 * Deterministic key over task type, payload and metadata
 */
export function computeCacheKey(request: RequestEnvelope): string {
  const metadata = Object.fromEntries(
    Object.entries(request.metadata).filter(([key]) => !PER_EXECUTION_METADATA_KEYS.includes(key))
  );
  const normalised = canonicalize({
    task_type: request.task_type,
    payload: request.payload,
    metadata,
  });
  return createHash('sha256').update(normalised).digest('hex');
}

export class ResponseCache {
  private readonly entries = new Map<string, ResponseEnvelope>();
  private readonly insertionOrder: string[] = [];

  constructor(private readonly maxSize: number) {}

  get(key: string): ResponseEnvelope | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Store a response. Re-storing an existing key replaces the value but
   * keeps its original queue position.
   */
  set(key: string, response: ResponseEnvelope): void {
    if (this.entries.has(key)) {
      this.entries.set(key, response);
      return;
    }

    while (this.insertionOrder.length >= this.maxSize) {
      const oldest = this.insertionOrder.shift();
      if (oldest === undefined) {
        break;
      }
      this.entries.delete(oldest);
    }

    this.insertionOrder.push(key);
    this.entries.set(key, response);
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Keys from oldest to newest
   */
  keys(): string[] {
    return [...this.insertionOrder];
  }

  clear(): void {
    this.entries.clear();
    this.insertionOrder.length = 0;
  }
}
