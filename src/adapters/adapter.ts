/**
 * Adapter Contract
 *
 * Every backend speaks UMF through this interface. Shared resilience
 * behaviour is not inherited: adapters compose an AdapterRuntime and route
 * their execute() through it.
 */

import type { RequestEnvelope, ResponseEnvelope } from '../models/envelope';

export interface IAdapter<TBackendRequest = unknown, TBackendResponse = unknown> {
  /** Unique, human-readable adapter name */
  readonly name: string;

  /**
   * Task types this adapter can serve. Pure.
   */
  capabilities(): readonly string[];

  /**
   * Convert a UMF request to the backend's request shape. Pure.
   * @throws AdapterError (E302) on malformed context entries
   */
  translateRequest(request: RequestEnvelope): TBackendRequest;

  /**
   * Convert a backend response to a UMF response, computing cost. Pure.
   */
  translateResponse(backendResponse: TBackendResponse, request: RequestEnvelope): ResponseEnvelope;

  /**
   * Run the request. Never rejects: failures resolve to an error-flagged
   * response with zero cost.
   */
  execute(request: RequestEnvelope): Promise<ResponseEnvelope>;

  /**
   * Cheap liveness probe
   */
  healthCheck(): Promise<boolean>;

  /**
   * execute() calls made so far; drives load balancing
   */
  getRequestCount(): number;
}
