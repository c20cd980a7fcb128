/**
 * UMF Orchestrator
 *
 * Vendor-neutral request/response envelopes for AI backends and a pipeline
 * orchestrator that routes, chains and fans out steps across adapters.
 */

export * from './models';
export * from './errors';
export * from './logging';
export * from './config';
export * from './resilience';
export * from './adapters';
export * from './registry';
export * from './pipeline';
