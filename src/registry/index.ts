/**
 * Registry Module Index
 */

export { AdapterRegistry } from './adapter-registry';
export { AdapterSelector } from './adapter-selector';
