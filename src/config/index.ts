/**
 * Config Module Index
 */

export {
  DEFAULT_ADAPTER_CONFIG,
  resolveAdapterConfig,
  loadAdapterConfigFromEnv,
  type AdapterConfig,
} from './adapter-config';
