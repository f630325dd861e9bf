/**
 * Config module exports.
 */

export type { HostConfigFile, LogLevel, MergedConfig } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, hostConfigFileSchema } from './config-schema.js';
export {
  ConfigLoader,
  ConfigError,
  CONFIG_FILE_NAME,
  createConfigLoader,
  loadConfig,
  type ConfigLoaderOptions,
} from './config-loader.js';
