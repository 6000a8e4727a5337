/**
 * Config module exports.
 */

export type { EngineConfig, EngineConfigFile, LogLevel } from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  LOG_LEVELS,
  engineConfigFileSchema,
} from './config-schema.js';
export { ConfigLoader, CONFIG_FILE_NAME, createConfigLoader, loadConfig } from './config-loader.js';
