/**
 * Config module exports.
 */

export type { AgentConfigFile, MergedConfig, KeywordCategory, LogLevel } from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  agentConfigFileSchema,
  isLogLevel,
} from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
