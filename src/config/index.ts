/**
 * Config module exports.
 */

export type { PackConfigFile, MergedConfig, LogLevel } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, packConfigFileSchema } from './config-schema.js';
export { ConfigLoader, CONFIG_FILE_NAME, createConfigLoader, loadConfig } from './config-loader.js';
