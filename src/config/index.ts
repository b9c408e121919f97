/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `crag config` commands.
 */

// Schema and types
export { ConfigSchema, PartialConfigSchema } from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  mergeConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
} from './loader.js';

// Paths
export { getHomeDir, getDbPath, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
