/**
 * Configuration module - config file discovery, env overrides and loading
 */

export * from './paths.js';
export { ConfigError } from './errors.js';
export { envVarNameFromPath, applyConsoleConfigEnvOverrides } from './env/config-env-overrides.js';
export {
  loadConsoleConfig,
  readConfigFile,
  mergeRawConfig,
  type LoadedConsoleConfig,
} from './loadConfig.js';
