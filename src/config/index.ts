/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_STATUS_INTERVAL_MS, deepMerge } from "./defaults";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
} from "./loader";
// Resolver
export { getSourceRoots, resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
