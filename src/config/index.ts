/**
 * Configuration module exports
 */

// Defaults
export { CONFIG_VERSION, createDefaultConfig, deepMerge } from "./defaults";
// Inline flags
export {
  buildInlineConfig,
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findConfigFile,
  loadConfig,
  loadConfigFile,
  type LoadConfigOptions,
} from "./loader";
// Resolver
export { getEnvironment, lookupUserHome, resolvePaths } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
