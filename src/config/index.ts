/**
 * Configuration module exports
 */

// Defaults
export {
  DEFAULT_CONFIG,
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_KEEP_LAST_N,
  DEFAULT_QUOTA_BYTES,
  deepMerge,
  MIN_INTERVAL_SECONDS,
} from "./defaults";
// Environment
export { ENV_PREFIX, readEnvConfig } from "./env";
// Inline flags
export {
  buildInlineConfig,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findConfigFile,
  type LoadOptions,
  loadConfig,
  parseConfigContent,
  readConfigFile,
} from "./loader";
// Preferences
export {
  emptyPreferences,
  loadPreferences,
  PreferencesFile,
  preferencesLayer,
  savePreferences,
} from "./preferences";
// Resolver
export { applyDerivedDefaults, normalizeSizes, resolvePaths } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
