/**
 * Configuration Module
 *
 * Re-exports all public APIs from the config module.
 */

export {
  loadConfig,
  isLiveMode,
  applyLoggingConfig,
  configSchema,
  ALL_FEATURES,
  NO_FEATURES,
  AUTH_STRATEGIES,
  DEFAULT_CONFIG,
  type AuthStrategy,
  type LoadConfigOptions,
  type ProbeConfig,
  type ProbeConfigInput,
  type UserAuthConfig,
  type ObjectStorageConfig,
  type ObjectStorageApiConfig,
  type ImagesConfig,
} from './settings.js'
