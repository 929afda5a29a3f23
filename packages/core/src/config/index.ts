// ============================================
// Config Module Barrel Export
// ============================================

export { CONFIG_DEFAULTS, type ConfigDefaults } from "./defaults.js";
export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type ApiConfig,
  ApiConfigSchema,
  type Config,
  ConfigSchema,
  LogLevelSchema,
  type PartialConfig,
  type PathsConfig,
  PathsConfigSchema,
  type QuotaConfig,
  QuotaConfigSchema,
} from "./schema.js";
