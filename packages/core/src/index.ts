// ============================================
// Wordclass Core
// ============================================

/**
 * @module @wordclass/core
 *
 * Quota-aware lexical category lookup.
 * Provides the daily quota model, the dictionary client, the batch runner,
 * and the error handling, logging and configuration they share.
 */

// ============================================
// Batch Module
// ============================================
export {
  type BatchProgress,
  FileRecordSink,
  FileResumeWriter,
  MemoryRecordSink,
  MemoryResumeWriter,
  parseWordList,
  QuotaAwareBatchLookup,
  type QuotaAwareBatchLookupOptions,
  type RecordSink,
  type ResumeWriter,
  readWordList,
  type RunState,
  type RunSummary,
} from "./batch/index.js";

// ============================================
// Config Module
// ============================================
export {
  type ApiConfig,
  ApiConfigSchema,
  CONFIG_DEFAULTS,
  type Config,
  type ConfigDefaults,
  type ConfigError,
  type ConfigErrorCode,
  ConfigSchema,
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  type LoadConfigOptions,
  LogLevelSchema,
  loadConfig,
  type PartialConfig,
  type PathsConfig,
  PathsConfigSchema,
  parseEnvConfig,
  type QuotaConfig,
  QuotaConfigSchema,
} from "./config/index.js";

// ============================================
// Errors Module
// ============================================
export {
  AbortError,
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  type RetryOptions,
  toWordclassError,
  WordclassError,
  type WordclassErrorOptions,
  withRetry,
  withTimeout,
} from "./errors/index.js";

// ============================================
// Logger Module
// ============================================
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  CountingTransport,
  type CreateLoggerOptions,
  createLogger,
  FileTransport,
  type FileTransportOptions,
  formatLine,
  formatMessage,
  formatSeverityTag,
  LOG_LEVEL_LABELS,
  LOG_LEVEL_PRIORITY,
  type LogEntry,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
  logFileName,
  logFilePath,
} from "./logger/index.js";

// ============================================
// Lookup Module
// ============================================
export {
  CategoryLookup,
  type CategoryLookupOptions,
  type DictionaryClient,
  type DictionaryRecord,
  findFirstElementText,
  firstToken,
  formatRecord,
  getDictionaryEntry,
  type LookupFailure,
  type LookupOutcome,
  type LookupSuccess,
  MerriamWebsterClient,
  type MerriamWebsterClientOptions,
} from "./lookup/index.js";

// ============================================
// Quota Module
// ============================================
export {
  canCallApi,
  createQuotaState,
  isLaterDay,
  JsonSettingsStore,
  MemorySettingsStore,
  QUOTA_SETTING_KEYS,
  type QuotaState,
  QuotaStore,
  recordApiCall,
  remainingCalls,
  type SettingsStore,
  type SettingValue,
} from "./quota/index.js";
