import { z } from "zod";
import { CONFIG_DEFAULTS } from "./defaults.js";

// ============================================
// Dictionary API
// ============================================

export const ApiConfigSchema = z.object({
  key: z.string().min(1).optional(),
  baseUrl: z.string().url().optional().default(CONFIG_DEFAULTS.api.baseUrl),
  timeout: z.number().int().positive().optional().default(CONFIG_DEFAULTS.api.timeout),
  maxRetries: z.number().int().min(0).optional().default(CONFIG_DEFAULTS.api.maxRetries),
  retryBaseDelay: z.number().int().min(0).optional().default(CONFIG_DEFAULTS.api.retryBaseDelay),
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

// ============================================
// Quota
// ============================================

export const QuotaConfigSchema = z.object({
  dailyLimit: z.number().int().positive().optional().default(CONFIG_DEFAULTS.quota.dailyLimit),
  settingsFile: z.string().min(1).optional().default(CONFIG_DEFAULTS.quota.settingsFile),
});

export type QuotaConfig = z.infer<typeof QuotaConfigSchema>;

// ============================================
// Paths
// ============================================

export const PathsConfigSchema = z.object({
  wordList: z.string().min(1).optional().default(CONFIG_DEFAULTS.paths.wordList),
  dictionary: z.string().min(1).optional().default(CONFIG_DEFAULTS.paths.dictionary),
  resume: z.string().min(1).optional().default(CONFIG_DEFAULTS.paths.resume),
  logDir: z.string().min(1).optional().default(CONFIG_DEFAULTS.paths.logDir),
});

export type PathsConfig = z.infer<typeof PathsConfigSchema>;

// ============================================
// Log Level Schema
// ============================================

export const LogLevelSchema = z.enum(["info", "normal", "warning", "error"]);

// ============================================
// Complete Configuration Schema
// ============================================

export const ConfigSchema = z.object({
  api: ApiConfigSchema.optional().default({}),
  quota: QuotaConfigSchema.optional().default({}),
  paths: PathsConfigSchema.optional().default({}),
  logLevel: LogLevelSchema.optional().default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config type for user input (before defaults are applied)
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
