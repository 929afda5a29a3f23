import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@wordclass/shared";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Home directory holding the global config (default: os.homedir()) */
  homeDir?: string;
  /** Environment to read WORDCLASS_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
}

type PlainObject = Record<string, unknown>;

// ============================================
// findProjectConfig
// ============================================

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["wordclass.toml", ".wordclass.toml", ".config/wordclass.toml"];

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// parseEnvConfig
// ============================================

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, [string, string] | [string]> = {
  WORDCLASS_API_KEY: ["api", "key"],
  WORDCLASS_BASE_URL: ["api", "baseUrl"],
  WORDCLASS_DAILY_LIMIT: ["quota", "dailyLimit"],
  WORDCLASS_LOG_LEVEL: ["logLevel"],
};

/** Config paths whose values are integers */
const NUMERIC_PATHS = new Set(["quota.dailyLimit"]);

/**
 * Coerce string value to appropriate type. Unparsable numbers stay strings
 * so that validation reports them.
 */
function coerceValue(value: string, configPath: readonly string[]): unknown {
  if (NUMERIC_PATHS.has(configPath.join("."))) {
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : value;
  }
  return value;
}

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: PlainObject, configPath: readonly string[], value: unknown): void {
  const [head, ...rest] = configPath;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }

  const existing = obj[head];
  const next: PlainObject = isPlainObject(existing) ? existing : {};
  obj[head] = next;
  setNestedValue(next, rest, value);
}

/**
 * Parse WORDCLASS_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * // With WORDCLASS_DAILY_LIMIT=500 set:
 * parseEnvConfig(); // { quota: { dailyLimit: 500 } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const result: PlainObject = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, configPath, coerceValue(value, configPath));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: unknown[]): PlainObject {
  const result: PlainObject = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? deepMerge(targetValue, sourceValue)
          : sourceValue;
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Get path to global config file (~/.config/wordclass/config.toml)
 */
export function getGlobalConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ".config", "wordclass", "config.toml");
}

/**
 * Read and parse a TOML config file
 */
function readTomlFile(filePath: string): Result<PlainObject, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Err({
      code: "FILE_NOT_FOUND",
      message: `Config file not found: ${filePath}`,
      path: filePath,
    });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Global config: ~/.config/wordclass/config.toml
 * 3. Project config: findProjectConfig()
 * 4. Environment variables (unless skipEnv)
 * 5. CLI overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { quota: { dailyLimit: 50 } } });
 * if (result.ok) {
 *   console.log(result.value.paths.dictionary);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { cwd, homeDir, env, overrides, skipEnv = false, skipProjectFile = false } = options;

  const layers: unknown[] = [];

  // Global config is optional; only a broken one is an error
  const globalResult = readTomlFile(getGlobalConfigPath(homeDir));
  if (globalResult.ok) {
    layers.push(globalResult.value);
  } else if (globalResult.error.code !== "FILE_NOT_FOUND") {
    return globalResult;
  }

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      layers.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    layers.push(parseEnvConfig(env));
  }

  if (overrides) {
    layers.push(overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...layers));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
