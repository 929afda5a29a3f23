/**
 * CLI Context
 *
 * Everything a command touches outside its own arguments: working
 * directory, environment, output streams, prompts and the dictionary
 * client. Tests swap in fakes; the binary uses `createDefaultContext()`.
 *
 * @module cli/context
 */

import * as os from "node:os";
import * as path from "node:path";
import { confirm } from "@inquirer/prompts";
import {
  type ApiConfig,
  type Config,
  type DictionaryClient,
  ErrorCode,
  JsonSettingsStore,
  type LoadConfigOptions,
  loadConfig,
  MerriamWebsterClient,
  QuotaStore,
  WordclassError,
} from "@wordclass/core";
import { Chalk, type ChalkInstance } from "chalk";

export interface CliContext {
  cwd: string;
  homeDir: string;
  env: NodeJS.ProcessEnv;
  /** Write a line to standard output */
  stdout: (line: string) => void;
  /** Write a line to standard error */
  stderr: (line: string) => void;
  /** Colored output for banners and summaries */
  chalk: ChalkInstance;
  /** Ask a yes/no question */
  confirm: (message: string) => Promise<boolean>;
  /** Build the dictionary client for an API configuration with a key */
  createClient: (api: ApiConfig & { key: string }) => DictionaryClient;
  /** Clock for quota checks and log file names */
  now: () => Date;
  /** Aborted on SIGINT */
  signal?: AbortSignal;
}

function colorsEnabled(env: NodeJS.ProcessEnv): boolean {
  if (env.NO_COLOR !== undefined || env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

export function createDefaultContext(signal?: AbortSignal): CliContext {
  return {
    cwd: process.cwd(),
    homeDir: os.homedir(),
    env: process.env,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    chalk: new Chalk({ level: colorsEnabled(process.env) ? 1 : 0 }),
    confirm: (message) => confirm({ message, default: true }, { signal }),
    createClient: (api) =>
      new MerriamWebsterClient({ apiKey: api.key, baseUrl: api.baseUrl, timeout: api.timeout }),
    now: () => new Date(),
    signal,
  };
}

/**
 * Load layered configuration for a command.
 *
 * @throws WordclassError CONFIG_PARSE_ERROR or CONFIG_INVALID
 */
export function loadCliConfig(ctx: CliContext, overrides?: LoadConfigOptions["overrides"]): Config {
  const result = loadConfig({ cwd: ctx.cwd, homeDir: ctx.homeDir, env: ctx.env, overrides });
  if (!result.ok) {
    const code = result.error.code === "VALIDATION_ERROR" ? ErrorCode.CONFIG_INVALID : ErrorCode.CONFIG_PARSE_ERROR;
    throw new WordclassError(result.error.message, code, { cause: result.error.cause });
  }
  return result.value;
}

/**
 * Narrow an API configuration to one with a key.
 *
 * @throws WordclassError CONFIG_INVALID when no key is configured
 */
export function requireApiKey(api: ApiConfig): ApiConfig & { key: string } {
  const { key } = api;
  if (key === undefined) {
    throw new WordclassError(
      "No API key configured. Pass --api-key, set WORDCLASS_API_KEY, or add api.key to wordclass.toml.",
      ErrorCode.CONFIG_INVALID
    );
  }
  return { ...api, key };
}

/**
 * Resolve a configured path against the working directory.
 */
export function resolvePath(ctx: CliContext, target: string): string {
  return path.resolve(ctx.cwd, target);
}

/**
 * Open the quota backed by the configured settings file.
 */
export async function openQuotaStore(ctx: CliContext, config: Config): Promise<QuotaStore> {
  const settings = await JsonSettingsStore.open(resolvePath(ctx, config.quota.settingsFile));
  return new QuotaStore(settings, config.quota.dailyLimit);
}
