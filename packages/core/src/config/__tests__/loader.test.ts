import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONFIG_DEFAULTS } from "../defaults.js";
import {
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  loadConfig,
  parseEnvConfig,
} from "../loader.js";

describe("findProjectConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "wordclass-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("finds wordclass.toml in the start directory", () => {
    const configPath = path.join(tempDir, "wordclass.toml");
    fs.writeFileSync(configPath, "[quota]\ndailyLimit = 10\n");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });

  it("prefers wordclass.toml over .wordclass.toml", () => {
    const primaryPath = path.join(tempDir, "wordclass.toml");
    fs.writeFileSync(primaryPath, "");
    fs.writeFileSync(path.join(tempDir, ".wordclass.toml"), "");

    expect(findProjectConfig(tempDir)).toBe(primaryPath);
  });

  it("finds .config/wordclass.toml", () => {
    fs.mkdirSync(path.join(tempDir, ".config"));
    const configPath = path.join(tempDir, ".config", "wordclass.toml");
    fs.writeFileSync(configPath, "");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });

  it("walks up directories to find config", () => {
    const childDir = path.join(tempDir, "parent", "child");
    fs.mkdirSync(childDir, { recursive: true });
    const configPath = path.join(tempDir, "parent", "wordclass.toml");
    fs.writeFileSync(configPath, "");

    expect(findProjectConfig(childDir)).toBe(configPath);
  });

  it("ignores a directory that carries the config name", () => {
    fs.mkdirSync(path.join(tempDir, "wordclass.toml"));
    const configPath = path.join(tempDir, ".wordclass.toml");
    fs.writeFileSync(configPath, "");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });
});

describe("parseEnvConfig", () => {
  it("maps WORDCLASS_* variables onto config paths", () => {
    const env = {
      WORDCLASS_API_KEY: "test-key",
      WORDCLASS_BASE_URL: "http://dictionary.test/xml",
      WORDCLASS_DAILY_LIMIT: "250",
      WORDCLASS_LOG_LEVEL: "normal",
    };

    expect(parseEnvConfig(env)).toEqual({
      api: { key: "test-key", baseUrl: "http://dictionary.test/xml" },
      quota: { dailyLimit: 250 },
      logLevel: "normal",
    });
  });

  it("skips empty values", () => {
    expect(parseEnvConfig({ WORDCLASS_API_KEY: "" })).toEqual({});
  });

  it("keeps non-integer limits as strings for validation to reject", () => {
    expect(parseEnvConfig({ WORDCLASS_DAILY_LIMIT: "lots" })).toEqual({
      quota: { dailyLimit: "lots" },
    });
  });
});

describe("deepMerge", () => {
  it("merges nested objects with later sources winning", () => {
    expect(deepMerge({ a: 1, b: { c: 2, d: 3 } }, { b: { d: 4 } })).toEqual({
      a: 1,
      b: { c: 2, d: 4 },
    });
  });

  it("does not let undefined overwrite", () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });

  it("replaces arrays and skips non-objects", () => {
    expect(deepMerge({ a: [1, 2] }, null, "x", { a: [3] })).toEqual({ a: [3] });
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let homeDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "wordclass-project-"));
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), "wordclass-home-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it("applies schema defaults when nothing is configured", () => {
    const result = loadConfig({ cwd: tempDir, homeDir, env: {} });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual({
        api: {
          key: undefined,
          baseUrl: CONFIG_DEFAULTS.api.baseUrl,
          timeout: 15_000,
          maxRetries: 2,
          retryBaseDelay: 1_000,
        },
        quota: { dailyLimit: 1_000, settingsFile: ".wordclass/settings.json" },
        paths: {
          wordList: "testWordList.txt",
          dictionary: "dict.csv",
          resume: "remainingWordList.txt",
          logDir: ".",
        },
        logLevel: "info",
      });
    }
  });

  it("layers global, project, env and overrides in priority order", () => {
    const globalPath = getGlobalConfigPath(homeDir);
    fs.mkdirSync(path.dirname(globalPath), { recursive: true });
    fs.writeFileSync(
      globalPath,
      'logLevel = "warning"\n[api]\nkey = "global-key"\n[quota]\ndailyLimit = 10\n'
    );
    fs.writeFileSync(
      path.join(tempDir, "wordclass.toml"),
      '[quota]\ndailyLimit = 20\n[paths]\ndictionary = "words.csv"\n'
    );

    const result = loadConfig({
      cwd: tempDir,
      homeDir,
      env: { WORDCLASS_API_KEY: "env-key", WORDCLASS_DAILY_LIMIT: "30" },
      overrides: { quota: { dailyLimit: 40 } },
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.api.key).toBe("env-key");
      expect(result.value.quota.dailyLimit).toBe(40);
      expect(result.value.paths.dictionary).toBe("words.csv");
      expect(result.value.paths.wordList).toBe("testWordList.txt");
      expect(result.value.logLevel).toBe("warning");
    }
  });

  it("skips env and project file when asked", () => {
    fs.writeFileSync(path.join(tempDir, "wordclass.toml"), "[quota]\ndailyLimit = 20\n");

    const result = loadConfig({
      cwd: tempDir,
      homeDir,
      env: { WORDCLASS_DAILY_LIMIT: "30" },
      skipEnv: true,
      skipProjectFile: true,
    });

    expect(result.ok && result.value.quota.dailyLimit).toBe(1_000);
  });

  it("reports TOML syntax errors as PARSE_ERROR", () => {
    const configPath = path.join(tempDir, "wordclass.toml");
    fs.writeFileSync(configPath, "[quota\ndailyLimit = ");

    const result = loadConfig({ cwd: tempDir, homeDir, env: {} });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("PARSE_ERROR");
      expect(result.error.path).toBe(configPath);
    }
  });

  it("reports schema violations as VALIDATION_ERROR", () => {
    const result = loadConfig({
      cwd: tempDir,
      homeDir,
      env: { WORDCLASS_DAILY_LIMIT: "lots" },
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("VALIDATION_ERROR");
      expect(result.error.message).toContain("quota.dailyLimit");
    }
  });

  it("rejects an unknown log level", () => {
    const result = loadConfig({ cwd: tempDir, homeDir, env: { WORDCLASS_LOG_LEVEL: "verbose" } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("VALIDATION_ERROR");
      expect(result.error.message).toContain("logLevel");
    }
  });
});
