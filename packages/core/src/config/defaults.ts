/**
 * Centralized configuration defaults.
 * All hardcoded values should be defined here and imported elsewhere.
 */

export const CONFIG_DEFAULTS = {
  api: {
    /** Merriam-Webster Collegiate XML endpoint; the word is appended as a path segment */
    baseUrl: "http://www.dictionaryapi.com/api/v1/references/collegiate/xml",
    /** Per-request timeout in milliseconds */
    timeout: 15_000,
    /** Retries for transient transport failures before a lookup becomes fatal */
    maxRetries: 2,
    /** First backoff delay in milliseconds; doubles per retry */
    retryBaseDelay: 1_000,
  },
  quota: {
    /** Free-tier daily call allowance */
    dailyLimit: 1_000,
    /** Where quota counters persist between runs */
    settingsFile: ".wordclass/settings.json",
  },
  paths: {
    wordList: "testWordList.txt",
    dictionary: "dict.csv",
    resume: "remainingWordList.txt",
    logDir: ".",
  },
} as const;

export type ConfigDefaults = typeof CONFIG_DEFAULTS;
