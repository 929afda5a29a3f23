/**
 * Run Command
 *
 * Builds the dictionary: reads the word list, looks up each word's
 * category while the daily quota lasts, and appends `word, category`
 * lines to the dictionary file.
 *
 * Usage:
 * - `wordclass` / `wordclass run` - Show the banner, confirm, then run
 * - `wordclass run --yes` - Skip the confirmation prompt
 * - `wordclass run --limit 50` - Use a lower daily limit for this run only
 *
 * @module cli/commands/run
 */

import { mkdir } from "node:fs/promises";
import {
  CategoryLookup,
  type Config,
  ConsoleTransport,
  CountingTransport,
  createLogger,
  FileRecordSink,
  FileResumeWriter,
  logFilePath,
  type PartialConfig,
  QuotaAwareBatchLookup,
  type RunSummary,
  readWordList,
  remainingCalls,
  toWordclassError,
} from "@wordclass/core";
import { Command, InvalidArgumentError } from "commander";
import { type CliContext, loadCliConfig, openQuotaStore, requireApiKey, resolvePath } from "../context.js";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";

// =============================================================================
// Types
// =============================================================================

export interface RunCommandOptions {
  wordList?: string;
  dictionary?: string;
  resumeFile?: string;
  logDir?: string;
  apiKey?: string;
  /** Daily limit for this run only */
  limit?: number;
  /** Skip the confirmation prompt */
  yes?: boolean;
  /** Hide Info lines */
  quiet?: boolean;
}

export interface RunCommandResult {
  exitCode: ExitCode;
  summary?: RunSummary;
  /** Log file of this run, once logging has started */
  logFile?: string;
  /** Error-level lines logged during the run */
  errorCount?: number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse a positive integer option value.
 * @throws InvalidArgumentError if value is not a positive integer
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

function toOverrides(options: RunCommandOptions): PartialConfig {
  return {
    api: { key: options.apiKey },
    paths: {
      wordList: options.wordList,
      dictionary: options.dictionary,
      resume: options.resumeFile,
      logDir: options.logDir,
    },
    logLevel: options.quiet ? "normal" : undefined,
  };
}

function printBanner(ctx: CliContext, remaining: number, paths: { wordList: string; dictionary: string; log: string }): void {
  const { chalk } = ctx;
  ctx.stdout(chalk.bold("wordclass"));
  ctx.stdout("=========");
  ctx.stdout(`~~ API Calls Remaining ~~ (For Today): ${chalk.cyan(remaining)}`);
  ctx.stdout("");
  ctx.stdout(`Word List:  ${paths.wordList}`);
  ctx.stdout(`Dictionary: ${paths.dictionary}`);
  ctx.stdout(`Log File:   ${paths.log}`);
  ctx.stdout("");
}

// =============================================================================
// Command Implementation
// =============================================================================

/**
 * Execute the run command
 *
 * @returns Exit code plus the run summary when the run started
 */
export async function executeRunCommand(options: RunCommandOptions, ctx: CliContext): Promise<RunCommandResult> {
  let config: Config;
  let api: ReturnType<typeof requireApiKey>;
  let quotaStore: Awaited<ReturnType<typeof openQuotaStore>>;
  try {
    config = loadCliConfig(ctx, toOverrides(options));
    api = requireApiKey(config.api);
    quotaStore = await openQuotaStore(ctx, config);
  } catch (error) {
    ctx.stderr(ctx.chalk.red(`✗ ${toWordclassError(error).message}`));
    return { exitCode: ExitCodeMapper.fromException(error) };
  }

  const wordListPath = resolvePath(ctx, config.paths.wordList);
  const dictionaryPath = resolvePath(ctx, config.paths.dictionary);
  const logDir = resolvePath(ctx, config.paths.logDir);
  const logFile = logFilePath(logDir, ctx.now());

  const stored = quotaStore.load();
  const quota = options.limit === undefined ? stored : { ...stored, dailyLimit: options.limit };
  printBanner(ctx, remainingCalls(quota, ctx.now()), {
    wordList: wordListPath,
    dictionary: dictionaryPath,
    log: logFile,
  });

  if (!options.yes) {
    try {
      if (!(await ctx.confirm("Begin generating the dictionary?"))) {
        ctx.stdout("Cancelled.");
        return { exitCode: EXIT_CODES.SUCCESS };
      }
    } catch (error) {
      return { exitCode: ExitCodeMapper.fromException(error) };
    }
  }

  try {
    await mkdir(logDir, { recursive: true });
  } catch (error) {
    ctx.stderr(ctx.chalk.red(`✗ Cannot create log directory ${logDir}: ${toWordclassError(error).message}`));
    return { exitCode: EXIT_CODES.ERROR };
  }

  const counter = new CountingTransport();
  const logger = createLogger({
    level: config.logLevel,
    console: false,
    file: {
      path: logFile,
      onError: (error) => ctx.stderr(`Failed to write log file: ${error.message}`),
    },
    transports: [
      new ConsoleTransport({ colors: ctx.chalk.level > 0, stdout: ctx.stdout, stderr: ctx.stderr }),
      counter,
    ],
  });

  logger.normal("Program starting up now.");

  let sink: FileRecordSink | undefined;
  let summary: RunSummary | undefined;
  let exitCode: ExitCode;
  try {
    logger.info(`Loading the word list from <${wordListPath}>.`);
    const words = await readWordList(wordListPath);
    logger.info(`Loading the dictionary from <${dictionaryPath}>.`);
    sink = await FileRecordSink.open(dictionaryPath);

    const runner = new QuotaAwareBatchLookup({
      lookup: new CategoryLookup({
        client: ctx.createClient(api),
        retry: {
          maxRetries: api.maxRetries,
          baseDelay: api.retryBaseDelay,
          onRetry: (error, attempt, delay) =>
            logger.warn(`Retry ${attempt} in ${delay}ms: ${error.message}`),
        },
        now: ctx.now,
        signal: ctx.signal,
      }),
      quotaStore,
      resume: new FileResumeWriter(resolvePath(ctx, config.paths.resume)),
      logger,
      dailyLimit: options.limit,
      now: ctx.now,
    });

    summary = await runner.run(words, sink);

    if (summary.state === "aborted") {
      logger.normal("Saving dictionary to disk and exiting now.");
    } else {
      logger.normal("Finished dictionary.");
      logger.normal("Closed all resources. Program terminating now...");
    }
    exitCode = ExitCodeMapper.fromRunState(summary.state);
  } catch (error) {
    logger.error(toWordclassError(error).message);
    logger.normal("Saving dictionary to disk and exiting now.");
    exitCode = ExitCodeMapper.fromException(error);
  } finally {
    try {
      await sink?.close();
    } catch (error) {
      logger.error(toWordclassError(error).message);
    }
    logger.always(`Finished program with ${counter.count("error")} error(s).`);
    await logger.flush();
    logger.dispose();
  }

  if (ctx.signal?.aborted) {
    exitCode = EXIT_CODES.INTERRUPTED;
  }
  return { exitCode, summary, logFile, errorCount: counter.count("error") };
}

/**
 * Create the run command with all CLI options.
 */
export function createRunCommand(getContext: () => CliContext, onExit: (code: ExitCode) => void): Command {
  return new Command("run")
    .description("Look up every word in the word list and append categories to the dictionary")
    .option("-w, --word-list <path>", "Word list, one word per line")
    .option("-d, --dictionary <path>", "Dictionary file to append to")
    .option("-r, --resume-file <path>", "Where unprocessed words go when the quota runs out")
    .option("--log-dir <dir>", "Directory for the log file")
    .option("-k, --api-key <key>", "Dictionary API key")
    .option("-l, --limit <n>", "Daily call limit for this run only", parsePositiveInt)
    .option("-y, --yes", "Skip the confirmation prompt")
    .option("-q, --quiet", "Hide Info lines")
    .action(async (options: RunCommandOptions) => {
      const result = await executeRunCommand(options, getContext());
      onExit(result.exitCode);
    });
}
