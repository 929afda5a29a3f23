/**
 * Lookup Command
 *
 * One-off category lookup for a single word. Counts against the daily
 * quota like any other call.
 *
 * @module cli/commands/lookup
 */

import { CategoryLookup, getDictionaryEntry, type LookupFailure, toWordclassError } from "@wordclass/core";
import { Command } from "commander";
import { type CliContext, loadCliConfig, openQuotaStore, requireApiKey } from "../context.js";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";

export interface LookupCommandOptions {
  apiKey?: string;
}

function describeFailure(failure: LookupFailure): string {
  switch (failure.kind) {
    case "not-found":
      return `Could not find category for "${failure.word}".`;
    case "quota-exceeded":
      return `API Call Limit reached. Cannot call API again until tomorrow. Sorry! (limit: ${failure.quota.dailyLimit})`;
    case "fatal":
      return failure.error.message;
  }
}

/**
 * Execute the lookup command
 *
 * Prints `word, category` on success.
 */
export async function executeLookupCommand(
  word: string,
  options: LookupCommandOptions,
  ctx: CliContext
): Promise<ExitCode> {
  try {
    const config = loadCliConfig(ctx, { api: { key: options.apiKey } });
    const api = requireApiKey(config.api);
    const quotaStore = await openQuotaStore(ctx, config);
    const lookup = new CategoryLookup({
      client: ctx.createClient(api),
      retry: { maxRetries: api.maxRetries, baseDelay: api.retryBaseDelay },
      now: ctx.now,
      signal: ctx.signal,
    });

    const result = await getDictionaryEntry(word, lookup, quotaStore);
    if (result.ok) {
      ctx.stdout(result.value);
      return EXIT_CODES.SUCCESS;
    }
    ctx.stderr(ctx.chalk.red(describeFailure(result.error)));
    return ctx.signal?.aborted ? EXIT_CODES.INTERRUPTED : EXIT_CODES.ERROR;
  } catch (error) {
    ctx.stderr(ctx.chalk.red(`✗ ${toWordclassError(error).message}`));
    return ExitCodeMapper.fromException(error);
  }
}

export function createLookupCommand(getContext: () => CliContext, onExit: (code: ExitCode) => void): Command {
  return new Command("lookup")
    .description("Look up the lexical category of a single word")
    .argument("<word>", "Word to look up")
    .option("-k, --api-key <key>", "Dictionary API key")
    .action(async (word: string, options: LookupCommandOptions) => {
      onExit(await executeLookupCommand(word, options, getContext()));
    });
}
