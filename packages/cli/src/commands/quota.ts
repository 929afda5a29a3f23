/**
 * Quota Command
 *
 * Usage:
 * - `wordclass quota` - Show today's allowance
 * - `wordclass quota set-limit <n>` - Persist a new daily limit
 * - `wordclass quota reset` - Forget today's usage
 *
 * @module cli/commands/quota
 */

import { isLaterDay, type QuotaState, type QuotaStore, remainingCalls, toWordclassError } from "@wordclass/core";
import { Command } from "commander";
import { type CliContext, loadCliConfig, openQuotaStore } from "../context.js";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";
import { parsePositiveInt } from "./run.js";

/**
 * Human-readable quota status lines.
 */
export function formatQuota(quota: QuotaState, now: Date): string[] {
  const { lastAccess } = quota;
  const usedToday = lastAccess === null || isLaterDay(now, lastAccess) ? 0 : quota.callsMadeToday;
  return [
    `Daily limit:      ${quota.dailyLimit}`,
    `Calls made today: ${usedToday}`,
    `Calls remaining:  ${remainingCalls(quota, now)}`,
    `Last access:      ${lastAccess === null ? "never" : lastAccess.toISOString()}`,
  ];
}

export type QuotaAction =
  | { kind: "show" }
  | { kind: "set-limit"; limit: number }
  | { kind: "reset" };

async function applyAction(action: QuotaAction, store: QuotaStore, ctx: CliContext): Promise<QuotaState> {
  switch (action.kind) {
    case "show":
      return store.load();
    case "set-limit": {
      const quota = await store.setDailyLimit(action.limit);
      ctx.stdout(ctx.chalk.green(`✓ Daily limit set to ${action.limit}`));
      return quota;
    }
    case "reset": {
      const quota = await store.reset();
      ctx.stdout(ctx.chalk.green("✓ Quota usage reset"));
      return quota;
    }
  }
}

/**
 * Execute a quota subcommand
 */
export async function executeQuotaCommand(action: QuotaAction, ctx: CliContext): Promise<ExitCode> {
  try {
    const store = await openQuotaStore(ctx, loadCliConfig(ctx));
    const quota = await applyAction(action, store, ctx);
    for (const line of formatQuota(quota, ctx.now())) {
      ctx.stdout(line);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    ctx.stderr(ctx.chalk.red(`✗ ${toWordclassError(error).message}`));
    return ExitCodeMapper.fromException(error);
  }
}

export function createQuotaCommand(getContext: () => CliContext, onExit: (code: ExitCode) => void): Command {
  const quota = new Command("quota").description("Show or change the daily API call quota");

  quota.action(async () => {
    onExit(await executeQuotaCommand({ kind: "show" }, getContext()));
  });

  quota
    .command("set-limit")
    .description("Persist a new daily call limit")
    .argument("<n>", "Calls per day", parsePositiveInt)
    .action(async (limit: number) => {
      onExit(await executeQuotaCommand({ kind: "set-limit", limit }, getContext()));
    });

  quota
    .command("reset")
    .description("Clear today's call count and last access time")
    .action(async () => {
      onExit(await executeQuotaCommand({ kind: "reset" }, getContext()));
    });

  return quota;
}
