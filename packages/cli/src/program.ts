import { Command } from "commander";
import { createLookupCommand } from "./commands/lookup.js";
import { createQuotaCommand } from "./commands/quota.js";
import { createRunCommand } from "./commands/run.js";
import type { ExitCode } from "./commands/exit-codes.js";
import type { CliContext } from "./context.js";
import { version } from "./version.js";

/**
 * Throw CommanderError instead of exiting, on every level of the tree.
 * addCommand does not pass settings down, so each command is set directly.
 */
function throwOnExit(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) {
    throwOnExit(sub);
  }
}

/**
 * Build the `wordclass` program. `run` is the default command.
 * Parse errors, --help and --version throw CommanderError.
 *
 * @param getContext - Called once per command invocation
 * @param onExit - Receives the command's exit code
 */
export function createProgram(getContext: () => CliContext, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name("wordclass")
    .description("Look up the lexical category of every word in a list, within a daily API quota")
    .version(version);

  program.addCommand(createRunCommand(getContext, onExit), { isDefault: true });
  program.addCommand(createLookupCommand(getContext, onExit));
  program.addCommand(createQuotaCommand(getContext, onExit));
  throwOnExit(program);

  return program;
}
