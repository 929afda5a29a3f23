/**
 * Exit Codes
 *
 * Process exit codes for the wordclass CLI, following Unix conventions:
 * - 0: Success (including a run stopped by the daily quota)
 * - 1: General error
 * - 2: Usage or configuration error
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/commands/exit-codes
 */

import { ErrorCode, type RunState, WordclassError } from "@wordclass/core";

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage/argument or configuration error */
  USAGE_ERROR: 2,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Error codes the user fixes by changing arguments or configuration */
const USAGE_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.CONFIG_INVALID,
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.CONFIG_PARSE_ERROR,
]);

/** Our AbortError plus the errors @inquirer/prompts throws on Ctrl+C or abort */
const INTERRUPT_ERROR_NAMES: ReadonlySet<string> = new Set(["AbortError", "AbortPromptError", "ExitPromptError"]);

/**
 * Maps run outcomes and thrown errors to process exit codes.
 *
 * @example
 * ```typescript
 * const summary = await runner.run(words, sink);
 * process.exitCode = ExitCodeMapper.fromRunState(summary.state);
 * ```
 */
// biome-ignore lint/complexity/noStaticOnlyClass: ExitCodeMapper groups the exit code mappings
export class ExitCodeMapper {
  /**
   * Running out of quota is an expected stop, not a failure.
   */
  static fromRunState(state: RunState): ExitCode {
    switch (state) {
      case "completed":
      case "quota-exhausted":
        return EXIT_CODES.SUCCESS;
      case "aborted":
        return EXIT_CODES.ERROR;
    }
  }

  static fromException(error: unknown): ExitCode {
    if (error instanceof Error && INTERRUPT_ERROR_NAMES.has(error.name)) {
      return EXIT_CODES.INTERRUPTED;
    }

    if (error instanceof WordclassError && USAGE_ERROR_CODES.has(error.code)) {
      return EXIT_CODES.USAGE_ERROR;
    }

    return EXIT_CODES.ERROR;
  }
}
