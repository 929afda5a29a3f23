#!/usr/bin/env node
import { closeDefaultPool } from "@wordclass/shared";
import { CommanderError } from "commander";
import { EXIT_CODES } from "./commands/exit-codes.js";
import { createDefaultContext } from "./context.js";
import { createProgram } from "./program.js";

// ============================================
// Graceful Shutdown Setup
// ============================================

const controller = new AbortController();

process.once("SIGINT", () => {
  console.error("\nReceived SIGINT, shutting down...");
  controller.abort();
});

const program = createProgram(
  () => createDefaultContext(controller.signal),
  (code) => {
    process.exitCode = code;
  }
);

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (!(error instanceof CommanderError)) {
    throw error;
  }
  // --help and --version exit with 0
  process.exitCode = error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
} finally {
  await closeDefaultPool();
}
