/**
 * Vitest Global Setup
 *
 * Keeps log output deterministic across test files.
 */
import { afterEach, beforeAll, vi } from "vitest";

process.setMaxListeners(0);

beforeAll(() => {
  // Config layers read WORDCLASS_* variables; tests pass overrides explicitly
  for (const key of Object.keys(process.env)) {
    if (key.startsWith("WORDCLASS_")) {
      delete process.env[key];
    }
  }
  process.env.NO_COLOR = "1";
});

afterEach(() => {
  vi.useRealTimers();
});
