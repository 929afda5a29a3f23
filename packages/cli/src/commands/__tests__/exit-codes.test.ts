/**
 * Exit Code Tests
 *
 * @module cli/commands/__tests__/exit-codes.test
 */

import { AbortError, ErrorCode, WordclassError } from "@wordclass/core";
import { describe, expect, it } from "vitest";

import { EXIT_CODES, ExitCodeMapper } from "../exit-codes.js";

describe("EXIT_CODES", () => {
  it("should follow Unix conventions", () => {
    expect(EXIT_CODES).toEqual({ SUCCESS: 0, ERROR: 1, USAGE_ERROR: 2, INTERRUPTED: 130 });
  });
});

describe("ExitCodeMapper", () => {
  describe("fromRunState", () => {
    it("should treat a quota stop as success", () => {
      expect(ExitCodeMapper.fromRunState("completed")).toBe(EXIT_CODES.SUCCESS);
      expect(ExitCodeMapper.fromRunState("quota-exhausted")).toBe(EXIT_CODES.SUCCESS);
    });

    it("should return ERROR for an aborted run", () => {
      expect(ExitCodeMapper.fromRunState("aborted")).toBe(EXIT_CODES.ERROR);
    });
  });

  describe("fromException", () => {
    it("should return USAGE_ERROR for configuration errors", () => {
      for (const code of [ErrorCode.CONFIG_INVALID, ErrorCode.CONFIG_NOT_FOUND, ErrorCode.CONFIG_PARSE_ERROR]) {
        expect(ExitCodeMapper.fromException(new WordclassError("bad", code))).toBe(EXIT_CODES.USAGE_ERROR);
      }
    });

    it("should return INTERRUPTED for aborts and closed prompts", () => {
      expect(ExitCodeMapper.fromException(new AbortError())).toBe(EXIT_CODES.INTERRUPTED);

      const closed = new Error("User force closed the prompt");
      closed.name = "ExitPromptError";
      expect(ExitCodeMapper.fromException(closed)).toBe(EXIT_CODES.INTERRUPTED);
    });

    it("should return ERROR for everything else", () => {
      expect(ExitCodeMapper.fromException(new WordclassError("io", ErrorCode.SYSTEM_IO_ERROR))).toBe(
        EXIT_CODES.ERROR
      );
      expect(ExitCodeMapper.fromException("string error")).toBe(EXIT_CODES.ERROR);
    });
  });
});
