import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../../errors/types.js";
import { parseWordList, readWordList } from "../word-list.js";

describe("parseWordList", () => {
  it("trims lines and drops blank ones", () => {
    expect(parseWordList("cat\n  dog  \n\n\t\nbird\n")).toEqual(["cat", "dog", "bird"]);
  });

  it("accepts CRLF line endings", () => {
    expect(parseWordList("cat\r\ndog\r\n")).toEqual(["cat", "dog"]);
  });

  it("keeps duplicates and order", () => {
    expect(parseWordList("b\na\nb")).toEqual(["b", "a", "b"]);
  });
});

describe("readWordList", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "wordclass-words-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("reads a UTF-8 file", async () => {
    const file = path.join(tempDir, "words.txt");
    fs.writeFileSync(file, "café\nnaïve\n", "utf-8");

    await expect(readWordList(file)).resolves.toEqual(["café", "naïve"]);
  });

  it("fails with an I/O error for a missing file", async () => {
    await expect(readWordList(path.join(tempDir, "missing.txt"))).rejects.toMatchObject({
      code: ErrorCode.SYSTEM_IO_ERROR,
    });
  });
});
