import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestContext, FIXED_NOW } from "../../test/fixtures/index.js";
import { EXIT_CODES } from "../exit-codes.js";
import { executeLookupCommand } from "../lookup.js";

describe("executeLookupCommand", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "wordclass-lookup-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const settingsPath = () => path.join(tempDir, ".wordclass", "settings.json");

  it("prints the dictionary line for a known word", async () => {
    const ctx = createTestContext({
      cwd: tempDir,
      labels: { mathematics: "noun plural but singular in construction" },
    });

    const code = await executeLookupCommand("mathematics", { apiKey: "test-key" }, ctx);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(ctx.out).toEqual(["mathematics, noun"]);
  });

  it("counts the call against the quota", async () => {
    const ctx = createTestContext({ cwd: tempDir, labels: { cat: "noun" } });

    await executeLookupCommand("cat", { apiKey: "test-key" }, ctx);

    expect(JSON.parse(fs.readFileSync(settingsPath(), "utf-8"))).toEqual({
      lastAccess: FIXED_NOW.toISOString(),
      numApiCallsMadeSinceLastAccess: 1,
    });
  });

  it("exits 1 when the word has no entry", async () => {
    const ctx = createTestContext({ cwd: tempDir });

    const code = await executeLookupCommand("qwzx", { apiKey: "test-key" }, ctx);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(ctx.err).toEqual(['Could not find category for "qwzx".']);
  });

  it("exits 1 without calling the API when the quota is spent", async () => {
    fs.mkdirSync(path.dirname(settingsPath()), { recursive: true });
    fs.writeFileSync(
      settingsPath(),
      JSON.stringify({
        lastAccess: FIXED_NOW.toISOString(),
        numApiCallsMadeSinceLastAccess: 2,
        apiCallLimit: 2,
      })
    );
    const ctx = createTestContext({ cwd: tempDir, labels: { cat: "noun" } });

    const code = await executeLookupCommand("cat", { apiKey: "test-key" }, ctx);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(ctx.dictionary.calls).toEqual([]);
    expect(ctx.err).toEqual([
      "API Call Limit reached. Cannot call API again until tomorrow. Sorry! (limit: 2)",
    ]);
  });

  it("needs an API key", async () => {
    const ctx = createTestContext({ cwd: tempDir });

    const code = await executeLookupCommand("cat", {}, ctx);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
  });
});
