import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../../errors/types.js";
import { FileResumeWriter, MemoryResumeWriter } from "../resume.js";
import { FileRecordSink, MemoryRecordSink } from "../sink.js";

describe("MemoryRecordSink", () => {
  it("collects records and renders lines", async () => {
    const sink = new MemoryRecordSink();
    await sink.append({ word: "cat", category: "noun" });
    await sink.append({ word: "run", category: "verb" });

    expect(sink.lines()).toEqual(["cat, noun", "run, verb"]);
  });

  it("rejects appends after close", async () => {
    const sink = new MemoryRecordSink();
    await sink.close();

    await expect(sink.append({ word: "cat", category: "noun" })).rejects.toMatchObject({
      code: ErrorCode.SYSTEM_IO_ERROR,
    });
  });
});

describe("file outputs", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "wordclass-sink-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("FileRecordSink appends and never truncates", async () => {
    const file = path.join(tempDir, "dict.csv");
    fs.writeFileSync(file, "apple, noun\n");

    const first = await FileRecordSink.open(file);
    await first.append({ word: "cat", category: "noun" });
    await first.close();

    const second = await FileRecordSink.open(file);
    await second.append({ word: "run", category: "verb" });
    await second.close();

    expect(fs.readFileSync(file, "utf-8")).toBe("apple, noun\ncat, noun\nrun, verb\n");
  });

  it("FileRecordSink creates missing directories", async () => {
    const file = path.join(tempDir, "out", "dict.csv");

    const sink = await FileRecordSink.open(file);
    await sink.append({ word: "cat", category: "noun" });
    await sink.close();

    expect(fs.readFileSync(file, "utf-8")).toBe("cat, noun\n");
  });

  it("FileRecordSink rejects appends after close and tolerates a second close", async () => {
    const sink = await FileRecordSink.open(path.join(tempDir, "dict.csv"));
    await sink.close();
    await sink.close();

    await expect(sink.append({ word: "cat", category: "noun" })).rejects.toMatchObject({
      code: ErrorCode.SYSTEM_IO_ERROR,
    });
  });

  it("FileResumeWriter overwrites the resume file", async () => {
    const file = path.join(tempDir, "remainingWordList.txt");
    fs.writeFileSync(file, "stale\nwords\nhere\n");

    await new FileResumeWriter(file).write(["dog", "bird"]);

    expect(fs.readFileSync(file, "utf-8")).toBe("dog\nbird\n");
  });

  it("MemoryResumeWriter keeps a copy of the words", async () => {
    const words = ["dog"];
    const writer = new MemoryResumeWriter();
    await writer.write(words);
    words.push("bird");

    expect(writer.words).toEqual(["dog"]);
  });
});
