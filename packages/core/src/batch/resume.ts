import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ErrorCode, WordclassError } from "../errors/types.js";

/**
 * Destination for words left unprocessed when the quota runs out.
 */
export interface ResumeWriter {
  /** Where the words go, for log messages */
  readonly location: string;
  write(words: readonly string[]): Promise<void>;
}

export class MemoryResumeWriter implements ResumeWriter {
  readonly location = "memory";
  words: string[] | null = null;

  async write(words: readonly string[]): Promise<void> {
    this.words = [...words];
  }
}

/**
 * Overwrites the resume file with one word per line, ready to be used
 * as the next run's word list.
 */
export class FileResumeWriter implements ResumeWriter {
  constructor(readonly location: string) {}

  async write(words: readonly string[]): Promise<void> {
    const body = words.length === 0 ? "" : `${words.join("\n")}\n`;
    try {
      await mkdir(dirname(this.location), { recursive: true });
      await writeFile(this.location, body, "utf-8");
    } catch (error) {
      throw new WordclassError(`Failed to write resume file: ${this.location}`, ErrorCode.SYSTEM_IO_ERROR, {
        cause: error,
        context: { path: this.location, words: words.length },
      });
    }
  }
}
