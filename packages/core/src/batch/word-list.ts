import { readFile } from "node:fs/promises";
import { ErrorCode, WordclassError } from "../errors/types.js";

/**
 * Split word list text into trimmed, non-empty entries.
 */
export function parseWordList(text: string): string[] {
  const words: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "") continue;
    words.push(trimmed);
  }
  return words;
}

/**
 * Read a UTF-8 word list, one word per line.
 *
 * @throws WordclassError SYSTEM_IO_ERROR if the file cannot be read
 */
export async function readWordList(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new WordclassError(`Failed to read word list: ${path}`, ErrorCode.SYSTEM_IO_ERROR, {
      cause: error,
      context: { path },
    });
  }
  return parseWordList(text);
}
