import { type FileHandle, mkdir, open } from "node:fs/promises";
import { dirname } from "node:path";
import { ErrorCode, WordclassError } from "../errors/types.js";
import { formatRecord } from "../lookup/category-lookup.js";
import type { DictionaryRecord } from "../lookup/types.js";

/**
 * Append-only destination for dictionary records.
 */
export interface RecordSink {
  append(record: DictionaryRecord): Promise<void>;
  close(): Promise<void>;
}

/**
 * Keeps records in memory, for tests and dry runs.
 */
export class MemoryRecordSink implements RecordSink {
  readonly records: DictionaryRecord[] = [];
  closed = false;

  async append(record: DictionaryRecord): Promise<void> {
    if (this.closed) {
      throw new WordclassError("Record sink is closed", ErrorCode.SYSTEM_IO_ERROR);
    }
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Records as they would appear in the dictionary file */
  lines(): string[] {
    return this.records.map(formatRecord);
  }
}

/**
 * Appends `word, category` lines to the dictionary file.
 * The file is opened with the append flag and never truncated.
 *
 * @example
 * ```typescript
 * const sink = await FileRecordSink.open('dict.csv');
 * try {
 *   await sink.append({ word: 'cat', category: 'noun' });
 * } finally {
 *   await sink.close();
 * }
 * ```
 */
export class FileRecordSink implements RecordSink {
  private handle: FileHandle | null;

  private constructor(
    readonly path: string,
    handle: FileHandle
  ) {
    this.handle = handle;
  }

  static async open(path: string): Promise<FileRecordSink> {
    try {
      await mkdir(dirname(path), { recursive: true });
      return new FileRecordSink(path, await open(path, "a"));
    } catch (error) {
      throw new WordclassError(`Failed to open dictionary file: ${path}`, ErrorCode.SYSTEM_IO_ERROR, {
        cause: error,
        context: { path },
      });
    }
  }

  async append(record: DictionaryRecord): Promise<void> {
    if (this.handle === null) {
      throw new WordclassError(`Dictionary file is closed: ${this.path}`, ErrorCode.SYSTEM_IO_ERROR, {
        context: { path: this.path },
      });
    }
    try {
      await this.handle.appendFile(`${formatRecord(record)}\n`, "utf-8");
    } catch (error) {
      throw new WordclassError(`Failed to write dictionary file: ${this.path}`, ErrorCode.SYSTEM_IO_ERROR, {
        cause: error,
        context: { path: this.path, word: record.word },
      });
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
