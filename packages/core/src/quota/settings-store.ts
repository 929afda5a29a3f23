import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { ErrorCode, WordclassError } from "../errors/types.js";
import type { SettingsStore, SettingValue } from "./types.js";

const SettingsFileSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * In-memory settings; `save()` only counts calls.
 */
export class MemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, SettingValue>();
  saveCount = 0;

  constructor(initial: Record<string, SettingValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string): SettingValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: SettingValue): void {
    this.values.set(key, value);
  }

  async save(): Promise<void> {
    this.saveCount += 1;
  }

  toJSON(): Record<string, SettingValue> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Settings kept in a flat JSON object on disk.
 *
 * @example
 * ```typescript
 * const settings = await JsonSettingsStore.open('.wordclass/settings.json');
 * settings.set('apiCallLimit', 500);
 * await settings.save();
 * ```
 */
export class JsonSettingsStore implements SettingsStore {
  private readonly values: Map<string, SettingValue>;

  private constructor(
    readonly path: string,
    initial: Record<string, SettingValue>
  ) {
    this.values = new Map(Object.entries(initial));
  }

  /**
   * Load the file at `path`. A missing file yields an empty store.
   *
   * @throws WordclassError CONFIG_PARSE_ERROR if the file is not a flat JSON object
   * @throws WordclassError SYSTEM_IO_ERROR if the file cannot be read
   */
  static async open(path: string): Promise<JsonSettingsStore> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return new JsonSettingsStore(path, {});
      }
      throw new WordclassError(`Failed to read settings file: ${path}`, ErrorCode.SYSTEM_IO_ERROR, {
        cause: error,
        context: { path },
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new WordclassError(`Settings file is not valid JSON: ${path}`, ErrorCode.CONFIG_PARSE_ERROR, {
        cause: error,
        context: { path },
      });
    }

    const parsed = SettingsFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new WordclassError(
        `Settings file must be a flat JSON object: ${path}`,
        ErrorCode.CONFIG_PARSE_ERROR,
        { cause: parsed.error, context: { path } }
      );
    }
    return new JsonSettingsStore(path, parsed.data);
  }

  get(key: string): SettingValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: SettingValue): void {
    this.values.set(key, value);
  }

  async save(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, `${JSON.stringify(Object.fromEntries(this.values), null, 2)}\n`, "utf-8");
    } catch (error) {
      throw new WordclassError(`Failed to save settings file: ${this.path}`, ErrorCode.SYSTEM_IO_ERROR, {
        cause: error,
        context: { path: this.path },
      });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
