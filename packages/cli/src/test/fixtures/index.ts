/**
 * Test fixtures for CLI commands: a scripted dictionary and a CliContext
 * that captures output instead of printing it.
 */

import * as path from "node:path";
import type { ApiConfig, DictionaryClient } from "@wordclass/core";
import { Chalk } from "chalk";
import type { CliContext } from "../../context.js";

export const FIXED_NOW = new Date(2026, 9, 19, 12, 0, 0);

/**
 * Dictionary that answers from a fixed table and records every request.
 */
export class ScriptedDictionary implements DictionaryClient {
  readonly calls: string[] = [];
  /** API configurations the client was created with */
  readonly configs: ApiConfig[] = [];

  constructor(private readonly labels: Record<string, string>) {}

  async fetchFunctionalLabel(word: string): Promise<string | null> {
    this.calls.push(word);
    return this.labels[word] ?? null;
  }
}

export interface TestContext extends CliContext {
  out: string[];
  err: string[];
  prompts: string[];
  dictionary: ScriptedDictionary;
}

export interface TestContextOptions {
  /** Working directory; the home directory is a subfolder of it */
  cwd: string;
  env?: NodeJS.ProcessEnv;
  labels?: Record<string, string>;
  /** Answer to confirmation prompts, or an error to throw from them */
  confirm?: boolean | Error;
  signal?: AbortSignal;
}

export function createTestContext(options: TestContextOptions): TestContext {
  const out: string[] = [];
  const err: string[] = [];
  const prompts: string[] = [];
  const dictionary = new ScriptedDictionary(options.labels ?? {});
  const answer = options.confirm ?? true;

  return {
    cwd: options.cwd,
    homeDir: path.join(options.cwd, "home"),
    env: options.env ?? {},
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    chalk: new Chalk({ level: 0 }),
    confirm: async (message) => {
      prompts.push(message);
      if (answer instanceof Error) {
        throw answer;
      }
      return answer;
    },
    createClient: (api) => {
      dictionary.configs.push(api);
      return dictionary;
    },
    now: () => FIXED_NOW,
    signal: options.signal,
    out,
    err,
    prompts,
    dictionary,
  };
}
