import { Err, Ok, type Result } from "@wordclass/shared";
import { type RetryOptions, withRetry } from "../errors/retry.js";
import { toWordclassError } from "../errors/types.js";
import { canCallApi, recordApiCall } from "../quota/quota.js";
import type { QuotaStore } from "../quota/quota-store.js";
import type { QuotaState } from "../quota/types.js";
import type { DictionaryClient, DictionaryRecord, LookupFailure, LookupOutcome } from "./types.js";

/**
 * First whitespace-delimited token of a functional label.
 *
 * @example
 * ```typescript
 * firstToken('noun plural but singular in construction'); // "noun"
 * ```
 */
export function firstToken(label: string): string {
  return label.trim().split(/\s+/)[0] ?? "";
}

/**
 * Output line for a record: `word, category`.
 */
export function formatRecord(record: DictionaryRecord): string {
  return `${record.word}, ${record.category}`;
}

export interface CategoryLookupOptions {
  client: DictionaryClient;
  /** Backoff for retryable transport failures */
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelay" | "maxDelay" | "onRetry">;
  /** Clock used for quota checks (default: system time) */
  now?: () => Date;
  /** Cancels in-flight requests and pending retries */
  signal?: AbortSignal;
}

/**
 * Looks up a word's lexical category while keeping the daily quota.
 *
 * Quota is checked before the request. A request that got a response
 * counts against the quota, whether or not it carried a label; transport
 * failures do not.
 */
export class CategoryLookup {
  private readonly client: DictionaryClient;
  private readonly retry: CategoryLookupOptions["retry"];
  private readonly now: () => Date;
  private readonly signal?: AbortSignal;

  constructor(options: CategoryLookupOptions) {
    this.client = options.client;
    this.retry = options.retry;
    this.now = options.now ?? (() => new Date());
    this.signal = options.signal;
  }

  async lookupCategory(word: string, quota: QuotaState): Promise<LookupOutcome> {
    if (!canCallApi(quota, this.now())) {
      return Err<LookupFailure>({ kind: "quota-exceeded", word, quota });
    }

    let label: string | null;
    try {
      label = await withRetry(() => this.client.fetchFunctionalLabel(word, this.signal), {
        ...this.retry,
        signal: this.signal,
      });
    } catch (error) {
      return Err<LookupFailure>({ kind: "fatal", word, quota, error: toWordclassError(error) });
    }

    const counted = recordApiCall(quota, this.now());
    const category = label === null ? "" : firstToken(label);
    if (category === "") {
      return Err<LookupFailure>({ kind: "not-found", word, quota: counted });
    }
    return Ok({ category, quota: counted });
  }
}

/**
 * One-off lookup outside a batch run. Loads the quota, looks the word up,
 * saves the quota if the call was counted, and returns the output line.
 * A blank word is `not-found` without a remote call.
 */
export async function getDictionaryEntry(
  word: string,
  lookup: CategoryLookup,
  quotaStore: QuotaStore
): Promise<Result<string, LookupFailure>> {
  const trimmed = word.trim();
  const quota = quotaStore.load();
  if (trimmed === "") {
    return Err<LookupFailure>({ kind: "not-found", word: trimmed, quota });
  }

  const outcome = await lookup.lookupCategory(trimmed, quota);

  if (outcome.ok) {
    await quotaStore.saveUsage(outcome.value.quota);
    return Ok(formatRecord({ word: trimmed, category: outcome.value.category }));
  }
  if (outcome.error.kind === "not-found") {
    await quotaStore.saveUsage(outcome.error.quota);
  }
  return outcome;
}
