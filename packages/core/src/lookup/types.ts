// ============================================
// Lookup Types
// ============================================

import type { Result } from "@wordclass/shared";
import type { WordclassError } from "../errors/types.js";
import type { QuotaState } from "../quota/types.js";

/**
 * Remote dictionary that can report a word's functional label.
 */
export interface DictionaryClient {
  /**
   * Fetch the first functional label for `word`.
   *
   * @returns The label text, or null when the response has no label
   * @throws WordclassError on transport or parse failures
   */
  fetchFunctionalLabel(word: string, signal?: AbortSignal): Promise<string | null>;
}

/**
 * A word's lexical category.
 */
export interface DictionaryRecord {
  readonly word: string;
  readonly category: string;
}

/**
 * Why a lookup produced no category.
 *
 * Every variant carries the quota as it stands after the attempt.
 */
export type LookupFailure =
  | { readonly kind: "quota-exceeded"; readonly word: string; readonly quota: QuotaState }
  | { readonly kind: "not-found"; readonly word: string; readonly quota: QuotaState }
  | {
      readonly kind: "fatal";
      readonly word: string;
      readonly quota: QuotaState;
      readonly error: WordclassError;
    };

export interface LookupSuccess {
  readonly category: string;
  readonly quota: QuotaState;
}

export type LookupOutcome = Result<LookupSuccess, LookupFailure>;
