// ============================================
// Batch Types
// ============================================

import type { WordclassError } from "../errors/types.js";
import type { LookupOutcome } from "../lookup/types.js";
import type { QuotaState } from "../quota/types.js";

/**
 * How a run ended.
 *
 * - completed: every word was attempted
 * - quota-exhausted: the daily quota ran out; unread words were dumped
 * - aborted: a fatal lookup or I/O failure stopped the run
 */
export type RunState = "completed" | "quota-exhausted" | "aborted";

export interface RunSummary {
  /** Records appended to the sink */
  entriesAdded: number;
  /** Words with no category */
  errors: number;
  /** Words not attempted */
  remaining: number;
  state: RunState;
  /** Quota after the run */
  quota: QuotaState;
  fatalError?: WordclassError;
}

/**
 * Reported after each attempted word.
 */
export interface BatchProgress {
  /** 0-based position in the word list */
  index: number;
  total: number;
  word: string;
  outcome: LookupOutcome;
}
