import { toWordclassError, type WordclassError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { type CategoryLookup, formatRecord } from "../lookup/category-lookup.js";
import { canCallApi } from "../quota/quota.js";
import type { QuotaStore } from "../quota/quota-store.js";
import type { QuotaState } from "../quota/types.js";
import type { ResumeWriter } from "./resume.js";
import type { RecordSink } from "./sink.js";
import type { BatchProgress, RunSummary } from "./types.js";

export interface QuotaAwareBatchLookupOptions {
  lookup: CategoryLookup;
  quotaStore: QuotaStore;
  resume: ResumeWriter;
  logger: Logger;
  /** Daily limit for this run only; the persisted limit is left as is */
  dailyLimit?: number;
  /** Clock for quota checks (default: system time) */
  now?: () => Date;
  onProgress?: (progress: BatchProgress) => void;
}

interface Tally {
  entriesAdded: number;
  errors: number;
}

/**
 * Looks up every word in a list, one at a time, appending categories to a
 * sink until the list ends or the daily quota runs out.
 *
 * Once the quota is spent the run stops for good: the current word and all
 * words after it are written to the resume file, in order.
 *
 * @example
 * ```typescript
 * const runner = new QuotaAwareBatchLookup({ lookup, quotaStore, resume, logger });
 * const sink = await FileRecordSink.open('dict.csv');
 * try {
 *   const summary = await runner.run(await readWordList('words.txt'), sink);
 * } finally {
 *   await sink.close();
 * }
 * ```
 */
export class QuotaAwareBatchLookup {
  private readonly now: () => Date;

  constructor(private readonly options: QuotaAwareBatchLookupOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(wordList: readonly string[], sink: RecordSink): Promise<RunSummary> {
    const { lookup, logger, onProgress } = this.options;
    const tally: Tally = { entriesAdded: 0, errors: 0 };
    let quota = this.loadQuota();

    for (let index = 0; index < wordList.length; index++) {
      const word = wordList[index];
      if (word === undefined) continue;

      if (!canCallApi(quota, this.now())) {
        return this.exhausted(wordList.slice(index), quota, tally);
      }

      const outcome = await lookup.lookupCategory(word, quota);
      onProgress?.({ index, total: wordList.length, word, outcome });

      if (outcome.ok) {
        quota = outcome.value.quota;
        const record = { word, category: outcome.value.category };
        try {
          await this.persist(quota);
          await sink.append(record);
        } catch (error) {
          return this.aborted(wordList.length - index, quota, tally, toWordclassError(error));
        }
        tally.entriesAdded++;
        logger.info(`${tally.entriesAdded}th entry added: ${formatRecord(record)}`);
      } else {
        const failure = outcome.error;
        switch (failure.kind) {
          case "quota-exceeded":
            return this.exhausted(wordList.slice(index), failure.quota, tally);
          case "fatal":
            return this.aborted(wordList.length - index, failure.quota, tally, failure.error);
          case "not-found":
            quota = failure.quota;
            tally.errors++;
            logger.error(`Could not find category for "${word}".`);
            try {
              await this.persist(quota);
            } catch (error) {
              return this.aborted(wordList.length - index - 1, quota, tally, toWordclassError(error));
            }
            break;
        }
      }
    }

    return { ...tally, remaining: 0, state: "completed", quota };
  }

  private loadQuota(): QuotaState {
    const quota = this.options.quotaStore.load();
    const { dailyLimit } = this.options;
    return dailyLimit === undefined ? quota : { ...quota, dailyLimit };
  }

  private async persist(quota: QuotaState): Promise<void> {
    await this.options.quotaStore.saveUsage(quota);
  }

  private async exhausted(unread: readonly string[], quota: QuotaState, tally: Tally): Promise<RunSummary> {
    const { logger, resume } = this.options;
    logger.error("API Call Limit reached. Cannot call API again until tomorrow. Sorry!");
    logger.normal(`API Call Limit is: ${quota.dailyLimit}`);
    logger.normal(`Dumping remaining words in word list to: <${resume.location}>`);

    try {
      await resume.write(unread);
    } catch (error) {
      return this.aborted(unread.length, quota, tally, toWordclassError(error));
    }
    return { ...tally, remaining: unread.length, state: "quota-exhausted", quota };
  }

  private aborted(remaining: number, quota: QuotaState, tally: Tally, error: WordclassError): RunSummary {
    this.options.logger.error(error.message);
    return { ...tally, remaining, state: "aborted", quota, fatalError: error };
  }
}
