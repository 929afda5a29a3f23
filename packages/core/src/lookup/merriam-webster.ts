import { type FetchWithPoolOptions, fetchWithPool, type HttpResponse } from "@wordclass/shared";
import { withTimeout } from "../errors/retry.js";
import { ErrorCode, WordclassError } from "../errors/types.js";
import type { DictionaryClient } from "./types.js";
import { findFirstElementText } from "./xml.js";

/** Functional label element in the collegiate XML feed */
const FUNCTIONAL_LABEL_TAG = "fl";

export interface MerriamWebsterClientOptions {
  apiKey: string;
  /** Collegiate XML endpoint, without trailing slash */
  baseUrl: string;
  /** Per-request timeout (ms) */
  timeout: number;
  /** Dispatcher override, e.g. an undici MockAgent */
  pool?: FetchWithPoolOptions["pool"];
}

/**
 * Seconds from a Retry-After header, as milliseconds.
 */
function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function statusError(word: string, response: HttpResponse): WordclassError {
  const { status } = response;
  const context = { word, status };

  if (status === 429) {
    return new WordclassError("Dictionary API rate limit hit", ErrorCode.LOOKUP_RATE_LIMITED, {
      context,
      retryDelay: parseRetryAfter(response.headers.get("retry-after")),
    });
  }
  if (status >= 500) {
    return new WordclassError(
      `Dictionary API server error: ${status} ${response.statusText}`,
      ErrorCode.LOOKUP_SERVER_ERROR,
      { context }
    );
  }
  return new WordclassError(
    `Dictionary API returned ${status}: ${response.statusText}`,
    ErrorCode.LOOKUP_HTTP_ERROR,
    { context }
  );
}

/**
 * Client for the Merriam-Webster collegiate XML API.
 *
 * @example
 * ```typescript
 * const client = new MerriamWebsterClient({
 *   apiKey: config.api.key,
 *   baseUrl: config.api.baseUrl,
 *   timeout: config.api.timeout,
 * });
 * await client.fetchFunctionalLabel('cat'); // "noun"
 * ```
 */
export class MerriamWebsterClient implements DictionaryClient {
  constructor(private readonly options: MerriamWebsterClientOptions) {}

  /** Request URL for a word; the key travels as a query parameter */
  urlFor(word: string): string {
    return `${this.options.baseUrl}/${encodeURIComponent(word)}?key=${encodeURIComponent(this.options.apiKey)}`;
  }

  async fetchFunctionalLabel(word: string, signal?: AbortSignal): Promise<string | null> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const body = await withTimeout(() => this.fetchBody(word, controller.signal), this.options.timeout);
      return findFirstElementText(body, FUNCTIONAL_LABEL_TAG);
    } catch (error) {
      controller.abort();
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async fetchBody(word: string, signal: AbortSignal): Promise<string> {
    let response: HttpResponse;
    try {
      response = await fetchWithPool(this.urlFor(word), {
        method: "GET",
        headers: { Accept: "application/xml, text/xml" },
        signal,
        pool: this.options.pool,
      });
    } catch (error) {
      throw new WordclassError(`Dictionary request failed for "${word}"`, ErrorCode.LOOKUP_NETWORK_ERROR, {
        cause: error,
        context: { word },
      });
    }

    if (!response.ok) {
      // Drain so the pooled connection can be reused
      await response.body?.cancel();
      throw statusError(word, response);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new WordclassError(`Dictionary response for "${word}" was cut off`, ErrorCode.LOOKUP_NETWORK_ERROR, {
        cause: error,
        context: { word },
      });
    }
  }
}
