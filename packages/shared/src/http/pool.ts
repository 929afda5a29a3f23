/**
 * HTTP Connection Pool Module
 *
 * Shared HTTP client with keep-alive connection pooling. Uses undici so that
 * every lookup goes through one agent and tests can swap in a MockAgent.
 *
 * @module @wordclass/shared/http
 */

import {
  Agent,
  type Dispatcher,
  type RequestInit as UndiciRequestInit,
  type Response as UndiciResponse,
  fetch as undiciFetch,
} from "undici";

/**
 * Configuration options for creating an HTTP connection pool.
 */
export interface HttpPoolOptions {
  /**
   * Maximum time a connection can remain idle before being closed (ms).
   * @default 30_000
   */
  keepAliveTimeout?: number;

  /**
   * Maximum time a connection can be kept alive (ms).
   * @default 60_000
   */
  keepAliveMaxTimeout?: number;

  /**
   * Maximum number of connections per origin.
   * @default 4
   */
  connections?: number;

  /**
   * Connection timeout (ms).
   * @default 10_000
   */
  connect?: {
    timeout?: number;
  };
}

/**
 * Default pool configuration. Lookups are sequential, so a handful of
 * connections per origin is plenty.
 */
export const DEFAULT_POOL_OPTIONS: Required<Omit<HttpPoolOptions, "connect">> & {
  connect: { timeout: number };
} = {
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 60_000,
  connections: 4,
  connect: {
    timeout: 10_000,
  },
} as const;

/**
 * Creates a new HTTP connection pool with the specified options.
 *
 * @example
 * ```typescript
 * const pool = createHttpPool({ keepAliveTimeout: 15_000 });
 * const response = await fetchWithPool('https://example.test/data', { pool });
 * ```
 */
export function createHttpPool(options: HttpPoolOptions = {}): Agent {
  return new Agent({
    keepAliveTimeout: options.keepAliveTimeout ?? DEFAULT_POOL_OPTIONS.keepAliveTimeout,
    keepAliveMaxTimeout: options.keepAliveMaxTimeout ?? DEFAULT_POOL_OPTIONS.keepAliveMaxTimeout,
    connections: options.connections ?? DEFAULT_POOL_OPTIONS.connections,
    connect: {
      timeout: options.connect?.timeout ?? DEFAULT_POOL_OPTIONS.connect.timeout,
    },
  });
}

/**
 * Default shared HTTP connection pool instance.
 */
export const defaultHttpPool: Agent = createHttpPool();

/**
 * Extended fetch options that include the dispatcher for connection pooling.
 */
export interface FetchWithPoolOptions extends Omit<UndiciRequestInit, "dispatcher"> {
  /**
   * Custom dispatcher to use instead of the default pool.
   * Any undici Dispatcher works, including MockAgent.
   */
  pool?: Dispatcher;
}

/**
 * Fetch wrapper that routes the request through a pooled dispatcher.
 *
 * @example
 * ```typescript
 * const response = await fetchWithPool('https://example.test/data', {
 *   headers: { Accept: 'application/xml' },
 * });
 * ```
 */
export async function fetchWithPool(
  url: string | URL,
  options: FetchWithPoolOptions = {}
): Promise<UndiciResponse> {
  const { pool, ...fetchOptions } = options;

  return undiciFetch(url, {
    ...fetchOptions,
    dispatcher: pool ?? defaultHttpPool,
  });
}

/**
 * Gracefully closes the default HTTP pool.
 *
 * Call this during shutdown so idle keep-alive sockets do not hold the
 * process open.
 */
export async function closeDefaultPool(): Promise<void> {
  await defaultHttpPool.close();
}

export type { Agent as HttpPool, UndiciResponse as HttpResponse };
