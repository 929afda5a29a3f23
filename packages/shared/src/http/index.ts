/**
 * HTTP utilities module
 *
 * @module @wordclass/shared/http
 */

export {
  closeDefaultPool,
  createHttpPool,
  DEFAULT_POOL_OPTIONS,
  defaultHttpPool,
  type FetchWithPoolOptions,
  fetchWithPool,
  type HttpPool,
  type HttpPoolOptions,
  type HttpResponse,
} from "./pool.js";
