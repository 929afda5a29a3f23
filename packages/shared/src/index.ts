// ============================================
// Wordclass Shared Utilities
// ============================================

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
} from "./http/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
// Result type (shared so core and cli branch on the same shape)
export { Err, Ok } from "./types/result.js";
