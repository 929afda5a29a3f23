// ============================================
// Error handling
// ============================================

export { AbortError, type RetryOptions, withRetry, withTimeout } from "./retry.js";
export {
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  toWordclassError,
  WordclassError,
  type WordclassErrorOptions,
} from "./types.js";
