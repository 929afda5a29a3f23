// ============================================
// Wordclass Error Types
// ============================================

/**
 * Categorized error codes.
 *
 * Categories:
 * - 1xxx: Configuration errors
 * - 2xxx: Lookup/transport errors
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // 1xxx - Configuration errors
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,

  // 2xxx - Lookup errors
  LOOKUP_NETWORK_ERROR = 2001,
  LOOKUP_TIMEOUT = 2002,
  LOOKUP_RATE_LIMITED = 2003,
  LOOKUP_SERVER_ERROR = 2004,
  LOOKUP_HTTP_ERROR = 2005,
  LOOKUP_INVALID_RESPONSE = 2006,

  // 5xxx - System errors
  SYSTEM_IO_ERROR = 5001,
  SYSTEM_UNKNOWN = 5999,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Can retry automatically */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Network, timeout, rate limit, 5xx → RECOVERABLE
 * - Config problems → USER_ACTION
 * - Bad responses, I/O and unknown errors → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.LOOKUP_NETWORK_ERROR:
    case ErrorCode.LOOKUP_TIMEOUT:
    case ErrorCode.LOOKUP_RATE_LIMITED:
    case ErrorCode.LOOKUP_SERVER_ERROR:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
      return ErrorSeverity.USER_ACTION;

    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a WordclassError.
 */
export interface WordclassErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Whether this error can be retried */
  isRetryable?: boolean;
  /** Suggested delay before retry in milliseconds */
  retryDelay?: number;
}

/**
 * Base error class for all wordclass errors.
 */
export class WordclassError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;
  private readonly _retryDelay?: number;

  constructor(message: string, code: ErrorCode, options?: WordclassErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "WordclassError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;
    this._retryDelay = options?.retryDelay;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WordclassError);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Whether this error can be retried.
   * If not explicitly set, defaults to true for RECOVERABLE severity.
   */
  get isRetryable(): boolean {
    if (this._isRetryable !== undefined) {
      return this._isRetryable;
    }
    return this.severity === ErrorSeverity.RECOVERABLE;
  }

  /**
   * The suggested delay before retry in milliseconds.
   * Returns undefined if not retryable or not set.
   */
  get retryDelay(): number | undefined {
    if (!this.isRetryable) {
      return undefined;
    }
    return this._retryDelay;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      isRetryable: this.isRetryable,
      retryDelay: this.retryDelay,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Wraps anything thrown into a WordclassError, keeping existing ones as-is.
 */
export function toWordclassError(error: unknown, fallbackCode = ErrorCode.SYSTEM_UNKNOWN): WordclassError {
  if (error instanceof WordclassError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new WordclassError(message, fallbackCode, { cause: error });
}
