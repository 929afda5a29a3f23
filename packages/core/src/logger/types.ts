/**
 * Log severity levels in ascending order of importance.
 *
 * `normal` sits above `info` so that a quiet run can drop per-word progress
 * while still reporting program lifecycle messages.
 */
export type LogLevel = "info" | "normal" | "warning" | "error";

/**
 * Numeric priority for log levels (higher = more severe).
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  info: 0,
  normal: 1,
  warning: 2,
  error: 3,
};

/**
 * Display label written inside the severity tag.
 */
export const LOG_LEVEL_LABELS: Record<LogLevel, string> = {
  info: "Info",
  normal: "Normal",
  warning: "Warning",
  error: "Error",
};

/** Width the bracketed severity tag is right-aligned to */
export const SEVERITY_TAG_WIDTH = 10;

/**
 * A single log entry with metadata.
 */
export interface LogEntry {
  /** Severity level of the log */
  level: LogLevel;
  /** Human-readable log message */
  message: string;
  /** When the log was created */
  timestamp: Date;
  /** Structured context data (logger identity, word, etc.) */
  context?: Record<string, unknown>;
  /** Additional payload data */
  data?: unknown;
}

/**
 * Transport interface for log output destinations.
 */
export interface LogTransport {
  /** Write a log entry to the transport */
  log(entry: LogEntry): void;
  /** Flush any buffered entries (optional) */
  flush?(): Promise<void>;
  /** Clean up resources (optional) */
  dispose?(): void;
}

/**
 * Options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Minimum level to log (default: 'info') */
  level?: LogLevel;
  /** Context data attached to all log entries */
  context?: Record<string, unknown>;
  /** Pre-configured transports */
  transports?: LogTransport[];
}

/**
 * Right-aligned severity tag, e.g. `    [Info]`.
 */
export function formatSeverityTag(level: LogLevel): string {
  return `[${LOG_LEVEL_LABELS[level]}]`.padStart(SEVERITY_TAG_WIDTH);
}

/**
 * Render the message part of an entry, with any data appended.
 */
export function formatMessage(entry: LogEntry): string {
  if (entry.data === undefined) {
    return entry.message;
  }
  const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
  return `${entry.message} ${dataStr}`;
}

/**
 * Plain single-line rendering: `<tag>: <message>`.
 */
export function formatLine(entry: LogEntry): string {
  return `${formatSeverityTag(entry.level)}: ${formatMessage(entry)}`;
}
