import { join } from "node:path";
import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { FileTransport } from "./transports/file.js";
import type { LogLevel, LogTransport } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: none) */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
  /** File transport configuration */
  file?: {
    /** Path to log file */
    path: string;
    /** Error callback for write failures */
    onError?: (error: Error) => void;
  };
  /** Extra transports appended after console and file */
  transports?: LogTransport[];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Timestamped log file name in local time, e.g. `log20261019143005123.txt`.
 * A new name per run, so each run gets its own log file.
 */
export function logFileName(date: Date = new Date()): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    pad(date.getMilliseconds(), 3);
  return `log${stamp}.txt`;
}

/**
 * Join a log directory with a fresh timestamped file name.
 */
export function logFilePath(logDir: string, date: Date = new Date()): string {
  return join(logDir, logFileName(date));
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * const counter = new CountingTransport();
 * const logger = createLogger({
 *   level: 'info',
 *   file: { path: logFilePath('.') },
 *   transports: [counter],
 * });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: options.name ? { logger: options.name } : undefined,
  });

  if (options.console ?? true) {
    logger.addTransport(new ConsoleTransport({ colors: options.colors }));
  }

  if (options.file) {
    logger.addTransport(
      new FileTransport({
        path: options.file.path,
        onError: options.file.onError,
      })
    );
  }

  for (const transport of options.transports ?? []) {
    logger.addTransport(transport);
  }

  return logger;
}
