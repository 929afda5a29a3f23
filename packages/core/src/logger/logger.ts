import type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Logger with multi-transport support and level filtering.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'info' });
 * logger.addTransport(new ConsoleTransport());
 * logger.normal('Program starting up now.');
 * logger.info('1th entry added: cat, noun');
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  /**
   * Log a progress message (lowest severity).
   */
  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  /**
   * Log a program lifecycle message.
   */
  normal(message: string, data?: unknown): void {
    this.log("normal", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warning", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  /**
   * Log a lifecycle message that is written whatever the configured level.
   */
  always(message: string, data?: unknown): void {
    this.emit("normal", message, data);
  }

  /**
   * Add a transport for log output.
   */
  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  /**
   * Flush all transports that support flushing.
   */
  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }

  /**
   * Dispose all transports that support disposal.
   */
  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      this.emit(level, message, data);
    }
  }

  private emit(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }
}
