import { appendFile } from "node:fs/promises";

import type { LogEntry, LogTransport } from "../types.js";
import { formatLine } from "../types.js";

/**
 * Options for FileTransport.
 */
export interface FileTransportOptions {
  /** Path to the log file */
  path: string;
  /** Flush interval in milliseconds (default: 1000) */
  flushInterval?: number;
  /** Maximum buffer size before auto-flush (default: 100) */
  maxBufferSize?: number;
  /** Error callback for write failures */
  onError?: (error: Error) => void;
}

/**
 * File transport with buffered writes.
 * Buffers log lines in memory and appends them periodically or when the
 * buffer is full. Lines use the same `<tag>: <message>` shape as the console.
 *
 * @example
 * ```typescript
 * const transport = new FileTransport({
 *   path: './log20261019103000123.txt',
 *   onError: (err) => console.error('Log write failed:', err),
 * });
 * logger.addTransport(transport);
 * ```
 */
export class FileTransport implements LogTransport {
  private readonly path: string;
  private readonly maxBufferSize: number;
  private readonly onError?: (error: Error) => void;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  /** Last error encountered during file write */
  lastError: Error | null = null;

  constructor(options: FileTransportOptions) {
    this.path = options.path;
    this.maxBufferSize = options.maxBufferSize ?? 100;
    this.onError = options.onError;

    const flushInterval = options.flushInterval ?? 1000;
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, flushInterval);

    // Prevent timer from keeping process alive
    this.flushTimer.unref();
  }

  /**
   * Buffer a log entry. Auto-flushes if buffer exceeds maxBufferSize.
   */
  log(entry: LogEntry): void {
    this.buffer.push(formatLine(entry));

    if (this.buffer.length >= this.maxBufferSize) {
      void this.flush();
    }
  }

  /**
   * Flush buffered entries to file. Waits for a write already in progress,
   * so lines logged before the call are on disk once it resolves.
   */
  async flush(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }

    if (this.buffer.length === 0) {
      return;
    }

    const entries = this.buffer;
    this.buffer = [];
    this.inFlight = this.write(entries).finally(() => {
      this.inFlight = null;
    });
    await this.inFlight;
  }

  /**
   * Stop the flush timer and flush remaining entries.
   */
  dispose(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    void this.flush();
  }

  private async write(entries: string[]): Promise<void> {
    try {
      await appendFile(this.path, `${entries.join("\n")}\n`, "utf-8");
      this.lastError = null;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.lastError = err;
      this.onError?.(err);
      // Keep the lines for the next attempt, ahead of anything logged since
      this.buffer = [...entries, ...this.buffer];
    }
  }
}
