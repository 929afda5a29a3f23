import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * Transport that only tallies entries per level.
 * The CLI reads the error tally for its closing "Finished program with N error(s)." line.
 */
export class CountingTransport implements LogTransport {
  private counts: Record<LogLevel, number> = { info: 0, normal: 0, warning: 0, error: 0 };

  log(entry: LogEntry): void {
    this.counts[entry.level] += 1;
  }

  count(level: LogLevel): number {
    return this.counts[level];
  }

  reset(): void {
    this.counts = { info: 0, normal: 0, warning: 0, error: 0 };
  }
}
