import { Chalk, type ChalkInstance } from "chalk";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";
import { formatMessage, formatSeverityTag } from "../types.js";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Output sink for non-error lines (default: console.log) */
  stdout?: (line: string) => void;
  /** Output sink for error lines (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when:
 * - NO_COLOR environment variable is set
 * - CI environment variable is set
 * - stdout is not a TTY
 */
function shouldEnableColors(): boolean {
  // https://no-color.org/
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  if (process.env.CI) {
    return false;
  }

  return process.stdout.isTTY === true;
}

const LEVEL_PAINTERS: Record<LogLevel, (chalk: ChalkInstance, text: string) => string> = {
  info: (chalk, text) => chalk.green(text),
  normal: (_chalk, text) => text,
  warning: (chalk, text) => chalk.yellow(text),
  error: (chalk, text) => chalk.red(text),
};

/**
 * Console transport with color support.
 * Writes `    [Info]: message` lines; errors go to stderr.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: true });
 * logger.addTransport(transport);
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly chalk: ChalkInstance;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    const useColors = options.colors ?? shouldEnableColors();
    this.chalk = new Chalk({ level: useColors ? 1 : 0 });
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const tag = LEVEL_PAINTERS[entry.level](this.chalk, formatSeverityTag(entry.level));
    const output = `${tag}: ${formatMessage(entry)}`;

    if (entry.level === "error") {
      this.stderr(output);
    } else {
      this.stdout(output);
    }
  }
}
