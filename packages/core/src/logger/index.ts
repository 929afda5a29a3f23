// Factory
export type { CreateLoggerOptions } from "./factory.js";
export { createLogger, logFileName, logFilePath } from "./factory.js";
export { Logger } from "./logger.js";
// Transports
export type { ConsoleTransportOptions } from "./transports/console.js";
export { ConsoleTransport } from "./transports/console.js";
export { CountingTransport } from "./transports/counting.js";
export type { FileTransportOptions } from "./transports/file.js";
export { FileTransport } from "./transports/file.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
export {
  formatLine,
  formatMessage,
  formatSeverityTag,
  LOG_LEVEL_LABELS,
  LOG_LEVEL_PRIORITY,
} from "./types.js";
