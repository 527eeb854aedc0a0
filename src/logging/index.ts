/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, RUN_ID_PATTERN } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  silentLogger,
  LOG_LEVEL_PRIORITY,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
