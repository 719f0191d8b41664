/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, generateSessionId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  createMemoryLogger,
  formatLogRecord,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogRecord,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
