/**
 * Engine logger.
 *
 * Components take a Logger and never decide where output goes. The
 * factory assembles writers from options: the console, an append-only
 * log file and an optional sink that receives structured records.
 * Lines look like:
 *
 *   [2026-01-15T00:00:00.000Z] [WARN ] [20260115-a1b2c3] Pass complete {"iteration":1}
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogRecord {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly runId: string | null;
  readonly message: string;
  readonly context?: LogContext;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  /** Records below this level are dropped */
  level?: LogLevel;
  logDir?: string;
  /** File name inside logDir */
  logFile?: string;
  console?: boolean;
  file?: boolean;
  sink?: LogSink;
}

export interface Logger {
  log(level: LogLevel, message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function formatLogRecord(record: LogRecord): string {
  const head = `[${record.timestamp}] [${record.level.toUpperCase().padEnd(5)}] [${record.runId ?? "no-run-id"}]`;
  const context =
    record.context && Object.keys(record.context).length > 0 ? ` ${JSON.stringify(record.context)}` : "";
  return `${head} ${record.message}${context}`;
}

function consoleWriter(record: LogRecord, line: string): void {
  switch (record.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

function fileWriter(logDir: string, logFile: string): (record: LogRecord, line: string) => void {
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }
  const path = join(logDir, logFile);
  return (_record, line) => {
    try {
      appendFileSync(path, line + "\n");
    } catch (err) {
      console.error(`Failed to write to log file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVELS.indexOf(options.level ?? "info");
  const writers: Array<(record: LogRecord, line: string) => void> = [];
  if (options.console ?? true) {
    writers.push(consoleWriter);
  }
  if (options.file ?? true) {
    writers.push(fileWriter(options.logDir ?? "output/logs", options.logFile ?? "engine.log"));
  }
  const sink = options.sink;

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVELS.indexOf(level) < threshold) return;

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      runId: getRunId(),
      message,
      ...(context ? { context } : {}),
    };
    sink?.(record);
    if (writers.length === 0) return;

    const line = formatLogRecord(record);
    for (const write of writers) {
      write(record, line);
    }
  }

  return {
    log,
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

/**
 * Discards everything. Default for components built without a logger.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}

/**
 * Collects records in memory; `records` is live.
 */
export function createMemoryLogger(level: LogLevel = "debug"): Logger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level,
    console: false,
    file: false,
    sink: (record) => records.push(record),
  });
  return { ...logger, records };
}
