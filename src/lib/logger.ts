/**
 * Structured logger utility for consistent logging across the tool
 * Provides namespaced logging with structured context, backed by pino
 */

import pino from "pino";
import pretty from "pino-pretty";
import { loadEnvConfig } from "./env";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const envConfig = loadEnvConfig();

// pino-pretty runs as an in-process stream so every line is written
// before the CLI sets its exit code
const rootLogger = pino(
  { level: envConfig.logLevel, base: null },
  pretty({
    colorize: envConfig.colorize,
    sync: true,
    translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
    ignore: "namespace",
    messageFormat: "[{namespace}] {msg}",
  }),
);

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (childNamespace: string) => Logger;
}

/**
 * Creates a namespaced logger instance
 * @param namespace - The namespace for this logger (e.g., "Table", "Runs", "CLI")
 *
 * @example
 * const logger = createLogger("Table");
 * logger.info("Saving processed data", { outputPath });
 *
 * // Create a child logger for more specific context
 * const runLogger = logger.child("run-01");
 * runLogger.debug("Checking pattern", { pattern: "Including FD → Motion" });
 */
export function createLogger(namespace: string): Logger {
  const instance = rootLogger.child({ namespace });

  const log = (level: LogLevel, message: string, context?: LogContext) => {
    if (context) {
      instance[level](context, message);
    } else {
      instance[level](message);
    }
  };

  return {
    debug: (message: string, context?: LogContext) =>
      log("debug", message, context),
    info: (message: string, context?: LogContext) =>
      log("info", message, context),
    warn: (message: string, context?: LogContext) =>
      log("warn", message, context),
    error: (message: string, context?: LogContext) =>
      log("error", message, context),
    child: (childNamespace: string) =>
      createLogger(`${namespace}:${childNamespace}`),
  };
}

// Pre-configured loggers for common namespaces
export const loggers = {
  cli: createLogger("CLI"),
  bids: createLogger("BIDS"),
  table: createLogger("Table"),
  runs: createLogger("Runs"),
  processor: createLogger("Processor"),
} as const;

export default createLogger;
