import pino, { type Logger } from "pino";

export interface CreateLoggerOptions {
  /** Overrides LOG_LEVEL for this logger. */
  level?: string;
  /**
   * File descriptor to write to. Defaults to stdout (1); the CLI passes 2 so
   * that stdout only carries simulated events and the final report.
   */
  destination?: number;
}

/**
 * The subset of the pino API that simulator components log through. Accepting
 * this instead of a full `Logger` lets tests hand in plain spies.
 */
export type LoggerLike = Pick<Logger, "debug" | "info" | "warn" | "error">;

/**
 * Create a Pino logger instance for a specific component.
 *
 * Features:
 *   - JSON-formatted output (default pino behavior)
 *   - ISO timestamps
 *   - Component name included in every log line
 *   - Log level respects the LOG_LEVEL environment variable (defaults to "info")
 *
 * Usage:
 *   const logger = createLogger("simulation-session");
 *   logger.info("Session started");
 *   logger.warn({ orderId, sink }, "Dispatch failed");
 */
export function createLogger(
  componentName: string,
  options: CreateLoggerOptions = {},
): Logger {
  const level = options.level ?? process.env["LOG_LEVEL"] ?? "info";
  const pinoOptions = {
    name: componentName,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };

  if (options.destination !== undefined) {
    return pino(pinoOptions, pino.destination({ dest: options.destination, sync: true }));
  }
  return pino(pinoOptions);
}
