// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in the socket client.
 *
 * Lets applications plug in their own logging (Pino, Winston, a log
 * service) instead of the console.
 *
 * @example
 * ```typescript
 * import { connect, createLogger } from "@nftstream/phoenix";
 *
 * const socket = await connect({
 *   url: "wss://example.test/socket/websocket",
 *   logger: createLogger({ minLevel: "info" }),
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * @param context - Category or source of the log (e.g. "connection", "heartbeat")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;
  info(context: string, message: string, data?: unknown): void;
  warn(context: string, message: string, data?: unknown): void;
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /**
   * Custom sink. Console is used when omitted.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum level to output (default: "debug").
   */
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger adapter with custom configuration.
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];

  function write(
    level: LogLevel,
    context: string,
    message: string,
    data: unknown,
  ): void {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
      return;
    }
    const line = `[${context}] ${message}`;
    if (data === undefined) {
      console[level](line);
    } else {
      console[level](line, data);
    }
  }

  return {
    debug: (context, message, data) => write("debug", context, message, data),
    info: (context, message, data) => write("info", context, message, data),
    warn: (context, message, data) => write("warn", context, message, data),
    error: (context, message, data) => write("error", context, message, data),
  };
}

/**
 * Logger that discards everything. Handy in tests.
 */
export const silentLogger: LoggerAdapter = createLogger({ log: () => {} });

/**
 * Log context constants used by the socket client.
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  HEARTBEAT: "heartbeat",
  CHANNEL: "channel",
  MESSAGE: "message",
  RECONNECT: "reconnect",
} as const;
