/**
 * Logging Types
 *
 * Six-level hierarchy (most to least verbose):
 * - DEBUG: Decider inputs, state details
 * - TRACE: Timing of command handling (console.time/timeEnd)
 * - INFO: Accepted commands
 * - REPORT: Structured JSON summaries (status snapshots, restock totals)
 * - WARN: Rejected commands, aborted dispenses, listener failures
 * - ERROR: Fatal faults (transaction log exhausted)
 */

import type { UnknownRecord } from "../types.js";

/**
 * Priority order (lower number = more verbose):
 * DEBUG(0) > TRACE(1) > INFO(2) > REPORT(3) > WARN(4) > ERROR(5)
 */
export type LogLevel = "DEBUG" | "TRACE" | "INFO" | "REPORT" | "WARN" | "ERROR";

export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface. Each method takes a message and optional structured data.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("VendingMachine:lobby", "DEBUG");
 *
 * logger.info("Command succeeded", { command: "dispense", state: "ready" });
 * logger.warn("Command rejected", { code: "INSUFFICIENT_FUNDS" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;

  /**
   * Timing output. Pass `{ timing: "start" }` / `{ timing: "end" }` to
   * bracket an operation.
   */
  trace(message: string, data?: UnknownRecord): void;

  info(message: string, data?: UnknownRecord): void;

  /**
   * Structured JSON line for aggregation.
   */
  report(message: string, data?: UnknownRecord): void;

  warn(message: string, data?: UnknownRecord): void;

  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
