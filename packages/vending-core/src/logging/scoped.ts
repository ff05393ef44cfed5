/**
 * ## Scoped Loggers
 *
 * Loggers that prefix every line with `[scope]` and drop messages below
 * their configured level.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("VendingMachine:lobby", "INFO");
 *
 * logger.debug("Suppressed");        // not logged
 * logger.info("Command succeeded");  // [VendingMachine:lobby] Command succeeded
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Read the console at call time so tests can spy on it after import.
 */
function runtimeConsole(): Console {
  return globalThis.console;
}

export const TRACE_TIMING = {
  START: "start",
  END: "end",
} as const;
export type TraceTiming = (typeof TRACE_TIMING)[keyof typeof TRACE_TIMING];

/**
 * Create a scoped logger with level filtering.
 *
 * @param scope - Prefix for log messages (e.g., "VendingMachine:lobby")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const formatMessage = (message: string, data?: UnknownRecord): string => {
    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    debug(message: string, data?: UnknownRecord): void {
      if (shouldLog("DEBUG", level)) {
        runtimeConsole().debug(formatMessage(message, data));
      }
    },

    trace(message: string, data?: UnknownRecord): void {
      if (shouldLog("TRACE", level)) {
        const timing = data?.["timing"];
        if (timing === TRACE_TIMING.START) {
          runtimeConsole().time(`${prefix} ${message}`);
        } else if (timing === TRACE_TIMING.END) {
          runtimeConsole().timeEnd(`${prefix} ${message}`);
        } else {
          runtimeConsole().debug(formatMessage(message, data));
        }
      }
    },

    info(message: string, data?: UnknownRecord): void {
      if (shouldLog("INFO", level)) {
        runtimeConsole().info(formatMessage(message, data));
      }
    },

    report(message: string, data?: UnknownRecord): void {
      if (shouldLog("REPORT", level)) {
        runtimeConsole().log(
          JSON.stringify({
            scope,
            message,
            ...data,
            timestamp: Date.now(),
          })
        );
      }
    },

    warn(message: string, data?: UnknownRecord): void {
      if (shouldLog("WARN", level)) {
        runtimeConsole().warn(formatMessage(message, data));
      }
    },

    error(message: string, data?: UnknownRecord): void {
      if (shouldLog("ERROR", level)) {
        runtimeConsole().error(formatMessage(message, data));
      }
    },
  };
}

/**
 * Logger that discards everything. Default when no logger is supplied.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Create a logger scoped as `parentScope:childScope`.
 *
 * @example
 * ```typescript
 * createChildLogger("VendingMachine", "lobby", "DEBUG"); // [VendingMachine:lobby]
 * ```
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level);
}
