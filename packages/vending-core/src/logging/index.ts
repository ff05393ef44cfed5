/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@vending/core";
 *
 * const machineLogger = createScopedLogger("VendingMachine:lobby", "INFO");
 * const silentLogger = createNoOpLogger();
 * ```
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOG_LEVEL, shouldLog, isLogLevel } from "./types.js";

// Factories
export { createScopedLogger, createNoOpLogger, createChildLogger, TRACE_TIMING } from "./scoped.js";
export type { TraceTiming } from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";

// Command logging helpers
export type { CommandLogContext } from "./commands.js";
export {
  logCommandStart,
  logCommandSuccess,
  logCommandRejected,
  logCommandFailed,
  logCommandError,
} from "./commands.js";
