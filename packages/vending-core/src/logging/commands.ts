/**
 * Command lifecycle logging for the machine controller.
 *
 * One helper per outcome so every command logs the same fields at the
 * same level.
 */
import type { Logger } from "./types.js";

/**
 * Fields attached to every command log line.
 */
export type CommandLogContext = {
  command: string;
  commandId: string;
  state: string;
  [key: string]: unknown;
};

/**
 * Logged before the decider runs.
 */
export function logCommandStart(logger: Logger, context: CommandLogContext): void {
  logger.debug("Command started", context);
}

/**
 * Logged after the state is committed and the entry appended.
 */
export function logCommandSuccess(
  logger: Logger,
  context: CommandLogContext,
  result: { eventType: string; resultingState: string; sequence: number }
): void {
  logger.info("Command succeeded", {
    ...context,
    eventType: result.eventType,
    resultingState: result.resultingState,
    sequence: result.sequence,
  });
}

/**
 * Logged when the decider refuses the command. Nothing was changed.
 */
export function logCommandRejected(
  logger: Logger,
  context: CommandLogContext,
  reason: { code: string; message: string }
): void {
  logger.warn("Command rejected", {
    ...context,
    rejectionCode: reason.code,
    rejectionMessage: reason.message,
  });
}

/**
 * Logged for a recorded business failure (an aborted dispense).
 */
export function logCommandFailed(
  logger: Logger,
  context: CommandLogContext,
  failure: { code: string; eventType: string; reason: string }
): void {
  logger.warn("Command failed (business)", {
    ...context,
    failureCode: failure.code,
    eventType: failure.eventType,
    failureReason: failure.reason,
  });
}

/**
 * Logged when a command is aborted by an unexpected or fatal error.
 */
export function logCommandError(logger: Logger, context: CommandLogContext, error: unknown): void {
  logger.error("Command failed", {
    ...context,
    error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
  });
}
