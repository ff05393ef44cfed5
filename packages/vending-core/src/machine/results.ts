/**
 * Command results returned by the controller.
 *
 * | Status | Recorded | Meaning |
 * |--------|----------|---------|
 * | `success` | yes | Command applied |
 * | `rejected` | no | Command refused, nothing changed |
 * | `failed` | yes | Business failure that still changed state (aborted dispense) |
 *
 * @example
 * ```typescript
 * const result = machine.selectProduct("coffee");
 * if (result.status === "rejected" && result.error instanceof InsufficientFundsError) {
 *   prompt(`Insert ${result.error.shortfall} more`);
 * }
 *
 * const receipt = unwrap(machine.dispense()); // throws the carried error
 * ```
 */
import type { UnknownRecord } from "../types.js";
import {
  VendingError,
  type ErrorCategoryType,
  type VendingErrorCode,
} from "../errors/index.js";
import type { TransactionLogEntry } from "../transactions/index.js";
import type { MachineState } from "./state.js";

export interface CommandSuccess<TData> {
  status: "success";
  data: TData;
  /** State after the command */
  state: MachineState;
  entry: TransactionLogEntry;
}

export interface CommandRejected {
  status: "rejected";
  code: VendingErrorCode;
  reason: string;
  error: VendingError;
}

export interface CommandFailed {
  status: "failed";
  code: VendingErrorCode;
  reason: string;
  error: VendingError;
  entry: TransactionLogEntry;
}

export type CommandResult<TData> = CommandSuccess<TData> | CommandRejected | CommandFailed;

export function successResult<TData>(
  data: TData,
  state: MachineState,
  entry: TransactionLogEntry
): CommandSuccess<TData> {
  return { status: "success", data, state, entry };
}

export function rejectedResult(error: VendingError): CommandRejected {
  return { status: "rejected", code: error.code, reason: error.message, error };
}

export function failedResult(error: VendingError, entry: TransactionLogEntry): CommandFailed {
  return { status: "failed", code: error.code, reason: error.message, error, entry };
}

export function isCommandSuccess<TData>(result: CommandResult<TData>): result is CommandSuccess<TData> {
  return result.status === "success";
}

/**
 * Data of a successful result.
 *
 * @throws the VendingError a rejected or failed result carries
 */
export function unwrap<TData>(result: CommandResult<TData>): TData {
  if (result.status === "success") {
    return result.data;
  }
  throw result.error;
}

/**
 * Wire shape for exposing an error to a remote caller.
 */
export interface ErrorResponse {
  code: VendingErrorCode | "INTERNAL_ERROR";
  category: ErrorCategoryType;
  recoverable: boolean;
  detail: string;
  context?: UnknownRecord;
}

/**
 * Map any thrown value to an ErrorResponse. Errors that are not
 * VendingErrors become non-recoverable INTERNAL_ERROR responses.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof VendingError) {
    const response: ErrorResponse = {
      code: error.code,
      category: error.category,
      recoverable: error.recoverable,
      detail: error.message,
    };
    if (error.context !== undefined) {
      response.context = error.context;
    }
    return response;
  }
  return {
    code: "INTERNAL_ERROR",
    category: "infra",
    recoverable: false,
    detail: error instanceof Error ? error.message : String(error),
  };
}
