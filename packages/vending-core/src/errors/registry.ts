/**
 * Code → class lookup, used to turn a decider rejection back into the
 * typed error a caller can `instanceof`.
 */

import type { UnknownRecord } from "../types.js";
import type { VendingErrorCode } from "./categories.js";
import {
  BusyError,
  InsufficientFundsError,
  InvalidCommandForStateError,
  InvalidInputError,
  OutOfStockError,
  TransactionLogCapacityError,
  UnknownProductError,
  VendingError,
  type VendingErrorClass,
} from "./VendingError.js";

const ERROR_CLASSES: { [K in VendingErrorCode]: VendingErrorClass<K> } = {
  INVALID_COMMAND_FOR_STATE: InvalidCommandForStateError,
  UNKNOWN_PRODUCT: UnknownProductError,
  OUT_OF_STOCK: OutOfStockError,
  INSUFFICIENT_FUNDS: InsufficientFundsError,
  BUSY: BusyError,
  INVALID_INPUT: InvalidInputError,
  TRANSACTION_LOG_FULL: TransactionLogCapacityError,
};

export function errorClassFor(code: VendingErrorCode): VendingErrorClass {
  return ERROR_CLASSES[code];
}

/**
 * Build the typed error for a code.
 *
 * @example
 * ```typescript
 * const error = createVendingError("OUT_OF_STOCK", "cola is sold out", { productId: "cola" });
 * error instanceof OutOfStockError; // true
 * ```
 */
export function createVendingError(
  code: VendingErrorCode,
  message: string,
  context?: UnknownRecord
): VendingError {
  const ErrorClass = errorClassFor(code);
  return new ErrorClass(message, context);
}

export function isVendingError(error: unknown): error is VendingError {
  return error instanceof VendingError;
}

/**
 * Check if an error is a VendingError with a specific code.
 */
export function hasErrorCode(error: unknown, code: VendingErrorCode): error is VendingError {
  return error instanceof VendingError && error.code === code;
}

/**
 * Fatal errors stop the machine serving; everything else is a per-command
 * refusal. Errors that are not VendingErrors count as fatal.
 */
export function isFatalError(error: unknown): boolean {
  if (error instanceof VendingError) {
    return !error.recoverable;
  }
  return true;
}
