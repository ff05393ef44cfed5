/**
 * Structured machine errors.
 *
 * Every error the controller reports is a `VendingError` carrying a
 * category, a code and whether the machine can keep serving after it.
 * Subclasses fix the category and code so callers can match on class.
 *
 * @example
 * ```typescript
 * try {
 *   unwrap(machine.selectProduct("espresso"));
 * } catch (error) {
 *   if (error instanceof InsufficientFundsError) {
 *     display(`Insert ${error.shortfall} more`);
 *   }
 * }
 * ```
 */

import type { UnknownRecord } from "../types.js";
import {
  ErrorCategory,
  VendingErrorCodes,
  type ErrorCategoryType,
  type VendingErrorCode,
} from "./categories.js";

/**
 * V8-specific Error interface with captureStackTrace support.
 *
 * constructorOpt is typed as `object`: V8 only uses it as a marker for
 * stack frame filtering.
 */
interface V8ErrorConstructor extends ErrorConstructor {
  captureStackTrace(target: object, constructorOpt?: object): void;
}

const V8Error: V8ErrorConstructor = Error;

export class VendingError extends Error {
  constructor(
    /** Error category for classification */
    public readonly category: ErrorCategoryType,
    /** Machine-readable error code (e.g., "OUT_OF_STOCK") */
    public readonly code: VendingErrorCode,
    message: string,
    /** False when the machine cannot continue without an operator */
    public readonly recoverable: boolean,
    /** Additional context for debugging/logging */
    public readonly context?: UnknownRecord
  ) {
    super(message);
    this.name = "VendingError";
    if (typeof V8Error.captureStackTrace === "function") {
      V8Error.captureStackTrace(this, new.target);
    }
  }

  get fatal(): boolean {
    return !this.recoverable;
  }

  toJSON(): VendingErrorJSON {
    const json: VendingErrorJSON = {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    return json;
  }
}

export interface VendingErrorJSON {
  name: string;
  category: ErrorCategoryType;
  code: VendingErrorCode;
  message: string;
  recoverable: boolean;
  context?: UnknownRecord;
}

/**
 * Constructor shape shared by every concrete error class.
 */
export interface VendingErrorClass<TCode extends VendingErrorCode = VendingErrorCode> {
  new (message: string, context?: UnknownRecord): VendingError;
  readonly code: TCode;
}

// =============================================================================
// Concrete errors
// =============================================================================

/**
 * The command is not permitted in the machine's current state.
 */
export class InvalidCommandForStateError extends VendingError {
  static readonly code = VendingErrorCodes.INVALID_COMMAND_FOR_STATE;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.DOMAIN, InvalidCommandForStateError.code, message, true, context);
    this.name = "InvalidCommandForStateError";
  }
}

export class UnknownProductError extends VendingError {
  static readonly code = VendingErrorCodes.UNKNOWN_PRODUCT;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.DOMAIN, UnknownProductError.code, message, true, context);
    this.name = "UnknownProductError";
  }
}

export class OutOfStockError extends VendingError {
  static readonly code = VendingErrorCodes.OUT_OF_STOCK;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.DOMAIN, OutOfStockError.code, message, true, context);
    this.name = "OutOfStockError";
  }
}

/**
 * Balance is below the selected product's price. `shortfall` is the
 * amount still owed, read from `context.shortfall` (0 when absent).
 */
export class InsufficientFundsError extends VendingError {
  static readonly code = VendingErrorCodes.INSUFFICIENT_FUNDS;

  readonly shortfall: number;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.DOMAIN, InsufficientFundsError.code, message, true, context);
    this.name = "InsufficientFundsError";
    const shortfall = context?.["shortfall"];
    this.shortfall = typeof shortfall === "number" ? shortfall : 0;
  }
}

/**
 * A command arrived while another was still in flight.
 */
export class BusyError extends VendingError {
  static readonly code = VendingErrorCodes.BUSY;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.CONCURRENCY, BusyError.code, message, true, context);
    this.name = "BusyError";
  }
}

export class InvalidInputError extends VendingError {
  static readonly code = VendingErrorCodes.INVALID_INPUT;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.VALIDATION, InvalidInputError.code, message, true, context);
    this.name = "InvalidInputError";
  }
}

/**
 * The transaction log reached its configured capacity. Fatal: the
 * machine refuses to act on a command it cannot record.
 */
export class TransactionLogCapacityError extends VendingError {
  static readonly code = VendingErrorCodes.TRANSACTION_LOG_FULL;

  constructor(message: string, context?: UnknownRecord) {
    super(ErrorCategory.INFRASTRUCTURE, TransactionLogCapacityError.code, message, false, context);
    this.name = "TransactionLogCapacityError";
  }
}
