/**
 * Error categories with recovery semantics.
 *
 * | Category    | Recovery                    | Example                        |
 * |-------------|-----------------------------|--------------------------------|
 * | domain      | Customer or operator action | Selected product is sold out   |
 * | validation  | Fix input and resubmit      | Restock quantity of -3         |
 * | concurrency | Retry once the machine idles| Command issued during dispense |
 * | infra       | Operator intervention       | Transaction log exhausted      |
 */
export const ErrorCategory = {
  /** Business rule violation */
  DOMAIN: "domain",
  /** Malformed command input */
  VALIDATION: "validation",
  /** Command collided with one already in flight */
  CONCURRENCY: "concurrency",
  /** Machine resource failure */
  INFRASTRUCTURE: "infra",
} as const;

export type ErrorCategoryType = (typeof ErrorCategory)[keyof typeof ErrorCategory];

export const ERROR_CATEGORIES = Object.values(ErrorCategory);

export function isErrorCategory(value: unknown): value is ErrorCategoryType {
  return typeof value === "string" && (ERROR_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Machine-readable error codes.
 */
export const VendingErrorCodes = {
  INVALID_COMMAND_FOR_STATE: "INVALID_COMMAND_FOR_STATE",
  UNKNOWN_PRODUCT: "UNKNOWN_PRODUCT",
  OUT_OF_STOCK: "OUT_OF_STOCK",
  INSUFFICIENT_FUNDS: "INSUFFICIENT_FUNDS",
  BUSY: "BUSY",
  INVALID_INPUT: "INVALID_INPUT",
  TRANSACTION_LOG_FULL: "TRANSACTION_LOG_FULL",
} as const;

export type VendingErrorCode = (typeof VendingErrorCodes)[keyof typeof VendingErrorCodes];

/**
 * Codes a decider may return in a rejection or recorded failure.
 * The log capacity fault is raised by the controller, never decided.
 */
export type DecidableErrorCode = Exclude<VendingErrorCode, "TRANSACTION_LOG_FULL">;
