export {
  ErrorCategory,
  ERROR_CATEGORIES,
  isErrorCategory,
  VendingErrorCodes,
  type ErrorCategoryType,
  type VendingErrorCode,
  type DecidableErrorCode,
} from "./categories.js";

export {
  VendingError,
  InvalidCommandForStateError,
  UnknownProductError,
  OutOfStockError,
  InsufficientFundsError,
  BusyError,
  InvalidInputError,
  TransactionLogCapacityError,
  type VendingErrorJSON,
  type VendingErrorClass,
} from "./VendingError.js";

export {
  errorClassFor,
  createVendingError,
  isVendingError,
  hasErrorCode,
  isFatalError,
} from "./registry.js";
