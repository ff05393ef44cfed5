export { TransactionLog, DEFAULT_MAX_ENTRIES, type TransactionLogOptions } from "./TransactionLog.js";
export type { TransactionLogEntry, NewTransactionLogEntry } from "./types.js";
