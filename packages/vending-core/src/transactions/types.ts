/**
 * One audited command outcome. Frozen once appended.
 */
export interface TransactionLogEntry {
  /** 1-based, gap-free */
  readonly sequence: number;
  readonly entryId: string;
  readonly commandId: string;
  /** ms since epoch */
  readonly timestamp: number;
  /** Command name (e.g., "dispense") */
  readonly command: string;
  /** Recorded event (e.g., "ProductDispensed", "DispenseAborted") */
  readonly eventType: string;
  readonly resultingState: string;
  readonly detail: string;
}

/**
 * Fields the caller supplies; the log assigns `sequence` and `entryId`.
 */
export type NewTransactionLogEntry = Omit<TransactionLogEntry, "sequence" | "entryId">;
