/**
 * ## Transaction Log
 *
 * Append-only audit trail with a fixed capacity. Entries are never
 * removed or rewritten. Running out of capacity is fatal: the machine
 * must not act on a command it cannot record, so callers reserve room
 * with `ensureCapacity` before applying any effect.
 */

import { generateEntryId } from "../ids.js";
import { InvalidInputError, TransactionLogCapacityError } from "../errors/index.js";
import type { NewTransactionLogEntry, TransactionLogEntry } from "./types.js";

export const DEFAULT_MAX_ENTRIES = 10_000;

export interface TransactionLogOptions {
  maxEntries?: number;
  /** Override for deterministic ids in tests */
  generateId?: () => string;
}

export class TransactionLog {
  private readonly entries: TransactionLogEntry[] = [];
  private readonly maxEntries: number;
  private readonly generateId: () => string;

  constructor(options: TransactionLogOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.generateId = options.generateId ?? generateEntryId;

    if (!Number.isInteger(this.maxEntries) || this.maxEntries <= 0) {
      throw new InvalidInputError(
        `Transaction log capacity must be a positive integer, got ${this.maxEntries}`,
        { maxEntries: this.maxEntries }
      );
    }
  }

  get size(): number {
    return this.entries.length;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  get remaining(): number {
    return this.maxEntries - this.entries.length;
  }

  /**
   * @throws TransactionLogCapacityError when `count` more entries would not fit
   */
  ensureCapacity(count = 1): void {
    if (count > this.remaining) {
      throw new TransactionLogCapacityError(
        `Transaction log is full: ${this.entries.length}/${this.maxEntries} entries, ${count} requested`,
        { size: this.entries.length, capacity: this.maxEntries, requested: count }
      );
    }
  }

  /**
   * Append an entry and return it frozen.
   *
   * @throws TransactionLogCapacityError at capacity
   */
  append(entry: NewTransactionLogEntry): TransactionLogEntry {
    this.ensureCapacity(1);

    const stored: TransactionLogEntry = Object.freeze({
      sequence: this.entries.length + 1,
      entryId: this.generateId(),
      commandId: entry.commandId,
      timestamp: entry.timestamp,
      command: entry.command,
      eventType: entry.eventType,
      resultingState: entry.resultingState,
      detail: entry.detail,
    });
    this.entries.push(stored);
    return stored;
  }

  /**
   * Last `n` entries, oldest first. Asking for more than exist returns all.
   *
   * @throws InvalidInputError unless `n` is a non-negative integer
   */
  queryRecent(n: number): TransactionLogEntry[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidInputError(`Entry count must be a non-negative integer, got ${n}`, { n });
    }
    if (n === 0) {
      return [];
    }
    return this.entries.slice(-n);
  }

  all(): TransactionLogEntry[] {
    return [...this.entries];
  }
}
