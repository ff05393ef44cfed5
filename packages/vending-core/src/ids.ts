/**
 * UUID v7 prefixed ID generation.
 *
 * ID Format: {prefix}_{uuidv7}
 * Example: cmd_0190a7c4-1234-7abc-8def-1234567890ab
 *
 * UUID v7 is time-ordered, so ids sort in creation order.
 */
import { v7 as uuidv7 } from "uuid";

/**
 * Id assigned to each command the controller handles.
 */
export function generateCommandId(): string {
  return `cmd_${uuidv7()}`;
}

/**
 * Id assigned to each transaction log entry.
 */
export function generateEntryId(): string {
  return `txn_${uuidv7()}`;
}
