/**
 * @vending/core
 *
 * Vending machine controller: inventory, transaction log, pure deciders,
 * the MachineController and its command queue, plus the logging, error
 * and configuration layers they share.
 *
 * @module @vending/core
 */

export type { UnknownRecord } from "./types.js";
export { assertNever } from "./types.js";
export { generateCommandId, generateEntryId } from "./ids.js";

export * from "./logging/index.js";
export * from "./errors/index.js";
export * from "./invariants/index.js";
export * from "./inventory/index.js";
export * from "./transactions/index.js";
export * from "./machine/index.js";
export * from "./config/index.js";
export {
  createVendingMachine,
  type VendingMachine,
  type VendingMachineOptions,
} from "./factory.js";
