/**
 * Shared decider types for the machine.
 */
import type { DeciderOutput } from "@vending/decider";
import type { DecidableErrorCode } from "../../errors/index.js";
import type { CatalogView } from "../../inventory/index.js";
import type { MachineEvent, DispenseAbortedEvent } from "../events.js";
import type { MachineState } from "../state.js";

/**
 * What every machine decider reads: the current state and a read-only
 * catalog.
 */
export interface MachineDeciderState {
  machine: MachineState;
  catalog: CatalogView;
}

/**
 * Output of a machine decider. The state update is always the complete
 * next state.
 */
export type MachineDeciderOutput<TEvent extends MachineEvent, TData> = DeciderOutput<
  TEvent,
  TData,
  MachineState,
  DispenseAbortedEvent,
  DecidableErrorCode
>;

// =============================================================================
// Data returned to callers
// =============================================================================

export interface BalanceData {
  balance: number;
}

export interface SelectionConfirmed {
  productId: string;
  productName: string;
  price: number;
  balance: number;
}

export interface DispenseStartedData {
  productId: string;
}

export interface DispenseReceipt {
  productId: string;
  productName: string;
  price: number;
  changeReturned: number;
}

export interface RefundData {
  amountReturned: number;
}

export interface RestockData {
  restocked: Record<string, number>;
}

export interface StateData {
  state: MachineState["name"];
}
