/**
 * Events the deciders emit. Each one names the effect the controller
 * performs and carries enough to rebuild the next state on replay.
 */
import type { DeciderEvent } from "@vending/decider";
import type { RestockReport } from "../inventory/index.js";
import type { MachineStateName } from "./state.js";

export const MachineEventTypes = {
  COIN_INSERTED: "CoinInserted",
  PRODUCT_SELECTED: "ProductSelected",
  DISPENSE_STARTED: "DispenseStarted",
  PRODUCT_DISPENSED: "ProductDispensed",
  DISPENSE_ABORTED: "DispenseAborted",
  REFUND_ISSUED: "RefundIssued",
  RESTOCK_COMPLETED: "RestockCompleted",
  MACHINE_SHUT_DOWN: "MachineShutDown",
  MAINTENANCE_STARTED: "MaintenanceStarted",
} as const;

export type CoinInsertedEvent = DeciderEvent<
  { amount: number; balance: number; selection: string | null },
  "CoinInserted"
>;

export type ProductSelectedEvent = DeciderEvent<
  {
    productId: string;
    productName: string;
    price: number;
    balance: number;
    previousSelection: string | null;
  },
  "ProductSelected"
>;

export type DispenseStartedEvent = DeciderEvent<
  { productId: string; balance: number },
  "DispenseStarted"
>;

export type ProductDispensedEvent = DeciderEvent<
  { productId: string; productName: string; price: number; balance: number; changeReturned: number },
  "ProductDispensed"
>;

export type DispenseAbortedEvent = DeciderEvent<
  { productId: string; balance: number; reason: string },
  "DispenseAborted"
>;

export type RefundIssuedEvent = DeciderEvent<{ amountReturned: number }, "RefundIssued">;

/**
 * `mode: "all"` fills every product to capacity; `mode: "quantities"`
 * adds the listed units only. `restocked` is the resulting report and
 * `via` the states passed through before `ready`.
 */
export type RestockCompletedEvent = DeciderEvent<
  {
    mode: "all" | "quantities";
    restocked: RestockReport;
    via: readonly MachineStateName[];
  },
  "RestockCompleted"
>;

export type MachineShutDownEvent = DeciderEvent<
  { previousState: MachineStateName },
  "MachineShutDown"
>;

export type MaintenanceStartedEvent = DeciderEvent<
  { previousState: MachineStateName },
  "MaintenanceStarted"
>;

export type MachineEvent =
  | CoinInsertedEvent
  | ProductSelectedEvent
  | DispenseStartedEvent
  | ProductDispensedEvent
  | DispenseAbortedEvent
  | RefundIssuedEvent
  | RestockCompletedEvent
  | MachineShutDownEvent
  | MaintenanceStartedEvent;

export type MachineEventType = MachineEvent["eventType"];
