/**
 * Rebuild machine state from recorded events.
 *
 * For every decided event, `evolveMachine(state, event)` equals the
 * decider's `stateUpdate`; replaying a machine's events from `ready`
 * reproduces its state.
 */
import { assertNever } from "../../types.js";
import type { MachineEvent } from "../events.js";
import { READY, type MachineState } from "../state.js";

export function evolveMachine(_state: MachineState, event: MachineEvent): MachineState {
  switch (event.eventType) {
    case "CoinInserted": {
      const { balance, selection } = event.payload;
      return selection === null
        ? { name: "coin_inserted", balance }
        : { name: "product_selected", balance, selection };
    }
    case "ProductSelected":
      return {
        name: "product_selected",
        balance: event.payload.balance,
        selection: event.payload.productId,
      };
    case "DispenseStarted":
      return { name: "dispensing", balance: event.payload.balance, selection: event.payload.productId };
    case "DispenseAborted":
      return {
        name: "product_selected",
        balance: event.payload.balance,
        selection: event.payload.productId,
      };
    case "ProductDispensed":
    case "RefundIssued":
    case "RestockCompleted":
      return READY;
    case "MachineShutDown":
      return { name: "out_of_order" };
    case "MaintenanceStarted":
      return { name: "maintenance" };
    default:
      return assertNever(event);
  }
}

export function replayMachineState(
  events: readonly MachineEvent[],
  initial: MachineState = READY
): MachineState {
  return events.reduce(evolveMachine, initial);
}
