/**
 * Pure machine deciders.
 *
 * One function per command, plus `decideMachineCommand` which dispatches
 * on the command type and `machineDecider` pairing it with `evolve`.
 */
import type { Decider, DeciderContext } from "@vending/decider";
import type { DecidableErrorCode } from "../../errors/index.js";
import { assertNever } from "../../types.js";
import type { MachineCommand } from "../commands.js";
import type { DispenseAbortedEvent, MachineEvent } from "../events.js";
import type { MachineState } from "../state.js";
import { decideInsertCoin } from "./insertCoin.js";
import { decideSelectProduct } from "./selectProduct.js";
import { decideDispense, decideCompleteDispense } from "./dispense.js";
import { decideRefund } from "./refund.js";
import { decideRestock } from "./restock.js";
import { decideShutdown, decideBeginMaintenance } from "./shutdown.js";
import { evolveMachine, replayMachineState } from "./evolve.js";
import type {
  BalanceData,
  DispenseStartedData,
  MachineDeciderOutput,
  MachineDeciderState,
  RefundData,
  RestockData,
  SelectionConfirmed,
  StateData,
} from "./types.js";

export type MachineCommandData =
  | BalanceData
  | SelectionConfirmed
  | DispenseStartedData
  | RefundData
  | RestockData
  | StateData;

/**
 * Decide any command. `dispense` yields only the first step (into
 * `dispensing`); completing it is `decideCompleteDispense`.
 */
export function decideMachineCommand(
  state: MachineDeciderState,
  command: MachineCommand,
  context: DeciderContext
): MachineDeciderOutput<MachineEvent, MachineCommandData> {
  switch (command.type) {
    case "insertCoin":
      return decideInsertCoin(state, command, context);
    case "selectProduct":
      return decideSelectProduct(state, command, context);
    case "dispense":
      return decideDispense(state, {}, context);
    case "refund":
      return decideRefund(state, {}, context);
    case "restock":
      return decideRestock(state, { quantities: command.quantities }, context);
    case "shutdown":
      return decideShutdown(state, {}, context);
    case "beginMaintenance":
      return decideBeginMaintenance(state, {}, context);
    default:
      return assertNever(command);
  }
}

export const machineDecider: Decider<
  MachineDeciderState,
  MachineCommand,
  MachineEvent,
  MachineCommandData,
  MachineState,
  DispenseAbortedEvent,
  DecidableErrorCode
> = {
  decide: decideMachineCommand,
  evolve: (state, event) => ({ ...state, machine: evolveMachine(state.machine, event) }),
};

export {
  decideInsertCoin,
  decideSelectProduct,
  decideDispense,
  decideCompleteDispense,
  decideRefund,
  decideRestock,
  decideShutdown,
  decideBeginMaintenance,
  evolveMachine,
  replayMachineState,
};
export { guardCommand, guardInput } from "./guard.js";
export type {
  MachineDeciderState,
  MachineDeciderOutput,
  BalanceData,
  SelectionConfirmed,
  DispenseStartedData,
  DispenseReceipt,
  RefundData,
  RestockData,
  StateData,
} from "./types.js";
