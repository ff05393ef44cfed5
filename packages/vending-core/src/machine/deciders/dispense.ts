/**
 * Dispensing runs in two decisions with the transient `dispensing` state
 * committed in between:
 *
 * 1. `decideDispense`: product_selected → dispensing
 * 2. `decideCompleteDispense`: dispensing → ready (product released,
 *    change reported) or back to product_selected when the product sold
 *    out in the meantime. The balance survives an abort.
 */
import {
  failed,
  rejected,
  success,
  type DeciderContext,
  type DeciderRejected,
  type DeciderSuccess,
} from "@vending/decider";
import type { DecidableErrorCode } from "../../errors/index.js";
import { productIsInStock } from "../../inventory/index.js";
import type { DispenseAbortedEvent, DispenseStartedEvent, ProductDispensedEvent } from "../events.js";
import { READY, type MachineState } from "../state.js";
import { guardCommand } from "./guard.js";
import type {
  DispenseReceipt,
  DispenseStartedData,
  MachineDeciderOutput,
  MachineDeciderState,
} from "./types.js";

export function decideDispense(
  state: MachineDeciderState,
  _command: Record<string, never>,
  _context: DeciderContext
):
  | DeciderSuccess<DispenseStartedEvent, DispenseStartedData, MachineState>
  | DeciderRejected<DecidableErrorCode> {
  const refusal = guardCommand(state.machine, "dispense");
  if (refusal) {
    return refusal;
  }

  const { machine } = state;
  if (machine.name !== "product_selected") {
    return rejected("INVALID_COMMAND_FOR_STATE", `Nothing selected to dispense in "${machine.name}"`, {
      state: machine.name,
    });
  }

  const event: DispenseStartedEvent = {
    eventType: "DispenseStarted",
    payload: { productId: machine.selection, balance: machine.balance },
  };
  const next: MachineState = {
    name: "dispensing",
    balance: machine.balance,
    selection: machine.selection,
  };
  return success({ data: { productId: machine.selection }, event, stateUpdate: next });
}

export function decideCompleteDispense(
  state: MachineDeciderState,
  _command: Record<string, never>,
  _context: DeciderContext
): MachineDeciderOutput<ProductDispensedEvent, DispenseReceipt> {
  const { machine, catalog } = state;
  if (machine.name !== "dispensing") {
    return rejected(
      "INVALID_COMMAND_FOR_STATE",
      `Dispense can only complete from "dispensing", not "${machine.name}"`,
      { state: machine.name }
    );
  }

  const { balance, selection } = machine;
  const product = catalog.get(selection);
  const inStock = productIsInStock.validate(catalog, selection);

  if (!product || !inStock.valid) {
    const reason = inStock.valid || !product ? `Unknown product "${selection}"` : inStock.message;
    const abort: DispenseAbortedEvent = {
      eventType: "DispenseAborted",
      payload: { productId: selection, balance, reason },
    };
    const back: MachineState = { name: "product_selected", balance, selection };
    return failed({
      code: product ? "OUT_OF_STOCK" : "UNKNOWN_PRODUCT",
      reason,
      event: abort,
      stateUpdate: back,
      context: { productId: selection, balance },
    });
  }

  const changeReturned = balance - product.price;
  const event: ProductDispensedEvent = {
    eventType: "ProductDispensed",
    payload: {
      productId: product.id,
      productName: product.name,
      price: product.price,
      balance,
      changeReturned,
    },
  };
  return success({
    data: {
      productId: product.id,
      productName: product.name,
      price: product.price,
      changeReturned,
    },
    event,
    stateUpdate: READY,
  });
}
