/**
 * Machine state as a tagged union. Balance and selection live on the
 * variants that may carry them, so a non-zero balance in `ready` cannot
 * be expressed.
 */
import { assertNever } from "../types.js";

export type MachineState =
  | { readonly name: "ready" }
  | { readonly name: "coin_inserted"; readonly balance: number }
  | { readonly name: "product_selected"; readonly balance: number; readonly selection: string }
  | { readonly name: "dispensing"; readonly balance: number; readonly selection: string }
  | { readonly name: "maintenance" }
  | { readonly name: "out_of_order" };

export type MachineStateName = MachineState["name"];

export const MACHINE_STATES = [
  "ready",
  "coin_inserted",
  "product_selected",
  "dispensing",
  "maintenance",
  "out_of_order",
] as const satisfies readonly MachineStateName[];

export const READY: MachineState = Object.freeze({ name: "ready" });

export function balanceOf(state: MachineState): number {
  switch (state.name) {
    case "coin_inserted":
    case "product_selected":
    case "dispensing":
      return state.balance;
    case "ready":
    case "maintenance":
    case "out_of_order":
      return 0;
    default:
      return assertNever(state);
  }
}

export function selectionOf(state: MachineState): string | null {
  switch (state.name) {
    case "product_selected":
    case "dispensing":
      return state.selection;
    case "ready":
    case "coin_inserted":
    case "maintenance":
    case "out_of_order":
      return null;
    default:
      return assertNever(state);
  }
}
