import { success, type DeciderContext } from "@vending/decider";
import type { RefundIssuedEvent } from "../events.js";
import { READY, balanceOf } from "../state.js";
import { guardCommand } from "./guard.js";
import type { MachineDeciderOutput, MachineDeciderState, RefundData } from "./types.js";

/**
 * Return the whole balance and drop any selection. In `ready` this is a
 * recorded no-op returning 0.
 */
export function decideRefund(
  state: MachineDeciderState,
  _command: Record<string, never>,
  _context: DeciderContext
): MachineDeciderOutput<RefundIssuedEvent, RefundData> {
  const refusal = guardCommand(state.machine, "refund");
  if (refusal) {
    return refusal;
  }

  const amountReturned = balanceOf(state.machine);
  const event: RefundIssuedEvent = { eventType: "RefundIssued", payload: { amountReturned } };
  return success({ data: { amountReturned }, event, stateUpdate: READY });
}
