import { success, type DeciderContext } from "@vending/decider";
import type { MachineShutDownEvent, MaintenanceStartedEvent } from "../events.js";
import type { MachineState } from "../state.js";
import { guardCommand } from "./guard.js";
import type { MachineDeciderOutput, MachineDeciderState, StateData } from "./types.js";

/**
 * Take the machine out of service. A no-op when already `out_of_order`.
 */
export function decideShutdown(
  state: MachineDeciderState,
  _command: Record<string, never>,
  _context: DeciderContext
): MachineDeciderOutput<MachineShutDownEvent, StateData> {
  const refusal = guardCommand(state.machine, "shutdown");
  if (refusal) {
    return refusal;
  }

  const event: MachineShutDownEvent = {
    eventType: "MachineShutDown",
    payload: { previousState: state.machine.name },
  };
  const next: MachineState = { name: "out_of_order" };
  const data: StateData = { state: next.name };
  return success({ data, event, stateUpdate: next });
}

/**
 * Open the service door without restocking.
 */
export function decideBeginMaintenance(
  state: MachineDeciderState,
  _command: Record<string, never>,
  _context: DeciderContext
): MachineDeciderOutput<MaintenanceStartedEvent, StateData> {
  const refusal = guardCommand(state.machine, "beginMaintenance");
  if (refusal) {
    return refusal;
  }

  const event: MaintenanceStartedEvent = {
    eventType: "MaintenanceStarted",
    payload: { previousState: state.machine.name },
  };
  const next: MachineState = { name: "maintenance" };
  const data: StateData = { state: next.name };
  return success({ data, event, stateUpdate: next });
}
