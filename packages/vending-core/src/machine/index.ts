export { MachineController } from "./MachineController.js";
export type {
  MachineControllerOptions,
  MachineStatus,
  StateChange,
  StateListener,
} from "./MachineController.js";
export { MachineCommandQueue, type MachineCommandQueueOptions } from "./MachineCommandQueue.js";
export { machineFSM } from "./machineFSM.js";
export {
  READY,
  MACHINE_STATES,
  balanceOf,
  selectionOf,
  type MachineState,
  type MachineStateName,
} from "./state.js";
export {
  MACHINE_COMMANDS,
  InsertCoinSchema,
  SelectProductSchema,
  RestockSchema,
  type MachineCommand,
  type MachineCommandName,
  type InsertCoinCommand,
  type SelectProductCommand,
  type DispenseCommand,
  type RefundCommand,
  type RestockCommand,
  type ShutdownCommand,
  type BeginMaintenanceCommand,
} from "./commands.js";
export {
  MachineEventTypes,
  type MachineEvent,
  type MachineEventType,
  type CoinInsertedEvent,
  type ProductSelectedEvent,
  type DispenseStartedEvent,
  type ProductDispensedEvent,
  type DispenseAbortedEvent,
  type RefundIssuedEvent,
  type RestockCompletedEvent,
  type MachineShutDownEvent,
  type MaintenanceStartedEvent,
} from "./events.js";
export { describeEvent } from "./details.js";
export {
  successResult,
  rejectedResult,
  failedResult,
  isCommandSuccess,
  unwrap,
  toErrorResponse,
  type CommandResult,
  type CommandSuccess,
  type CommandRejected,
  type CommandFailed,
  type ErrorResponse,
} from "./results.js";
export * from "./deciders/index.js";
