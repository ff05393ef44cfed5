/**
 * Finite state machines with an explicit command table.
 *
 * @example
 * ```typescript
 * import { defineFSM, accepts } from "@vending/fsm";
 *
 * type Light = "off" | "on";
 *
 * export const lightFSM = defineFSM<Light, "toggle" | "inspect">({
 *   initial: "off",
 *   transitions: { off: ["on"], on: ["off"] },
 *   commands: { off: ["toggle"], on: ["toggle", "inspect"] },
 * });
 *
 * accepts(lightFSM, "off", "inspect"); // false
 * ```
 *
 * @module @vending/fsm
 */

// Types
export type { FSMDefinition, FSM } from "./types.js";
export { FSMTransitionError, FSMCommandError } from "./types.js";

// Factory
export { defineFSM } from "./defineFSM.js";

// Operations
export {
  canTransition,
  assertTransition,
  validTransitions,
  isTerminal,
  isValidState,
  accepts,
  assertAccepts,
} from "./operations.js";
