/**
 * Pure decision functions for command handling.
 *
 * @example
 * ```typescript
 * import { success, rejected, isSuccess, type DeciderOutput } from "@vending/decider";
 *
 * const result = decideInsertCoin(state, { amount: 100 }, context);
 * if (isSuccess(result)) {
 *   commit(result.stateUpdate);
 * }
 * ```
 *
 * @module @vending/decider
 */

// Types
export type {
  UnknownRecord,
  EventPayload,
  DeciderEvent,
  DeciderSuccess,
  DeciderRejected,
  DeciderFailed,
  DeciderOutput,
  DeciderContext,
  DeciderFn,
  Decider,
} from "./types.js";

// Helper Functions
export { success, rejected, failed } from "./types.js";

// Type Guards
export { isSuccess, isRejected, isFailed } from "./types.js";
