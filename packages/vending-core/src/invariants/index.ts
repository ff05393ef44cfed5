export type { Invariant, InvariantResult } from "./types.js";
export { createInvariant, type InvariantConfig } from "./createInvariant.js";
