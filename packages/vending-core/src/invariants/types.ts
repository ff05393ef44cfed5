/**
 * Types for declarative business rules.
 *
 * @example
 * ```typescript
 * productIsKnown.check(catalog, "cola");    // boolean
 * productIsKnown.assert(catalog, "cola");   // throws UnknownProductError
 * productIsKnown.validate(catalog, "cola"); // InvariantResult
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { VendingErrorCode } from "../errors/index.js";

/**
 * A single rule that can be checked against state.
 *
 * @typeParam TState - The state type being validated
 * @typeParam TParams - Additional parameters beyond state (default: none)
 * @typeParam TCode - Code of the error raised on violation
 */
export interface Invariant<
  TState,
  TParams extends unknown[] = [],
  TCode extends VendingErrorCode = VendingErrorCode,
> {
  readonly name: string;

  readonly code: TCode;

  /**
   * Non-throwing check.
   */
  check(state: TState, ...params: TParams): boolean;

  /**
   * @throws the invariant's error class on violation
   */
  assert(state: TState, ...params: TParams): void;

  /**
   * Non-throwing check with violation details, for deciders that turn a
   * violation into a rejection.
   */
  validate(state: TState, ...params: TParams): InvariantResult<TCode>;
}

export type InvariantResult<TCode extends VendingErrorCode = VendingErrorCode> =
  | { valid: true }
  | { valid: false; code: TCode; message: string; context?: UnknownRecord };
