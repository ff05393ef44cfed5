/**
 * ## Invariants - Declarative Business Rules
 *
 * One configuration object yields `check()`, `assert()` and `validate()`,
 * so deciders (which reject) and the inventory (which throws) share the
 * same rule and the same message.
 *
 * @example
 * ```typescript
 * const productIsKnown = createInvariant<CatalogView, [string], "UNKNOWN_PRODUCT">({
 *   name: "productIsKnown",
 *   check: (catalog, productId) => catalog.has(productId),
 *   message: (_catalog, productId) => `Unknown product "${productId}"`,
 *   context: (_catalog, productId) => ({ productId }),
 * }, UnknownProductError);
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { VendingErrorClass, VendingErrorCode } from "../errors/index.js";
import type { Invariant, InvariantResult } from "./types.js";

/**
 * @typeParam TState - The state type being validated
 * @typeParam TParams - Additional parameters beyond state
 */
export interface InvariantConfig<TState, TParams extends unknown[] = []> {
  name: string;

  /** Returns true when the rule holds */
  check: (state: TState, ...params: TParams) => boolean;

  message: (state: TState, ...params: TParams) => string;

  context?: (state: TState, ...params: TParams) => UnknownRecord;
}

export function createInvariant<
  TState,
  TParams extends unknown[] = [],
  TCode extends VendingErrorCode = VendingErrorCode,
>(
  config: InvariantConfig<TState, TParams>,
  ErrorClass: VendingErrorClass<TCode>
): Invariant<TState, TParams, TCode> {
  const { name, check, message, context } = config;
  const code = ErrorClass.code;

  return {
    name,
    code,

    check(state: TState, ...params: TParams): boolean {
      return check(state, ...params);
    },

    assert(state: TState, ...params: TParams): void {
      if (!check(state, ...params)) {
        throw new ErrorClass(message(state, ...params), context?.(state, ...params));
      }
    },

    validate(state: TState, ...params: TParams): InvariantResult<TCode> {
      if (check(state, ...params)) {
        return { valid: true };
      }

      const errorMessage = message(state, ...params);
      const errorContext = context?.(state, ...params);

      if (errorContext !== undefined) {
        return { valid: false, code, message: errorMessage, context: errorContext };
      }
      return { valid: false, code, message: errorMessage };
    },
  };
}
