/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout @vending/core.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for log data, error context and other objects whose structure is
 * not known at compile time.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check for switch statements on discriminated unions.
 *
 * @example
 * ```typescript
 * switch (state.name) {
 *   case "ready":
 *     return 0;
 *   // ...
 *   default:
 *     return assertNever(state);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
