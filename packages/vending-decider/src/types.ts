/**
 * ## Decider Pattern - Pure Command Decisions
 *
 * A decider takes the current state and a command and returns what should
 * happen, without doing it. The caller (a controller, a handler) applies
 * the outcome: it commits the state update, performs side effects named by
 * the event and records the event.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `DeciderOutput` | Union of success, rejected, or failed |
 * | `DeciderSuccess` | Event, data for the caller, and the state update |
 * | `DeciderRejected` | Command refused; nothing is recorded |
 * | `DeciderFailed` | Business failure that is still recorded as an event |
 * | `DeciderContext` | Timestamp and command id supplied by the caller |
 *
 * ### Helper Functions
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `success()` | `DeciderSuccess` | Build successful output |
 * | `rejected()` | `DeciderRejected` | Build a refusal with a typed code |
 * | `failed()` | `DeciderFailed` | Build a recorded business failure |
 * | `isSuccess()` / `isRejected()` / `isFailed()` | `boolean` | Type guards |
 *
 * ### Decider vs Controller
 *
 * | Concern | Decider (**Pure**) | Controller (Effectful) |
 * |---------|-------------------|------------------------|
 * | I/O | None | Inventory, log, listeners |
 * | Testability | Unit tests | Scenario tests |
 * | Returns | `DeciderOutput` | `CommandResult` |
 *
 * @example
 * ```typescript
 * export function decideRefund(
 *   state: MachineState,
 *   _command: RefundCommand,
 *   _context: DeciderContext
 * ): DeciderOutput<RefundIssuedEvent, RefundData, MachineState, never, MachineErrorCode> {
 *   if (state.name === "maintenance") {
 *     return rejected("INVALID_COMMAND_FOR_STATE", "Cannot refund during maintenance");
 *   }
 *   return success({
 *     data: { amountReturned: state.balance },
 *     event: { eventType: "RefundIssued", payload: { amount: state.balance } },
 *     stateUpdate: { name: "ready" },
 *   });
 * }
 * ```
 *
 * @module @vending/decider
 */

/**
 * Alias for Record<string, unknown>, used for error context and payloads
 * whose shape is not known statically.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Base type for event payloads.
 *
 * `object` rather than `UnknownRecord` so that concrete payload interfaces
 * fit without an index signature.
 */
export type EventPayload = object;

/**
 * Event produced by a decider.
 *
 * @typeParam TPayload - The typed event payload
 * @typeParam TType - The event type name literal
 */
export interface DeciderEvent<TPayload extends EventPayload = EventPayload, TType extends string = string> {
  /**
   * Event type name (e.g., "CoinInserted").
   */
  eventType: TType;

  payload: TPayload;
}

/**
 * Successful decider output.
 *
 * @typeParam TEvent - The event type with typed payload
 * @typeParam TData - Data returned to the caller
 * @typeParam TStateUpdate - What the caller commits as the new state
 */
export interface DeciderSuccess<
  TEvent extends DeciderEvent = DeciderEvent,
  TData = UnknownRecord,
  TStateUpdate = UnknownRecord,
> {
  status: "success";

  data: TData;

  event: TEvent;

  /**
   * State to commit. May be a partial update or a whole replacement state,
   * depending on the decider family.
   */
  stateUpdate: TStateUpdate;
}

/**
 * Rejected decider output. Nothing is committed and nothing is recorded.
 *
 * @typeParam TCode - Error code union of the calling domain
 */
export interface DeciderRejected<TCode extends string = string> {
  status: "rejected";

  /**
   * Error code (e.g., "INSUFFICIENT_FUNDS").
   */
  code: TCode;

  message: string;

  context?: UnknownRecord;
}

/**
 * Failed decider output: a business failure that is still recorded.
 *
 * Unlike a rejection, a failure carries an event and may carry a state
 * update (for example, returning a machine from a transient state).
 *
 * @typeParam TEvent - The failure event type
 * @typeParam TStateUpdate - State to commit alongside the failure event
 * @typeParam TCode - Error code reported to the caller
 */
export interface DeciderFailed<
  TEvent extends DeciderEvent = DeciderEvent,
  TStateUpdate = UnknownRecord,
  TCode extends string = string,
> {
  status: "failed";

  code: TCode;

  reason: string;

  event: TEvent;

  stateUpdate: TStateUpdate;

  context?: UnknownRecord;
}

/**
 * Combined output type from a decider function.
 *
 * @typeParam TEvent - Event type for success
 * @typeParam TData - Success data type
 * @typeParam TStateUpdate - State update type (shared by success and failure)
 * @typeParam TFailEvent - Event type for failures
 * @typeParam TCode - Error code union for rejections and failures
 */
export type DeciderOutput<
  TEvent extends DeciderEvent = DeciderEvent,
  TData = UnknownRecord,
  TStateUpdate = UnknownRecord,
  TFailEvent extends DeciderEvent = DeciderEvent,
  TCode extends string = string,
> =
  | DeciderSuccess<TEvent, TData, TStateUpdate>
  | DeciderRejected<TCode>
  | DeciderFailed<TFailEvent, TStateUpdate, TCode>;

/**
 * Context supplied by the caller so the decider stays deterministic.
 */
export interface DeciderContext {
  /**
   * Current timestamp (ms since epoch).
   */
  now: number;

  /**
   * Id of the command being decided, for causation tracking.
   */
  commandId: string;
}

/**
 * A pure decider function.
 *
 * Must be pure: no side effects, no I/O, deterministic for same inputs.
 */
export type DeciderFn<
  TState,
  TCommand,
  TEvent extends DeciderEvent,
  TData,
  TStateUpdate,
  TFailEvent extends DeciderEvent = DeciderEvent,
  TCode extends string = string,
> = (
  state: TState,
  command: TCommand,
  context: DeciderContext
) => DeciderOutput<TEvent, TData, TStateUpdate, TFailEvent, TCode>;

/**
 * Full Decider definition with decide and evolve functions.
 *
 * `evolve` rebuilds state from recorded events; for any success or failure
 * output, `evolve(state, output.event)` must equal `output.stateUpdate`
 * applied to `state`.
 */
export interface Decider<
  TState,
  TCommand,
  TEvent extends DeciderEvent,
  TData = UnknownRecord,
  TStateUpdate = Partial<TState>,
  TFailEvent extends DeciderEvent = DeciderEvent,
  TCode extends string = string,
> {
  decide: DeciderFn<TState, TCommand, TEvent, TData, TStateUpdate, TFailEvent, TCode>;

  evolve: (state: TState, event: TEvent | TFailEvent) => TState;
}

// =============================================================================
// Helper Functions for Creating Outputs
// =============================================================================

/**
 * Create a success output.
 *
 * @example
 * ```typescript
 * return success({
 *   data: { balance: 150 },
 *   event: { eventType: "CoinInserted", payload: { amount: 50, balance: 150 } },
 *   stateUpdate: { name: "coin_inserted", balance: 150 },
 * });
 * ```
 */
export function success<TEvent extends DeciderEvent, TData, TStateUpdate>(
  output: Omit<DeciderSuccess<TEvent, TData, TStateUpdate>, "status">
): DeciderSuccess<TEvent, TData, TStateUpdate> {
  return { status: "success", ...output };
}

/**
 * Create a rejected output.
 *
 * @example
 * ```typescript
 * return rejected("UNKNOWN_PRODUCT", `Unknown product "${productId}"`, { productId });
 * ```
 */
export function rejected<TCode extends string>(
  code: TCode,
  message: string,
  context?: UnknownRecord
): DeciderRejected<TCode> {
  const result: DeciderRejected<TCode> = { status: "rejected", code, message };
  if (context !== undefined) {
    result.context = context;
  }
  return result;
}

/**
 * Create a failed output (recorded business failure).
 *
 * @example
 * ```typescript
 * return failed({
 *   code: "OUT_OF_STOCK",
 *   reason: "cola sold out during dispense",
 *   event: { eventType: "DispenseAborted", payload: { productId: "cola" } },
 *   stateUpdate: { name: "product_selected", balance, selection: "cola" },
 * });
 * ```
 */
export function failed<TEvent extends DeciderEvent, TStateUpdate, TCode extends string>(
  output: Omit<DeciderFailed<TEvent, TStateUpdate, TCode>, "status">
): DeciderFailed<TEvent, TStateUpdate, TCode> {
  return { status: "failed", ...output };
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSuccess<
  TEvent extends DeciderEvent,
  TData,
  TStateUpdate,
  TFailEvent extends DeciderEvent,
  TCode extends string,
>(
  output: DeciderOutput<TEvent, TData, TStateUpdate, TFailEvent, TCode>
): output is DeciderSuccess<TEvent, TData, TStateUpdate> {
  return output.status === "success";
}

export function isRejected<
  TEvent extends DeciderEvent,
  TData,
  TStateUpdate,
  TFailEvent extends DeciderEvent,
  TCode extends string,
>(
  output: DeciderOutput<TEvent, TData, TStateUpdate, TFailEvent, TCode>
): output is DeciderRejected<TCode> {
  return output.status === "rejected";
}

export function isFailed<
  TEvent extends DeciderEvent,
  TData,
  TStateUpdate,
  TFailEvent extends DeciderEvent,
  TCode extends string,
>(
  output: DeciderOutput<TEvent, TData, TStateUpdate, TFailEvent, TCode>
): output is DeciderFailed<TFailEvent, TStateUpdate, TCode> {
  return output.status === "failed";
}
