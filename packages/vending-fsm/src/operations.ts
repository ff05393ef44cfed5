/**
 * ## FSM Operations - Functional State Validation
 *
 * Standalone versions of the FSM instance methods, taking the FSM as the
 * first argument. Handy when a check is passed around as a callback.
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `canTransition(fsm, from, to)` | `boolean` | Check if valid |
 * | `assertTransition(fsm, from, to)` | `void` | Throw if invalid |
 * | `validTransitions(fsm, from)` | `TState[]` | List targets |
 * | `isTerminal(fsm, state)` | `boolean` | Check end state |
 * | `isValidState(fsm, state)` | `boolean` | Type guard |
 * | `accepts(fsm, state, command)` | `boolean` | Command table lookup |
 * | `assertAccepts(fsm, state, command)` | `void` | Throw if not accepted |
 */

import type { FSM } from "./types.js";

/**
 * Check if a transition from one state to another is valid.
 */
export function canTransition<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  from: TState,
  to: TState
): boolean {
  return fsm.canTransition(from, to);
}

/**
 * Assert that a transition is valid, throwing if not.
 *
 * @throws FSMTransitionError if transition is not allowed
 */
export function assertTransition<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  from: TState,
  to: TState
): void {
  fsm.assertTransition(from, to);
}

/**
 * Get all valid target states from a given state.
 */
export function validTransitions<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  from: TState
): readonly TState[] {
  return fsm.validTransitions(from);
}

export function isTerminal<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  state: TState
): boolean {
  return fsm.isTerminal(state);
}

export function isValidState<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  state: string
): state is TState {
  return fsm.isValidState(state);
}

/**
 * Check whether `state` accepts `command`.
 */
export function accepts<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  state: TState,
  command: TCommand
): boolean {
  return fsm.accepts(state, command);
}

/**
 * @throws FSMCommandError if the command is not accepted
 */
export function assertAccepts<TState extends string, TCommand extends string>(
  fsm: FSM<TState, TCommand>,
  state: TState,
  command: TCommand
): void {
  fsm.assertAccepts(state, command);
}
