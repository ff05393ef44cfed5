/**
 * ## defineFSM - Command-Aware State Machine Factory
 *
 * Builds an FSM instance from a definition. State and command lookups are
 * pre-computed into sets so every check is O(1).
 *
 * ### FSM Instance Methods
 *
 * | Method | Returns | Purpose |
 * |--------|---------|---------|
 * | `canTransition(from, to)` | `boolean` | Check if transition valid |
 * | `assertTransition(from, to)` | `void` | Throw if invalid |
 * | `validTransitions(from)` | `TState[]` | List valid targets |
 * | `isTerminal(state)` | `boolean` | No outgoing transitions |
 * | `isTransient(state)` | `boolean` | Exists only inside one command |
 * | `isValidState(state)` | `boolean` | Type guard for state |
 * | `accepts(state, command)` | `boolean` | Command table lookup |
 * | `assertAccepts(state, command)` | `void` | Throw if not accepted |
 * | `acceptedCommands(state)` | `TCommand[]` | Commands for a state |
 *
 * ### Integration with Deciders
 *
 * ```typescript
 * if (!machineFSM.accepts(state.name, "dispense")) {
 *   return rejected("INVALID_COMMAND_FOR_STATE", `Cannot dispense while ${state.name}`);
 * }
 * ```
 */

import type { FSM, FSMDefinition } from "./types.js";
import { FSMCommandError, FSMTransitionError } from "./types.js";

/**
 * Create a type-safe FSM from a definition.
 *
 * Every target listed in `transitions` and every entry in `transient` must
 * itself be a state of the definition.
 *
 * @throws Error if the definition references an undeclared state
 */
export function defineFSM<TState extends string, TCommand extends string = string>(
  definition: FSMDefinition<TState, TCommand>
): FSM<TState, TCommand> {
  const validStates = new Set<string>(Object.keys(definition.transitions));
  const transientStates = new Set<string>(definition.transient ?? []);

  const acceptedByState = new Map<string, ReadonlySet<string>>();
  for (const [state, commands] of Object.entries<readonly string[]>(definition.commands)) {
    if (!validStates.has(state)) {
      throw new Error(`FSM definition: commands listed for undeclared state "${state}"`);
    }
    acceptedByState.set(state, new Set(commands));
  }

  for (const [from, targets] of Object.entries<readonly string[]>(definition.transitions)) {
    for (const to of targets) {
      if (!validStates.has(to)) {
        throw new Error(`FSM definition: "${from}" targets undeclared state "${to}"`);
      }
    }
  }
  for (const state of transientStates) {
    if (!validStates.has(state)) {
      throw new Error(`FSM definition: transient state "${state}" is not declared`);
    }
    if ((acceptedByState.get(state)?.size ?? 0) > 0) {
      throw new Error(`FSM definition: transient state "${state}" must not accept commands`);
    }
  }
  if (!validStates.has(definition.initial)) {
    throw new Error(`FSM definition: initial state "${definition.initial}" is not declared`);
  }

  const fsm: FSM<TState, TCommand> = {
    definition,
    initial: definition.initial,

    canTransition(from: TState, to: TState): boolean {
      const allowed = definition.transitions[from];
      if (!allowed) return false;
      return allowed.includes(to);
    },

    assertTransition(from: TState, to: TState): void {
      const allowed = definition.transitions[from];
      if (!allowed || !allowed.includes(to)) {
        throw new FSMTransitionError(from, to, allowed ?? []);
      }
    },

    validTransitions(from: TState): readonly TState[] {
      return definition.transitions[from] ?? [];
    },

    isTerminal(state: TState): boolean {
      const allowed = definition.transitions[state];
      return !allowed || allowed.length === 0;
    },

    isTransient(state: TState): boolean {
      return transientStates.has(state);
    },

    isValidState(state: string): state is TState {
      return validStates.has(state);
    },

    accepts(state: TState, command: TCommand): boolean {
      return acceptedByState.get(state)?.has(command) ?? false;
    },

    assertAccepts(state: TState, command: TCommand): void {
      if (!fsm.accepts(state, command)) {
        throw new FSMCommandError(state, command, fsm.acceptedCommands(state));
      }
    },

    acceptedCommands(state: TState): readonly TCommand[] {
      return definition.commands[state] ?? [];
    },
  };

  return fsm;
}
