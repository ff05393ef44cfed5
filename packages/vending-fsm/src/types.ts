/**
 * ## FSM Types - State Graph Plus Command Table
 *
 * A machine definition carries two tables:
 *
 * - `transitions`: which states may follow which (the state graph)
 * - `commands`: which commands each state accepts (the command table)
 *
 * Keeping both in one definition lets a command handler reject an
 * out-of-state command before it looks at any domain data, and lets tests
 * enumerate the whole matrix.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `FSMDefinition<TState, TCommand>` | initial state, transitions, commands, transient states |
 * | `FSM<TState, TCommand>` | Instance with validation methods |
 * | `FSMTransitionError` | Thrown for an invalid state change |
 * | `FSMCommandError` | Thrown for a command the state does not accept |
 *
 * ### Transient States
 *
 * A transient state is one the machine passes through inside a single
 * command (for example `dispensing`). It accepts no commands; callers that
 * observe it must treat the machine as busy.
 *
 * @example
 * ```typescript
 * type DoorState = "closed" | "open" | "locked";
 * type DoorCommand = "open" | "close" | "lock" | "unlock";
 *
 * const doorFSM = defineFSM<DoorState, DoorCommand>({
 *   initial: "closed",
 *   transitions: {
 *     closed: ["open", "locked"],
 *     open: ["closed"],
 *     locked: ["closed"],
 *   },
 *   commands: {
 *     closed: ["open", "lock"],
 *     open: ["close"],
 *     locked: ["unlock"],
 *   },
 * });
 * ```
 */

/**
 * FSM definition for a set of states with allowed transitions and commands.
 *
 * @typeParam TState - Union of state names (string literals)
 * @typeParam TCommand - Union of command names (string literals)
 */
export interface FSMDefinition<TState extends string, TCommand extends string = string> {
  /**
   * The state a new machine starts in.
   */
  initial: TState;

  /**
   * Map of state → allowed target states.
   * Empty array = terminal state (no outgoing transitions).
   */
  transitions: Record<TState, readonly TState[]>;

  /**
   * Map of state → commands accepted in that state.
   * Empty array = the state accepts nothing.
   */
  commands: Record<TState, readonly TCommand[]>;

  /**
   * States that only exist inside a single command.
   */
  transient?: readonly TState[];
}

/**
 * A complete FSM instance with validation operations.
 *
 * Created by `defineFSM()`.
 */
export interface FSM<TState extends string, TCommand extends string = string> {
  readonly definition: FSMDefinition<TState, TCommand>;

  readonly initial: TState;

  /**
   * Check if a transition from one state to another is valid.
   */
  canTransition(from: TState, to: TState): boolean;

  /**
   * Assert that a transition is valid.
   *
   * @throws FSMTransitionError if transition is not allowed
   */
  assertTransition(from: TState, to: TState): void;

  /**
   * Get all valid target states from a given state.
   */
  validTransitions(from: TState): readonly TState[];

  /**
   * Check if a state is terminal (no outgoing transitions).
   */
  isTerminal(state: TState): boolean;

  /**
   * Check if a state is transient (exists only inside one command).
   */
  isTransient(state: TState): boolean;

  /**
   * Type guard for state names coming from untyped input.
   */
  isValidState(state: string): state is TState;

  /**
   * Check if a state accepts a command.
   */
  accepts(state: TState, command: TCommand): boolean;

  /**
   * Assert that a state accepts a command.
   *
   * @throws FSMCommandError if the command is not accepted
   */
  assertAccepts(state: TState, command: TCommand): void;

  /**
   * Commands accepted in a state, in definition order.
   */
  acceptedCommands(state: TState): readonly TCommand[];
}

/**
 * Error thrown when an invalid FSM transition is attempted.
 */
export class FSMTransitionError extends Error {
  readonly code = "FSM_INVALID_TRANSITION";
  readonly from: string;
  readonly to: string;
  readonly validTransitions: readonly string[];

  constructor(from: string, to: string, validTransitions: readonly string[]) {
    const validList =
      validTransitions.length > 0 ? validTransitions.join(", ") : "(none - terminal state)";
    super(`Invalid transition from "${from}" to "${to}". Valid transitions: ${validList}`);
    this.name = "FSMTransitionError";
    this.from = from;
    this.to = to;
    this.validTransitions = validTransitions;
    Object.setPrototypeOf(this, FSMTransitionError.prototype);
  }
}

/**
 * Error thrown when a state is asked to run a command it does not accept.
 */
export class FSMCommandError extends Error {
  readonly code = "FSM_COMMAND_NOT_ACCEPTED";
  readonly state: string;
  readonly command: string;
  readonly acceptedCommands: readonly string[];

  constructor(state: string, command: string, acceptedCommands: readonly string[]) {
    const acceptedList =
      acceptedCommands.length > 0 ? acceptedCommands.join(", ") : "(none)";
    super(`Command "${command}" is not accepted in state "${state}". Accepted: ${acceptedList}`);
    this.name = "FSMCommandError";
    this.state = state;
    this.command = command;
    this.acceptedCommands = acceptedCommands;
    Object.setPrototypeOf(this, FSMCommandError.prototype);
  }
}
