/**
 * ## MachineController
 *
 * Owns the machine state and drives every transition through the pure
 * deciders. For each command it:
 *
 * | Step | Action |
 * |------|--------|
 * | 1 | Build the decider context (timestamp, command id) |
 * | 2 | Call the decider with the state and a read-only catalog |
 * | 3 | Rejected: log at WARN, return, change nothing |
 * | 4 | Reserve a transaction log slot (fatal if the log is full) |
 * | 5 | Apply inventory effects named by the event |
 * | 6 | Append the log entry and commit the next state |
 * | 7 | Notify listeners of each state passed through |
 *
 * Exactly one command is in flight at a time. `dispensing` is committed
 * between the two dispense decisions; anything issued meanwhile (from a
 * listener, say) is refused with BUSY.
 *
 * @example
 * ```typescript
 * const machine = new MachineController({ inventory });
 *
 * machine.insertCoin(500);
 * machine.insertCoin(500);
 * machine.selectProduct("cola");
 * const receipt = unwrap(machine.dispense()); // { productId: "cola", changeReturned: 0, ... }
 * ```
 */

import type { DeciderContext } from "@vending/decider";
import { generateCommandId } from "../ids.js";
import { assertNever } from "../types.js";
import {
  BusyError,
  createVendingError,
  type VendingError,
} from "../errors/index.js";
import type { Inventory, Product } from "../inventory/index.js";
import {
  createNoOpLogger,
  logCommandError,
  logCommandFailed,
  logCommandRejected,
  logCommandStart,
  logCommandSuccess,
  TRACE_TIMING,
  type CommandLogContext,
  type Logger,
} from "../logging/index.js";
import { TransactionLog, type TransactionLogEntry } from "../transactions/index.js";
import type { MachineCommand } from "./commands.js";
import { describeEvent } from "./details.js";
import type { MachineEvent } from "./events.js";
import { machineFSM } from "./machineFSM.js";
import {
  failedResult,
  rejectedResult,
  successResult,
  type CommandRejected,
  type CommandResult,
} from "./results.js";
import {
  READY,
  balanceOf,
  selectionOf,
  type MachineState,
  type MachineStateName,
} from "./state.js";
import {
  decideBeginMaintenance,
  decideCompleteDispense,
  decideDispense,
  decideInsertCoin,
  decideRefund,
  decideRestock,
  decideSelectProduct,
  decideShutdown,
  type BalanceData,
  type DispenseReceipt,
  type MachineCommandData,
  type MachineDeciderOutput,
  type MachineDeciderState,
  type RefundData,
  type RestockData,
  type SelectionConfirmed,
  type StateData,
} from "./deciders/index.js";

export interface MachineControllerOptions {
  inventory: Inventory;
  transactionLog?: TransactionLog;
  /** Defaults to a no-op logger */
  logger?: Logger;
  machineId?: string;
  /** ms since epoch; defaults to Date.now */
  clock?: () => number;
  generateCommandId?: () => string;
  /** Start somewhere other than `ready` (e.g. a machine installed out of order) */
  initialState?: MachineState;
}

/**
 * One step of a state change. `entry` is set on the step that completed
 * the command.
 */
export interface StateChange {
  from: MachineStateName;
  to: MachineStateName;
  entry?: TransactionLogEntry;
}

export type StateListener = (change: StateChange) => void;

export interface MachineStatus {
  state: MachineStateName;
  balance: number;
  selection: string | null;
  inventory: Product[];
}

export class MachineController {
  readonly machineId: string;

  private state: MachineState;
  private inFlight = false;
  private readonly listeners = new Set<StateListener>();
  private readonly inventory: Inventory;
  private readonly transactionLog: TransactionLog;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly nextCommandId: () => string;

  constructor(options: MachineControllerOptions) {
    this.inventory = options.inventory;
    this.transactionLog = options.transactionLog ?? new TransactionLog();
    this.logger = options.logger ?? createNoOpLogger();
    this.machineId = options.machineId ?? "default";
    this.clock = options.clock ?? Date.now;
    this.nextCommandId = options.generateCommandId ?? generateCommandId;
    this.state = options.initialState ?? READY;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  insertCoin(amount: number): CommandResult<BalanceData> {
    return this.run({ type: "insertCoin", amount }, (state, context) =>
      decideInsertCoin(state, { amount }, context)
    );
  }

  selectProduct(productId: string): CommandResult<SelectionConfirmed> {
    return this.run({ type: "selectProduct", productId }, (state, context) =>
      decideSelectProduct(state, { productId }, context)
    );
  }

  refund(): CommandResult<RefundData> {
    return this.run({ type: "refund" }, (state, context) => decideRefund(state, {}, context));
  }

  /**
   * Fill every product to capacity, or add the given units per product.
   */
  restock(quantities?: Record<string, number>): CommandResult<RestockData> {
    const command: MachineCommand =
      quantities === undefined ? { type: "restock" } : { type: "restock", quantities };
    return this.run(command, (state, context) => decideRestock(state, { quantities }, context));
  }

  shutdown(): CommandResult<StateData> {
    return this.run({ type: "shutdown" }, (state, context) => decideShutdown(state, {}, context));
  }

  beginMaintenance(): CommandResult<StateData> {
    return this.run({ type: "beginMaintenance" }, (state, context) =>
      decideBeginMaintenance(state, {}, context)
    );
  }

  /**
   * Release the selected product and report change.
   *
   * The machine sits in `dispensing` while the stock is re-checked and
   * decremented. If the product sold out since selection, the machine
   * returns to `product_selected` with the balance intact and a `failed`
   * result (OUT_OF_STOCK) is recorded.
   */
  dispense(): CommandResult<DispenseReceipt> {
    const context = this.createContext();
    const logContext = this.logContext("dispense", context);
    logCommandStart(this.logger, logContext);

    if (this.inFlight) {
      return this.reject(logContext, this.busyError("dispense"));
    }

    const started = decideDispense(this.deciderState(), {}, context);
    if (started.status === "rejected") {
      return this.reject(
        logContext,
        createVendingError(started.code, started.message, started.context)
      );
    }

    const before = this.state;
    let completion:
      | {
          kind: "recorded";
          output: Exclude<MachineDeciderOutput<MachineEvent, DispenseReceipt>, { status: "rejected" }>;
          entry: TransactionLogEntry;
        }
      | { kind: "refused"; error: VendingError };

    this.inFlight = true;
    this.logger.trace("dispense", { timing: TRACE_TIMING.START });
    try {
      this.transactionLog.ensureCapacity(1);
      machineFSM.assertTransition(before.name, started.stateUpdate.name);
      this.state = started.stateUpdate;
      this.notify([{ from: before.name, to: this.state.name }]);

      const outcome = decideCompleteDispense(this.deciderState(), {}, context);
      if (outcome.status === "rejected") {
        this.state = before;
        completion = {
          kind: "refused",
          error: createVendingError(outcome.code, outcome.message, outcome.context),
        };
      } else {
        machineFSM.assertTransition(this.state.name, outcome.stateUpdate.name);
        this.applyEffects(outcome.event);
        const entry = this.appendEntry("dispense", context, outcome.event, outcome.stateUpdate);
        this.state = outcome.stateUpdate;
        completion = { kind: "recorded", output: outcome, entry };
      }
    } catch (error) {
      this.state = before;
      logCommandError(this.logger, logContext, error);
      throw error;
    } finally {
      this.inFlight = false;
      this.logger.trace("dispense", { timing: TRACE_TIMING.END });
    }

    if (completion.kind === "refused") {
      return this.reject(logContext, completion.error);
    }

    this.notify([{ from: "dispensing", to: this.state.name, entry: completion.entry }]);
    return this.settle(logContext, completion.output, completion.entry);
  }

  /**
   * Run any command by message. Used by the command queue.
   */
  execute(command: MachineCommand): CommandResult<MachineCommandData | DispenseReceipt> {
    switch (command.type) {
      case "insertCoin":
        return this.insertCoin(command.amount);
      case "selectProduct":
        return this.selectProduct(command.productId);
      case "dispense":
        return this.dispense();
      case "refund":
        return this.refund();
      case "restock":
        return this.restock(command.quantities);
      case "shutdown":
        return this.shutdown();
      case "beginMaintenance":
        return this.beginMaintenance();
      default:
        return assertNever(command);
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get currentState(): MachineState {
    return this.state;
  }

  status(): MachineStatus {
    return {
      state: this.state.name,
      balance: balanceOf(this.state),
      selection: selectionOf(this.state),
      inventory: this.inventory.snapshot(),
    };
  }

  /**
   * Last `n` log entries, oldest first.
   *
   * @throws InvalidInputError unless `n` is a non-negative integer
   */
  recentTransactions(n: number): TransactionLogEntry[] {
    return this.transactionLog.queryRecent(n);
  }

  /**
   * Listen for state changes. Returns the unsubscribe function.
   */
  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private run<TEvent extends MachineEvent, TData>(
    command: MachineCommand,
    decide: (
      state: MachineDeciderState,
      context: DeciderContext
    ) => MachineDeciderOutput<TEvent, TData>
  ): CommandResult<TData> {
    const context = this.createContext();
    const logContext = this.logContext(command.type, context);
    logCommandStart(this.logger, logContext);

    if (this.inFlight) {
      return this.reject(logContext, this.busyError(command.type));
    }

    const output = decide(this.deciderState(), context);
    if (output.status === "rejected") {
      return this.reject(logContext, createVendingError(output.code, output.message, output.context));
    }

    const before = this.state;
    const route = this.routeOf(before, output.event, output.stateUpdate);

    this.inFlight = true;
    this.logger.trace(command.type, { timing: TRACE_TIMING.START });
    let entry: TransactionLogEntry;
    try {
      this.transactionLog.ensureCapacity(1);
      for (let i = 1; i < route.length; i++) {
        const from = route[i - 1];
        const to = route[i];
        if (from !== undefined && to !== undefined && from !== to) {
          machineFSM.assertTransition(from, to);
        }
      }
      this.applyEffects(output.event);
      entry = this.appendEntry(command.type, context, output.event, output.stateUpdate);
      this.state = output.stateUpdate;
    } catch (error) {
      this.state = before;
      logCommandError(this.logger, logContext, error);
      throw error;
    } finally {
      this.inFlight = false;
      this.logger.trace(command.type, { timing: TRACE_TIMING.END });
    }

    const changes: StateChange[] = [];
    for (let i = 1; i < route.length; i++) {
      const from = route[i - 1];
      const to = route[i];
      if (from !== undefined && to !== undefined) {
        changes.push(i === route.length - 1 ? { from, to, entry } : { from, to });
      }
    }
    this.notify(changes);

    return this.settle(logContext, output, entry);
  }

  /**
   * States passed through, first to last. Restock may pass through
   * `maintenance` on its way back to `ready`.
   */
  private routeOf(
    before: MachineState,
    event: MachineEvent,
    after: MachineState
  ): MachineStateName[] {
    const via = event.eventType === "RestockCompleted" ? event.payload.via : [];
    return [before.name, ...via, after.name];
  }

  private settle<TData>(
    logContext: CommandLogContext,
    output: Exclude<MachineDeciderOutput<MachineEvent, TData>, { status: "rejected" }>,
    entry: TransactionLogEntry
  ): CommandResult<TData> {
    if (output.status === "failed") {
      logCommandFailed(this.logger, logContext, {
        code: output.code,
        eventType: output.event.eventType,
        reason: output.reason,
      });
      return failedResult(createVendingError(output.code, output.reason, output.context), entry);
    }

    logCommandSuccess(this.logger, logContext, {
      eventType: output.event.eventType,
      resultingState: this.state.name,
      sequence: entry.sequence,
    });
    if (output.event.eventType === "RestockCompleted") {
      this.logger.report("Restock completed", {
        machineId: this.machineId,
        restocked: output.event.payload.restocked,
        inventory: this.inventory.snapshot().map((p) => ({ id: p.id, stock: p.stock })),
      });
    }
    return successResult(output.data, this.state, entry);
  }

  /**
   * Inventory changes named by an event. Only dispense and restock touch
   * stock.
   */
  private applyEffects(event: MachineEvent): void {
    switch (event.eventType) {
      case "ProductDispensed":
        this.inventory.decrement(event.payload.productId);
        return;
      case "RestockCompleted":
        if (event.payload.mode === "all") {
          this.inventory.restockAll();
        } else {
          for (const [productId, quantity] of Object.entries(event.payload.restocked)) {
            this.inventory.restock(productId, quantity);
          }
        }
        return;
      case "CoinInserted":
      case "ProductSelected":
      case "DispenseStarted":
      case "DispenseAborted":
      case "RefundIssued":
      case "MachineShutDown":
      case "MaintenanceStarted":
        return;
      default:
        assertNever(event);
    }
  }

  private appendEntry(
    command: string,
    context: DeciderContext,
    event: MachineEvent,
    next: MachineState
  ): TransactionLogEntry {
    return this.transactionLog.append({
      commandId: context.commandId,
      timestamp: context.now,
      command,
      eventType: event.eventType,
      resultingState: next.name,
      detail: describeEvent(event),
    });
  }

  private notify(changes: readonly StateChange[]): void {
    for (const change of changes) {
      for (const listener of [...this.listeners]) {
        try {
          listener(change);
        } catch (error) {
          this.logger.error("State listener failed", {
            machineId: this.machineId,
            from: change.from,
            to: change.to,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  private reject(logContext: CommandLogContext, error: VendingError): CommandRejected {
    logCommandRejected(this.logger, logContext, { code: error.code, message: error.message });
    return rejectedResult(error);
  }

  private busyError(command: string): BusyError {
    return new BusyError(`Machine is busy handling another command; "${command}" refused`, {
      state: this.state.name,
      command,
    });
  }

  private deciderState(): MachineDeciderState {
    return { machine: this.state, catalog: this.inventory };
  }

  private createContext(): DeciderContext {
    return { now: this.clock(), commandId: this.nextCommandId() };
  }

  private logContext(command: string, context: DeciderContext): CommandLogContext {
    return {
      command,
      commandId: context.commandId,
      state: this.state.name,
      machineId: this.machineId,
    };
  }
}
