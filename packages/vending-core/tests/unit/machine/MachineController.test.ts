/**
 * Unit tests for MachineController: transitions, rejections, dispense
 * two-step, logging, notification and fatal log capacity.
 */
import { describe, it, expect, vi } from "vitest";
import {
  BusyError,
  InsufficientFundsError,
  InvalidCommandForStateError,
  InvalidInputError,
  MACHINE_COMMANDS,
  MACHINE_STATES,
  MachineController,
  OutOfStockError,
  TransactionLogCapacityError,
  UnknownProductError,
  isCommandSuccess,
  machineFSM,
  unwrap,
  type CommandResult,
  type MachineCommandName,
  type MachineStateName,
  type StateChange,
} from "../../../src/index.js";
import {
  TEST_EPOCH,
  captureObservableState,
  createTestMachine,
  expectFailed,
  expectRejected,
  expectSuccess,
} from "../../../src/testing/index.js";

const route = (changes: readonly StateChange[]): string[] => changes.map((c) => `${c.from}->${c.to}`);

describe("MachineController", () => {
  describe("purchase with exact change", () => {
    it("should dispense and return to ready", () => {
      const { machine, inventory, changes } = createTestMachine();

      expect(expectSuccess(machine.insertCoin(500))).toEqual({ balance: 500 });
      expect(expectSuccess(machine.insertCoin(500))).toEqual({ balance: 1000 });
      expect(expectSuccess(machine.selectProduct("cola"))).toEqual({
        productId: "cola",
        productName: "Cola",
        price: 1000,
        balance: 1000,
      });
      expect(expectSuccess(machine.dispense())).toEqual({
        productId: "cola",
        productName: "Cola",
        price: 1000,
        changeReturned: 0,
      });

      expect(machine.status()).toMatchObject({ state: "ready", balance: 0, selection: null });
      expect(inventory.get("cola")?.stock).toBe(4);
      expect(route(changes)).toEqual([
        "ready->coin_inserted",
        "coin_inserted->coin_inserted",
        "coin_inserted->product_selected",
        "product_selected->dispensing",
        "dispensing->ready",
      ]);
    });

    it("should record one log entry per applied command", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(500);
      machine.insertCoin(500);
      machine.selectProduct("cola");
      const result = machine.dispense();

      const log = machine.recentTransactions(10);
      expect(log.map((e) => [e.command, e.eventType, e.resultingState])).toEqual([
        ["insertCoin", "CoinInserted", "coin_inserted"],
        ["insertCoin", "CoinInserted", "coin_inserted"],
        ["selectProduct", "ProductSelected", "product_selected"],
        ["dispense", "ProductDispensed", "ready"],
      ]);
      expect(log[3]).toEqual({
        sequence: 4,
        entryId: "txn_test_004",
        commandId: "cmd_test_004",
        timestamp: TEST_EPOCH + 4000,
        command: "dispense",
        eventType: "ProductDispensed",
        resultingState: "ready",
        detail: "dispensed cola for 1000, change 0",
      });
      expect(isCommandSuccess(result) && result.entry).toEqual(log[3]);
    });

    it("should return change above the price", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(1000);
      machine.insertCoin(500);
      machine.selectProduct("cola");

      expect(expectSuccess(machine.dispense()).changeReturned).toBe(500);
    });

    it("should let coins be added after selecting", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(1000);
      machine.selectProduct("cola");
      machine.insertCoin(500);

      expect(machine.status()).toMatchObject({ state: "product_selected", balance: 1500, selection: "cola" });
      machine.selectProduct("coffee");
      expect(expectSuccess(machine.dispense()).changeReturned).toBe(0);
    });
  });

  describe("refund", () => {
    it("should return the whole balance and drop the selection", () => {
      const { machine, inventory } = createTestMachine();
      machine.insertCoin(2000);
      machine.selectProduct("coffee");

      expect(expectSuccess(machine.refund())).toEqual({ amountReturned: 2000 });
      expect(machine.status()).toMatchObject({ state: "ready", balance: 0, selection: null });
      expect(inventory.get("coffee")?.stock).toBe(3);
    });

    it("should return exactly what went in at the largest safe balance", () => {
      const { machine, transactionLog } = createTestMachine();
      machine.insertCoin(Number.MAX_SAFE_INTEGER - 1);
      machine.insertCoin(1);

      const over = machine.insertCoin(1);
      expectRejected(over, InvalidInputError);
      expect(over.reason).toBe(`Coin amount 1 would raise the balance past ${Number.MAX_SAFE_INTEGER}`);
      expectRejected(machine.insertCoin(1e300), InvalidInputError);
      expect(transactionLog.size).toBe(2);

      expect(expectSuccess(machine.refund())).toEqual({ amountReturned: Number.MAX_SAFE_INTEGER });
    });

    it("should record a zero refund in ready", () => {
      const { machine, changes } = createTestMachine();

      expect(expectSuccess(machine.refund())).toEqual({ amountReturned: 0 });
      expect(machine.recentTransactions(1)[0]?.detail).toBe("refunded 0");
      expect(route(changes)).toEqual(["ready->ready"]);
    });
  });

  describe("rejections", () => {
    it("should refuse a selection the balance does not cover", () => {
      const { machine, logger, transactionLog } = createTestMachine();
      machine.insertCoin(800);

      const result = machine.selectProduct("coffee");

      expectRejected(result, InsufficientFundsError);
      expect(result.reason).toBe("Insufficient funds for coffee: price 1500, balance 800, short by 700");
      expect(result.error instanceof InsufficientFundsError && result.error.shortfall).toBe(700);
      expect(machine.status()).toMatchObject({ state: "coin_inserted", balance: 800 });
      expect(transactionLog.size).toBe(1);
      expect(logger.getLastCallAt("WARN")).toMatchObject({
        message: "Command rejected",
        data: { command: "selectProduct", state: "coin_inserted", rejectionCode: "INSUFFICIENT_FUNDS" },
      });
    });

    it("should accept one unit more after a one-short refusal", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(1499);

      const short = machine.selectProduct("coffee");
      expectRejected(short, InsufficientFundsError);
      expect(short.error instanceof InsufficientFundsError && short.error.shortfall).toBe(1);

      machine.insertCoin(1);
      expect(expectSuccess(machine.selectProduct("coffee")).balance).toBe(1500);
    });

    it("should refuse restocking with a balance outstanding", () => {
      const { machine, inventory } = createTestMachine();
      machine.insertCoin(1000);

      const result = machine.restock();

      expectRejected(result, InvalidCommandForStateError);
      expect(result.reason).toContain("with balance 1000 outstanding");
      expect(machine.status()).toMatchObject({ state: "coin_inserted", balance: 1000 });
      expect(inventory.get("water")?.stock).toBe(0);
    });

    it("should refuse a sold-out product", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(1000);

      expectRejected(machine.selectProduct("water"), OutOfStockError);
      expect(machine.status().state).toBe("coin_inserted");
    });

    it("should refuse an unknown product", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(1000);

      expectRejected(machine.selectProduct("tea"), UnknownProductError);
    });

    it("should refuse invalid coin amounts", () => {
      const { machine } = createTestMachine();

      expectRejected(machine.insertCoin(0), InvalidInputError);
      expectRejected(machine.insertCoin(12.5), InvalidInputError);
      expect(machine.status()).toMatchObject({ state: "ready", balance: 0 });
    });

    it("should throw the carried error from unwrap", () => {
      const { machine } = createTestMachine();
      expect(() => unwrap(machine.dispense())).toThrow(InvalidCommandForStateError);
    });

    const STATES_WITH_REJECTED_COMMANDS: Array<[MachineStateName, MachineCommandName[]]> = [
      ["ready", ["selectProduct", "dispense"]],
      ["coin_inserted", ["dispense", "restock", "shutdown", "beginMaintenance"]],
      ["product_selected", ["restock", "shutdown", "beginMaintenance"]],
      ["maintenance", ["insertCoin", "selectProduct", "dispense", "refund", "beginMaintenance"]],
      ["out_of_order", ["insertCoin", "selectProduct", "dispense", "refund"]],
    ];

    const reach: Record<string, (machine: MachineController) => void> = {
      ready: () => {},
      coin_inserted: (m) => {
        m.insertCoin(1000);
      },
      product_selected: (m) => {
        m.insertCoin(1000);
        m.selectProduct("cola");
      },
      maintenance: (m) => {
        m.beginMaintenance();
      },
      out_of_order: (m) => {
        m.shutdown();
      },
    };

    const invoke: Record<MachineCommandName, (machine: MachineController) => CommandResult<unknown>> = {
      insertCoin: (m) => m.insertCoin(100),
      selectProduct: (m) => m.selectProduct("cola"),
      dispense: (m) => m.dispense(),
      refund: (m) => m.refund(),
      restock: (m) => m.restock(),
      shutdown: (m) => m.shutdown(),
      beginMaintenance: (m) => m.beginMaintenance(),
    };

    it("should list every refused command of every settled state", () => {
      const settled = MACHINE_STATES.filter((name) => !machineFSM.isTransient(name));

      expect(STATES_WITH_REJECTED_COMMANDS.map(([name]) => name)).toEqual(settled);
      for (const [name, commands] of STATES_WITH_REJECTED_COMMANDS) {
        expect(commands).toEqual(MACHINE_COMMANDS.filter((command) => !machineFSM.accepts(name, command)));
      }
    });

    it.each(STATES_WITH_REJECTED_COMMANDS)(
      "should leave %s untouched by every command it does not accept",
      (stateName, commands) => {
        for (const command of commands) {
          const { machine, transactionLog, changes } = createTestMachine();
          reach[stateName]?.(machine);
          expect(machine.status().state).toBe(stateName);

          const before = captureObservableState(machine);
          const entries = transactionLog.size;
          const notified = changes.length;

          expectRejected(invoke[command](machine), InvalidCommandForStateError);

          expect(captureObservableState(machine)).toEqual(before);
          expect(transactionLog.size).toBe(entries);
          expect(changes.length).toBe(notified);
        }
      }
    );
  });

  describe("dispense", () => {
    it("should abort and keep the balance when the product sold out after selection", () => {
      const { machine, inventory, changes } = createTestMachine();
      machine.insertCoin(1000);
      machine.selectProduct("cola");
      for (let i = 0; i < 5; i++) {
        inventory.decrement("cola");
      }

      const result = machine.dispense();

      expectFailed(result, OutOfStockError);
      expect(result.reason).toBe('Product "cola" is out of stock');
      expect(result.entry).toMatchObject({
        command: "dispense",
        eventType: "DispenseAborted",
        resultingState: "product_selected",
        detail: 'dispense of cola aborted: Product "cola" is out of stock; balance 1000 kept',
      });
      expect(machine.status()).toMatchObject({ state: "product_selected", balance: 1000, selection: "cola" });
      expect(route(changes.slice(-2))).toEqual(["product_selected->dispensing", "dispensing->product_selected"]);
      expect(expectSuccess(machine.refund())).toEqual({ amountReturned: 1000 });
    });

    it("should decrement stock exactly once per dispense", () => {
      const { machine, inventory } = createTestMachine();
      const decrement = vi.spyOn(inventory, "decrement");
      machine.insertCoin(1000);
      machine.selectProduct("cola");

      expectSuccess(machine.dispense());
      expectRejected(machine.dispense(), InvalidCommandForStateError);

      expect(decrement).toHaveBeenCalledTimes(1);
      expect(inventory.get("cola")?.stock).toBe(4);
    });

    it("should refuse commands issued while dispensing", () => {
      const { machine, inventory, transactionLog } = createTestMachine();
      const nested: Array<CommandResult<unknown>> = [];
      machine.subscribe((change) => {
        if (change.to === "dispensing") {
          nested.push(machine.insertCoin(100), machine.refund(), machine.dispense());
        }
      });
      machine.insertCoin(1000);
      machine.selectProduct("cola");

      expect(expectSuccess(machine.dispense()).changeReturned).toBe(0);

      expect(nested).toHaveLength(3);
      for (const result of nested) {
        expectRejected(result, BusyError);
      }
      const first = nested[0];
      expect(first?.status === "rejected" ? first.reason : undefined).toBe(
        'Machine is busy handling another command; "insertCoin" refused'
      );
      expect(machine.status()).toMatchObject({ state: "ready", balance: 0 });
      expect(inventory.get("cola")?.stock).toBe(4);
      expect(transactionLog.size).toBe(3);
    });
  });

  describe("restock", () => {
    it("should restock an out-of-order machine through maintenance", () => {
      const { machine, inventory, changes, logger } = createTestMachine({ initialState: { name: "out_of_order" } });

      expectRejected(machine.insertCoin(100), InvalidCommandForStateError);

      const result = machine.restock();

      expect(expectSuccess(result)).toEqual({ restocked: { cola: 3, coffee: 3, water: 4 } });
      expect(machine.status().state).toBe("ready");
      expect(inventory.snapshot().map((p) => p.stock)).toEqual([8, 6, 4]);
      expect(route(changes)).toEqual(["out_of_order->maintenance", "maintenance->ready"]);
      expect(changes[0]?.entry).toBeUndefined();
      expect(changes[1]?.entry?.detail).toBe("restocked 10 units across 3 products (all)");
      expect(logger.getLastCallAt("REPORT")).toEqual({
        level: "REPORT",
        message: "Restock completed",
        data: {
          machineId: "test-machine",
          restocked: { cola: 3, coffee: 3, water: 4 },
          inventory: [
            { id: "cola", stock: 8 },
            { id: "coffee", stock: 6 },
            { id: "water", stock: 4 },
          ],
        },
      });
    });

    it("should restock from maintenance without passing through it again", () => {
      const { machine, changes } = createTestMachine();
      machine.beginMaintenance();
      machine.restock();

      expect(route(changes)).toEqual(["ready->maintenance", "maintenance->ready"]);
    });

    it("should add explicit quantities", () => {
      const { machine, inventory } = createTestMachine();

      expect(expectSuccess(machine.restock({ water: 2 }))).toEqual({ restocked: { water: 2 } });
      expect(inventory.get("water")?.stock).toBe(2);
      expect(inventory.get("cola")?.stock).toBe(5);
    });

    it("should reject quantities naming an unknown product without restocking any", () => {
      const { machine, inventory } = createTestMachine();

      expectRejected(machine.restock({ water: 2, tea: 1 }), UnknownProductError);
      expectRejected(machine.restock({ cola: 1.5 }), InvalidInputError);
      expect(inventory.get("water")?.stock).toBe(0);
    });

    it("should refuse quantities that would overflow stock", () => {
      const { machine, inventory } = createTestMachine();

      expectRejected(machine.restock({ cola: 1e308 }), InvalidInputError);
      expectRejected(machine.restock({ cola: Number.MAX_SAFE_INTEGER }), InvalidInputError);
      expect(expectSuccess(machine.restock({ cola: Number.MAX_SAFE_INTEGER - 5 }))).toEqual({
        restocked: { cola: Number.MAX_SAFE_INTEGER - 5 },
      });
      expectRejected(machine.restock({ cola: 1 }), InvalidInputError);
      expect(inventory.get("cola")?.stock).toBe(Number.MAX_SAFE_INTEGER);
    });

    it("should refuse keys naming the same product once trimmed", () => {
      const { machine, inventory } = createTestMachine();

      const result = machine.restock({ cola: 2, " cola": 3 });

      expectRejected(result, InvalidInputError);
      expect(result.reason).toBe('Invalid restock arguments: Product id " cola" duplicates "cola"');
      expect(inventory.get("cola")?.stock).toBe(5);
    });
  });

  describe("shutdown and maintenance", () => {
    it("should shut down from ready and from maintenance", () => {
      const { machine } = createTestMachine();

      expect(expectSuccess(machine.shutdown())).toEqual({ state: "out_of_order" });
      expect(expectSuccess(machine.shutdown())).toEqual({ state: "out_of_order" });
      expect(expectSuccess(machine.beginMaintenance())).toEqual({ state: "maintenance" });
      expect(expectSuccess(machine.shutdown())).toEqual({ state: "out_of_order" });
    });
  });

  describe("transaction log capacity", () => {
    it("should throw before changing anything when the log is full", () => {
      const { machine, logger } = createTestMachine({ maxEntries: 2 });
      machine.insertCoin(500);
      machine.insertCoin(500);

      expect(() => machine.selectProduct("cola")).toThrow(TransactionLogCapacityError);

      expect(captureObservableState(machine)).toMatchObject({ state: "coin_inserted", balance: 1000, selection: null });
      expect(logger.getLastCallAt("ERROR")).toMatchObject({
        message: "Command failed",
        data: { command: "selectProduct", state: "coin_inserted" },
      });
      expect(() => machine.refund()).toThrow(TransactionLogCapacityError);
    });

    it("should still answer with rejections when full", () => {
      const { machine } = createTestMachine({ maxEntries: 1 });
      machine.insertCoin(500);

      expectRejected(machine.restock(), InvalidCommandForStateError);
    });

    it("should not enter dispensing when the log is full", () => {
      const { machine, inventory, changes } = createTestMachine({ maxEntries: 3 });
      machine.insertCoin(500);
      machine.insertCoin(500);
      machine.selectProduct("cola");

      expect(() => machine.dispense()).toThrow(TransactionLogCapacityError);

      expect(machine.status()).toMatchObject({ state: "product_selected", balance: 1000, selection: "cola" });
      expect(inventory.get("cola")?.stock).toBe(5);
      expect(changes.some((c) => c.to === "dispensing")).toBe(false);
    });
  });

  describe("listeners", () => {
    it("should log a failing listener and carry on", () => {
      const { machine, logger } = createTestMachine();
      machine.subscribe(() => {
        throw new Error("display offline");
      });

      expectSuccess(machine.insertCoin(100));

      expect(logger.getLastCallAt("ERROR")).toEqual({
        level: "ERROR",
        message: "State listener failed",
        data: { machineId: "test-machine", from: "ready", to: "coin_inserted", error: "display offline" },
      });
    });

    it("should stop notifying after unsubscribe", () => {
      const { machine } = createTestMachine();
      const listener = vi.fn();
      const unsubscribe = machine.subscribe(listener);

      machine.insertCoin(100);
      unsubscribe();
      machine.insertCoin(100);

      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe("queries", () => {
    it("should return the most recent entries", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(100);
      machine.insertCoin(200);
      machine.refund();

      expect(machine.recentTransactions(2).map((e) => e.detail)).toEqual([
        "inserted 200, balance 300",
        "refunded 300",
      ]);
      expect(() => machine.recentTransactions(-1)).toThrow(InvalidInputError);
    });

    it("should expose status with an inventory snapshot", () => {
      const { machine } = createTestMachine();
      machine.insertCoin(100);

      const status = machine.status();
      expect(status.state).toBe("coin_inserted");
      expect(status.balance).toBe(100);
      expect(status.inventory.map((p) => p.id)).toEqual(["cola", "coffee", "water"]);
      expect(machine.currentState).toEqual({ name: "coin_inserted", balance: 100 });
    });

    it("should run commands given as messages", () => {
      const { machine } = createTestMachine();

      expect(expectSuccess(machine.execute({ type: "insertCoin", amount: 200 }))).toEqual({ balance: 200 });
      expect(machine.execute({ type: "restock" }).status).toBe("rejected");
    });
  });

  describe("logging", () => {
    it("should log each command's start and outcome", () => {
      const { machine, logger } = createTestMachine();
      machine.insertCoin(100);

      expect(logger.calls.map((c) => [c.level, c.message])).toEqual([
        ["DEBUG", "Command started"],
        ["TRACE", "insertCoin"],
        ["TRACE", "insertCoin"],
        ["INFO", "Command succeeded"],
      ]);
      expect(logger.getLastCallAt("INFO")?.data).toEqual({
        command: "insertCoin",
        commandId: "cmd_test_001",
        state: "ready",
        machineId: "test-machine",
        eventType: "CoinInserted",
        resultingState: "coin_inserted",
        sequence: 1,
      });
    });
  });
});
