/**
 * Unit tests for the serialising command queue.
 */
import { describe, it, expect } from "vitest";
import { MachineCommandQueue, TransactionLogCapacityError, createMockLogger } from "../../../src/index.js";
import { createTestMachine } from "../../../src/testing/index.js";

describe("MachineCommandQueue", () => {
  it("should run commands in submission order", async () => {
    const { machine } = createTestMachine();
    const queue = new MachineCommandQueue(machine);

    const results = await Promise.all([
      queue.submit({ type: "insertCoin", amount: 500 }),
      queue.submit({ type: "insertCoin", amount: 500 }),
      queue.submit({ type: "selectProduct", productId: "cola" }),
      queue.submit({ type: "dispense" }),
    ]);

    expect(results.map((r) => r.status)).toEqual(["success", "success", "success", "success"]);
    expect(results[3]?.status === "success" ? results[3].data : undefined).toEqual({
      productId: "cola",
      productName: "Cola",
      price: 1000,
      changeReturned: 0,
    });
  });

  it("should count pending commands until drained", async () => {
    const { machine } = createTestMachine();
    const queue = new MachineCommandQueue(machine);

    void queue.submit({ type: "insertCoin", amount: 100 });
    void queue.submit({ type: "refund" });
    expect(queue.pending).toBe(2);

    await queue.drain();
    expect(queue.pending).toBe(0);
    expect(machine.status().balance).toBe(0);
  });

  it("should reject only the promise of a task that throws", async () => {
    const { machine } = createTestMachine();
    const logger = createMockLogger();
    const queue = new MachineCommandQueue(machine, { logger });

    const failing = queue.run("explode", () => {
      throw new Error("boom");
    });
    const next = queue.submit({ type: "insertCoin", amount: 200 });

    await expect(failing).rejects.toThrow("boom");
    expect((await next).status).toBe("success");
    await queue.drain();
    expect(logger.getLastCallAt("ERROR")).toEqual({
      level: "ERROR",
      message: "Queued command threw",
      data: { command: "explode", error: "boom" },
    });
  });

  it("should surface a fatal log error to the submitter and keep serving reads", async () => {
    const { machine } = createTestMachine({ maxEntries: 1 });
    const queue = new MachineCommandQueue(machine);

    expect((await queue.submit({ type: "insertCoin", amount: 100 })).status).toBe("success");
    await expect(queue.submit({ type: "insertCoin", amount: 100 })).rejects.toBeInstanceOf(
      TransactionLogCapacityError
    );
    await expect(queue.run("status", (m) => m.status().balance)).resolves.toBe(100);
  });

  it("should log each queued command at DEBUG", async () => {
    const { machine } = createTestMachine();
    const logger = createMockLogger();
    const queue = new MachineCommandQueue(machine, { logger });

    await queue.submit({ type: "refund" });

    expect(logger.calls[0]).toEqual({
      level: "DEBUG",
      message: "Command queued",
      data: { command: "refund", pending: 1 },
    });
  });
});
