/**
 * Wire a machine from configuration.
 *
 * @example
 * ```typescript
 * const config = await loadMachineConfig("./machine.yaml");
 * const { controller } = createVendingMachine(config);
 * ```
 */
import { parseMachineConfig, type MachineConfig, type MachineConfigInput } from "./config/index.js";
import { Inventory } from "./inventory/index.js";
import { createScopedLogger, type Logger } from "./logging/index.js";
import { MachineController, MachineCommandQueue, type MachineState } from "./machine/index.js";
import { TransactionLog } from "./transactions/index.js";

export interface VendingMachineOptions {
  /** Replaces the scoped console logger */
  logger?: Logger;
  clock?: () => number;
  initialState?: MachineState;
}

export interface VendingMachine {
  config: MachineConfig;
  controller: MachineController;
  queue: MachineCommandQueue;
  inventory: Inventory;
  transactionLog: TransactionLog;
  logger: Logger;
}

/**
 * Build inventory, log, logger, controller and queue. The config is
 * validated again, so a raw document is accepted too.
 */
export function createVendingMachine(
  input: MachineConfigInput = {},
  options: VendingMachineOptions = {}
): VendingMachine {
  const config = parseMachineConfig(input, {});
  const logger =
    options.logger ?? createScopedLogger(`VendingMachine:${config.machineId}`, config.logging.level);

  const inventory = new Inventory(config.products, {
    defaultCapacity: config.restock.defaultLevel,
    logger,
  });
  const transactionLog = new TransactionLog({ maxEntries: config.transactionLog.maxEntries });
  const controller = new MachineController({
    inventory,
    transactionLog,
    logger,
    machineId: config.machineId,
    ...(options.clock !== undefined && { clock: options.clock }),
    ...(options.initialState !== undefined && { initialState: options.initialState }),
  });
  const queue = new MachineCommandQueue(controller, { logger });

  logger.info("Vending machine ready", {
    machineId: config.machineId,
    products: inventory.size,
    logCapacity: transactionLog.capacity,
  });

  return { config, controller, queue, inventory, transactionLog, logger };
}
