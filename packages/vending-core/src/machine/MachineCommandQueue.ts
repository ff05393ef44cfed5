/**
 * ## MachineCommandQueue
 *
 * Single-consumer queue in front of a controller for callers that arrive
 * concurrently (request handlers, timers). Commands run one at a time in
 * submission order. A command that throws rejects only its own promise;
 * the queue keeps draining.
 *
 * @example
 * ```typescript
 * const queue = new MachineCommandQueue(machine);
 *
 * const [a, b] = await Promise.all([
 *   queue.submit({ type: "insertCoin", amount: 500 }),
 *   queue.submit({ type: "insertCoin", amount: 500 }),
 * ]);
 * // b.data.balance === 1000
 * ```
 */
import type { Logger } from "../logging/index.js";
import { createNoOpLogger } from "../logging/index.js";
import type { MachineCommand } from "./commands.js";
import type { DispenseReceipt, MachineCommandData } from "./deciders/index.js";
import type { MachineController } from "./MachineController.js";
import type { CommandResult } from "./results.js";

export interface MachineCommandQueueOptions {
  logger?: Logger;
}

export class MachineCommandQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private readonly logger: Logger;

  constructor(
    private readonly controller: MachineController,
    options: MachineCommandQueueOptions = {}
  ) {
    this.logger = options.logger ?? createNoOpLogger();
  }

  /**
   * Commands submitted but not yet finished.
   */
  get pending(): number {
    return this.waiting;
  }

  submit(command: MachineCommand): Promise<CommandResult<MachineCommandData | DispenseReceipt>> {
    return this.enqueue(command.type, () => this.controller.execute(command));
  }

  /**
   * Run an arbitrary read or command against the controller in turn.
   */
  run<T>(label: string, task: (machine: MachineController) => T): Promise<T> {
    return this.enqueue(label, () => task(this.controller));
  }

  /**
   * Resolves once everything submitted so far has finished.
   */
  drain(): Promise<void> {
    return this.tail;
  }

  private enqueue<T>(label: string, task: () => T): Promise<T> {
    this.waiting++;
    this.logger.debug("Command queued", { command: label, pending: this.waiting });

    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => {
        this.waiting--;
      },
      (error: unknown) => {
        this.waiting--;
        this.logger.error("Queued command threw", {
          command: label,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    );
    return result;
  }
}
