import { rejected, success, type DeciderContext } from "@vending/decider";
import { planRestockAll, productIsKnown, type RestockReport } from "../../inventory/index.js";
import { RestockSchema } from "../commands.js";
import type { RestockCompletedEvent } from "../events.js";
import { READY, type MachineStateName } from "../state.js";
import { guardCommand, guardInput } from "./guard.js";
import type { MachineDeciderOutput, MachineDeciderState, RestockData } from "./types.js";

/**
 * Refill stock. Allowed only with no balance outstanding: from `ready` and
 * `out_of_order` the machine passes through `maintenance`, restocks, and
 * comes back `ready`; from `maintenance` it restocks and returns to `ready`.
 *
 * Without quantities every product is filled to capacity. With quantities
 * only the listed products gain the listed units; one unknown id rejects
 * the whole command.
 */
export function decideRestock(
  state: MachineDeciderState,
  command: { quantities?: Record<string, number> | undefined },
  _context: DeciderContext
): MachineDeciderOutput<RestockCompletedEvent, RestockData> {
  const refusal = guardCommand(state.machine, "restock");
  if (refusal) {
    return refusal;
  }
  const input = guardInput(RestockSchema, "restock", command);
  if (!input.ok) {
    return input.rejection;
  }

  const { catalog, machine } = state;
  const { quantities } = input.value;

  let restocked: RestockReport;
  if (quantities === undefined) {
    restocked = planRestockAll(catalog);
  } else {
    restocked = {};
    for (const [productId, quantity] of Object.entries(quantities)) {
      const known = productIsKnown.validate(catalog, productId);
      if (!known.valid) {
        return rejected(known.code, known.message, known.context);
      }
      const stock = catalog.get(productId)?.stock ?? 0;
      if (!Number.isSafeInteger(stock + quantity)) {
        return rejected(
          "INVALID_INPUT",
          `Restocking "${productId}" by ${quantity} would raise stock past ${Number.MAX_SAFE_INTEGER}`,
          { command: "restock", productId, quantity, stock }
        );
      }
      restocked[productId] = quantity;
    }
  }

  const via: MachineStateName[] = machine.name === "maintenance" ? [] : ["maintenance"];

  const event: RestockCompletedEvent = {
    eventType: "RestockCompleted",
    payload: { mode: quantities === undefined ? "all" : "quantities", restocked, via },
  };
  return success({ data: { restocked }, event, stateUpdate: READY });
}
