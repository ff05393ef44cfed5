/**
 * State graph and per-state command table of the machine.
 *
 * ```
 *            insertCoin            selectProduct          dispense
 *   ready ───────────────► coin_inserted ──────► product_selected ──► dispensing ──► ready
 *     ▲  ◄─────── refund ──────┘  ◄───────── refund ──────┘    ▲            │
 *     │                                                         └─ aborted ─┘
 *     ├── beginMaintenance / restock ──► maintenance ──restock──► ready
 *     └── shutdown ──► out_of_order ──restock / beginMaintenance──► maintenance
 * ```
 *
 * `dispensing` is transient: it accepts no command, and anything issued
 * while in it is refused as busy.
 */
import { defineFSM } from "@vending/fsm";
import type { MachineStateName } from "./state.js";
import type { MachineCommandName } from "./commands.js";

export const machineFSM = defineFSM<MachineStateName, MachineCommandName>({
  initial: "ready",
  transitions: {
    ready: ["coin_inserted", "maintenance", "out_of_order"],
    coin_inserted: ["coin_inserted", "product_selected", "ready"],
    product_selected: ["product_selected", "dispensing", "ready"],
    dispensing: ["ready", "product_selected"],
    maintenance: ["ready", "out_of_order"],
    out_of_order: ["maintenance"],
  },
  commands: {
    ready: ["insertCoin", "refund", "restock", "shutdown", "beginMaintenance"],
    coin_inserted: ["insertCoin", "selectProduct", "refund"],
    product_selected: ["insertCoin", "selectProduct", "dispense", "refund"],
    dispensing: [],
    maintenance: ["restock", "shutdown"],
    out_of_order: ["restock", "shutdown", "beginMaintenance"],
  },
  transient: ["dispensing"],
});
