import { rejected, success, type DeciderContext } from "@vending/decider";
import { InsertCoinSchema } from "../commands.js";
import type { CoinInsertedEvent } from "../events.js";
import { balanceOf, selectionOf, type MachineState } from "../state.js";
import { guardCommand, guardInput } from "./guard.js";
import type { BalanceData, MachineDeciderOutput, MachineDeciderState } from "./types.js";

/**
 * Add a coin to the balance. From `ready` this opens a transaction; in
 * `product_selected` the selection is kept. A coin that would take the
 * balance past `Number.MAX_SAFE_INTEGER` is refused, so a refund always
 * returns exactly what went in.
 */
export function decideInsertCoin(
  state: MachineDeciderState,
  command: { amount: number },
  _context: DeciderContext
): MachineDeciderOutput<CoinInsertedEvent, BalanceData> {
  const refusal = guardCommand(state.machine, "insertCoin");
  if (refusal) {
    return refusal;
  }
  const input = guardInput(InsertCoinSchema, "insertCoin", command);
  if (!input.ok) {
    return input.rejection;
  }

  const { amount } = input.value;
  const current = balanceOf(state.machine);
  const balance = current + amount;
  if (!Number.isSafeInteger(balance)) {
    return rejected(
      "INVALID_INPUT",
      `Coin amount ${amount} would raise the balance past ${Number.MAX_SAFE_INTEGER}`,
      { command: "insertCoin", amount, balance: current }
    );
  }
  const selection = selectionOf(state.machine);
  const next: MachineState =
    selection === null
      ? { name: "coin_inserted", balance }
      : { name: "product_selected", balance, selection };

  const event: CoinInsertedEvent = {
    eventType: "CoinInserted",
    payload: { amount, balance, selection },
  };
  return success({ data: { balance }, event, stateUpdate: next });
}
