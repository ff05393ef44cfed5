import { rejected, success, type DeciderContext } from "@vending/decider";
import { balanceCoversPrice, productIsInStock, productIsKnown } from "../../inventory/index.js";
import { SelectProductSchema } from "../commands.js";
import type { ProductSelectedEvent } from "../events.js";
import { balanceOf, selectionOf, type MachineState } from "../state.js";
import { guardCommand, guardInput } from "./guard.js";
import type { MachineDeciderOutput, MachineDeciderState, SelectionConfirmed } from "./types.js";

/**
 * Choose (or re-choose) a product. Checks run in a fixed order: unknown
 * product, out of stock, then insufficient funds. Re-selection in
 * `product_selected` is validated against the new product.
 */
export function decideSelectProduct(
  state: MachineDeciderState,
  command: { productId: string },
  _context: DeciderContext
): MachineDeciderOutput<ProductSelectedEvent, SelectionConfirmed> {
  const refusal = guardCommand(state.machine, "selectProduct");
  if (refusal) {
    return refusal;
  }
  const input = guardInput(SelectProductSchema, "selectProduct", command);
  if (!input.ok) {
    return input.rejection;
  }

  const { productId } = input.value;
  const { catalog, machine } = state;

  const known = productIsKnown.validate(catalog, productId);
  if (!known.valid) {
    return rejected(known.code, known.message, known.context);
  }
  const inStock = productIsInStock.validate(catalog, productId);
  if (!inStock.valid) {
    return rejected(inStock.code, inStock.message, inStock.context);
  }

  const product = catalog.get(productId);
  if (!product) {
    return rejected("UNKNOWN_PRODUCT", `Unknown product "${productId}"`, { productId });
  }

  const balance = balanceOf(machine);
  const funded = balanceCoversPrice.validate(balance, product);
  if (!funded.valid) {
    return rejected(funded.code, funded.message, funded.context);
  }

  const event: ProductSelectedEvent = {
    eventType: "ProductSelected",
    payload: {
      productId,
      productName: product.name,
      price: product.price,
      balance,
      previousSelection: selectionOf(machine),
    },
  };
  const next: MachineState = { name: "product_selected", balance, selection: productId };

  return success({
    data: { productId, productName: product.name, price: product.price, balance },
    event,
    stateUpdate: next,
  });
}
