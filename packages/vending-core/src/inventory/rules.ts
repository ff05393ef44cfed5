/**
 * Product rules shared by the selection deciders and the inventory.
 */
import { createInvariant } from "../invariants/index.js";
import { InsufficientFundsError, OutOfStockError, UnknownProductError } from "../errors/index.js";
import type { CatalogView, Product } from "./types.js";

export const productIsKnown = createInvariant<CatalogView, [string], "UNKNOWN_PRODUCT">(
  {
    name: "productIsKnown",
    check: (catalog, productId) => catalog.has(productId),
    message: (_catalog, productId) => `Unknown product "${productId}"`,
    context: (_catalog, productId) => ({ productId }),
  },
  UnknownProductError
);

export const productIsInStock = createInvariant<CatalogView, [string], "OUT_OF_STOCK">(
  {
    name: "productIsInStock",
    check: (catalog, productId) => catalog.isAvailable(productId),
    message: (_catalog, productId) => `Product "${productId}" is out of stock`,
    context: (_catalog, productId) => ({ productId, stock: 0 }),
  },
  OutOfStockError
);

/**
 * Balance must cover the price. The message carries the shortfall.
 */
export const balanceCoversPrice = createInvariant<number, [Product], "INSUFFICIENT_FUNDS">(
  {
    name: "balanceCoversPrice",
    check: (balance, product) => balance >= product.price,
    message: (balance, product) =>
      `Insufficient funds for ${product.id}: price ${product.price}, balance ${balance}, short by ${product.price - balance}`,
    context: (balance, product) => ({
      productId: product.id,
      price: product.price,
      balance,
      shortfall: product.price - balance,
    }),
  },
  InsufficientFundsError
);
