import type { ProductDefinition } from "../inventory/index.js";

/**
 * Catalog used across tests. Prices in the smallest currency unit.
 */
export const TEST_PRODUCTS: readonly ProductDefinition[] = [
  { id: "cola", name: "Cola", price: 1000, stock: 5, capacity: 8 },
  { id: "coffee", name: "Coffee", price: 1500, stock: 3, capacity: 6 },
  { id: "water", name: "Water", price: 600, stock: 0, capacity: 4 },
];

/**
 * Fixed start time for deterministic timestamps.
 */
export const TEST_EPOCH = 1_700_000_000_000;
