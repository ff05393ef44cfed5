/**
 * Inventory read model.
 */

/**
 * Snapshot of a product. Inventory hands out frozen copies; mutation
 * happens only through `Inventory.decrement` and `Inventory.restock`.
 */
export interface Product {
  readonly id: string;
  readonly name: string;
  readonly price: number;
  readonly stock: number;
  readonly capacity: number;
}

/**
 * Read-only view deciders receive. Deciders never mutate inventory.
 */
export interface CatalogView {
  get(id: string): Product | undefined;
  has(id: string): boolean;
  isAvailable(id: string): boolean;
  snapshot(): Product[];
}

/**
 * Units added per product id.
 */
export type RestockReport = Record<string, number>;
