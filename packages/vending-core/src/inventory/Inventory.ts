/**
 * ## Inventory
 *
 * Products keyed by id, each with a price, a stock count and a par level
 * (`capacity`). Lookups return frozen snapshots; stock changes only
 * through `decrement` (one unit per dispense) and `restock`.
 *
 * The inventory does no payment logic and no locking. The machine
 * controller is its only writer and calls it while a command is in flight.
 *
 * @example
 * ```typescript
 * const inventory = new Inventory([
 *   { id: "cola", name: "Cola", price: 1000, stock: 5 },
 *   { id: "coffee", name: "Coffee", price: 1500, stock: 0, capacity: 8 },
 * ]);
 *
 * inventory.isAvailable("coffee"); // false
 * inventory.restockAll();          // { cola: 5, coffee: 8 } with default capacity 10
 * ```
 */

import type { Logger } from "../logging/index.js";
import { createNoOpLogger } from "../logging/index.js";
import { InvalidInputError, UnknownProductError } from "../errors/index.js";
import { ProductDefinitionSchema, formatIssues, type ProductDefinition } from "./schemas.js";
import { productIsInStock } from "./rules.js";
import type { CatalogView, Product, RestockReport } from "./types.js";

/**
 * Par level for products registered without an explicit capacity.
 */
export const DEFAULT_CAPACITY = 10;

export interface InventoryOptions {
  /** Capacity for products that do not declare one */
  defaultCapacity?: number;
  logger?: Logger;
}

interface ProductRecord {
  readonly id: string;
  readonly name: string;
  readonly price: number;
  stock: number;
  readonly capacity: number;
}

function toSnapshot(record: ProductRecord): Product {
  return Object.freeze({
    id: record.id,
    name: record.name,
    price: record.price,
    stock: record.stock,
    capacity: record.capacity,
  });
}

export class Inventory implements CatalogView {
  /** Map preserves registration order for snapshot() */
  private readonly products = new Map<string, ProductRecord>();
  private readonly defaultCapacity: number;
  private readonly logger: Logger;

  constructor(products: readonly ProductDefinition[] = [], options: InventoryOptions = {}) {
    this.defaultCapacity = options.defaultCapacity ?? DEFAULT_CAPACITY;
    this.logger = options.logger ?? createNoOpLogger();

    if (!Number.isSafeInteger(this.defaultCapacity) || this.defaultCapacity <= 0) {
      throw new InvalidInputError(
        `Default capacity must be a positive integer, got ${this.defaultCapacity}`,
        { defaultCapacity: this.defaultCapacity }
      );
    }

    for (const product of products) {
      this.register(product);
    }
  }

  /**
   * Add a product.
   *
   * @throws InvalidInputError on a malformed definition or a duplicate id
   */
  register(definition: ProductDefinition): Product {
    const parsed = ProductDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      const errors = formatIssues(parsed.error);
      throw new InvalidInputError(
        `Invalid product definition: ${errors.map((e) => `${e.path || "(root)"} ${e.message}`).join(", ")}`,
        { errors }
      );
    }

    const { id, name, price, stock, capacity } = parsed.data;
    if (this.products.has(id)) {
      throw new InvalidInputError(`Product "${id}" is already registered`, { productId: id });
    }

    const record: ProductRecord = {
      id,
      name,
      price,
      stock,
      capacity: capacity ?? this.defaultCapacity,
    };
    this.products.set(id, record);
    this.logger.debug("Product registered", { productId: id, price, stock, capacity: record.capacity });
    return toSnapshot(record);
  }

  get(id: string): Product | undefined {
    const record = this.products.get(id);
    return record ? toSnapshot(record) : undefined;
  }

  has(id: string): boolean {
    return this.products.has(id);
  }

  /**
   * True iff the product exists and has stock left.
   */
  isAvailable(id: string): boolean {
    const record = this.products.get(id);
    return record !== undefined && record.stock > 0;
  }

  /**
   * Remove one unit.
   *
   * @throws UnknownProductError, OutOfStockError
   */
  decrement(id: string): Product {
    const record = this.require(id);
    productIsInStock.assert(this, id);

    record.stock -= 1;
    this.logger.debug("Stock decremented", { productId: id, stock: record.stock });
    return toSnapshot(record);
  }

  /**
   * Add `quantity` units to one product. Returns the new stock.
   *
   * @throws UnknownProductError
   * @throws InvalidInputError for a negative or fractional quantity, or one
   * that would take stock past `Number.MAX_SAFE_INTEGER`
   */
  restock(id: string, quantity: number): number {
    const record = this.require(id);
    if (!Number.isSafeInteger(quantity) || quantity < 0) {
      throw new InvalidInputError(
        `Restock quantity for "${id}" must be a non-negative integer, got ${quantity}`,
        { productId: id, quantity }
      );
    }
    if (!Number.isSafeInteger(record.stock + quantity)) {
      throw new InvalidInputError(
        `Restocking "${id}" by ${quantity} would raise stock past ${Number.MAX_SAFE_INTEGER}`,
        { productId: id, quantity, stock: record.stock }
      );
    }

    record.stock += quantity;
    this.logger.debug("Product restocked", { productId: id, added: quantity, stock: record.stock });
    return record.stock;
  }

  /**
   * Fill every product up to its capacity. Products already at or above
   * capacity are left alone and do not appear in the report. Capacities
   * are safe integers, so no product ends above one.
   */
  restockAll(): RestockReport {
    const report: RestockReport = {};
    for (const record of this.products.values()) {
      const missing = record.capacity - record.stock;
      if (missing > 0) {
        record.stock += missing;
        report[record.id] = missing;
      }
    }
    this.logger.debug("Inventory restocked to capacity", { report });
    return report;
  }

  /**
   * Every product in registration order.
   */
  snapshot(): Product[] {
    return Array.from(this.products.values(), toSnapshot);
  }

  get size(): number {
    return this.products.size;
  }

  private require(id: string): ProductRecord {
    const record = this.products.get(id);
    if (!record) {
      throw new UnknownProductError(`Unknown product "${id}"`, { productId: id });
    }
    return record;
  }
}

/**
 * Units restockAll() would add, computed from a read-only view.
 */
export function planRestockAll(catalog: CatalogView): RestockReport {
  const plan: RestockReport = {};
  for (const product of catalog.snapshot()) {
    const missing = product.capacity - product.stock;
    if (missing > 0) {
      plan[product.id] = missing;
    }
  }
  return plan;
}
