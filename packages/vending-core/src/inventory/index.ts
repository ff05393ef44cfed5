export { Inventory, DEFAULT_CAPACITY, planRestockAll, type InventoryOptions } from "./Inventory.js";
export type { Product, CatalogView, RestockReport } from "./types.js";
export {
  ProductDefinitionSchema,
  ProductIdSchema,
  formatIssues,
  type ProductDefinition,
} from "./schemas.js";
export { productIsKnown, productIsInStock, balanceCoversPrice } from "./rules.js";
