/**
 * Zod schema for machine configuration. Every field has a default, so an
 * empty document yields a working (if empty) machine.
 */

import { z } from "zod";
import { LOG_LEVELS, DEFAULT_LOG_LEVEL } from "../logging/index.js";
import { DEFAULT_CAPACITY, ProductDefinitionSchema } from "../inventory/index.js";
import { DEFAULT_MAX_ENTRIES } from "../transactions/index.js";

export const DEFAULT_MACHINE_ID = "vending-1";

const LogLevelSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
  z.enum(LOG_LEVELS)
);

export const MachineConfigSchema = z.object({
  machineId: z.string().min(1).default(DEFAULT_MACHINE_ID),

  products: z
    .array(ProductDefinitionSchema)
    .default([])
    .superRefine((products, ctx) => {
      const seen = new Set<string>();
      products.forEach((product, index) => {
        if (seen.has(product.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "id"],
            message: `Duplicate product id "${product.id}"`,
          });
        }
        seen.add(product.id);
      });
    }),

  restock: z
    .object({
      /** Capacity for products that do not declare one */
      defaultLevel: z.number().int().positive().default(DEFAULT_CAPACITY),
    })
    .default({}),

  transactionLog: z
    .object({
      maxEntries: z.number().int().positive().default(DEFAULT_MAX_ENTRIES),
    })
    .default({}),

  logging: z
    .object({
      level: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
    })
    .default({}),
});

export type MachineConfig = z.output<typeof MachineConfigSchema>;
export type MachineConfigInput = z.input<typeof MachineConfigSchema>;
