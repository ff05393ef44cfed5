/**
 * Command messages accepted by the machine.
 */
import { z } from "zod";
import { ProductIdSchema } from "../inventory/index.js";

export const InsertCoinSchema = z.object({
  amount: z
    .number()
    .int("Coin amount must be an integer")
    .positive("Coin amount must be positive")
    .safe("Coin amount must be a safe integer"),
});

export const SelectProductSchema = z.object({
  productId: ProductIdSchema,
});

const RestockQuantitySchema = z
  .number()
  .int("Restock quantity must be an integer")
  .nonnegative("Restock quantity must not be negative")
  .safe("Restock quantity must be a safe integer");

/**
 * Quantities keyed by product id. Keys are trimmed like every other
 * product id; two keys naming the same product after trimming are refused
 * rather than merged.
 */
export const RestockQuantitiesSchema = z
  .record(z.string(), RestockQuantitySchema)
  .superRefine((quantities, ctx) => {
    const seen = new Map<string, string>();
    for (const key of Object.keys(quantities)) {
      const id = ProductIdSchema.safeParse(key);
      if (!id.success) {
        for (const issue of id.error.issues) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: issue.message });
        }
        continue;
      }
      const first = seen.get(id.data);
      if (first !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Product id "${key}" duplicates "${first}"`,
        });
      } else {
        seen.set(id.data, key);
      }
    }
  })
  .transform((quantities): Record<string, number> =>
    Object.fromEntries(Object.entries(quantities).map(([key, quantity]) => [key.trim(), quantity]))
  );

export const RestockSchema = z.object({
  quantities: RestockQuantitiesSchema.optional(),
});

export type InsertCoinCommand = { type: "insertCoin" } & z.infer<typeof InsertCoinSchema>;
export type SelectProductCommand = { type: "selectProduct" } & z.infer<typeof SelectProductSchema>;
export type DispenseCommand = { type: "dispense" };
export type RefundCommand = { type: "refund" };
export type RestockCommand = { type: "restock"; quantities?: Record<string, number> };
export type ShutdownCommand = { type: "shutdown" };
export type BeginMaintenanceCommand = { type: "beginMaintenance" };

export type MachineCommand =
  | InsertCoinCommand
  | SelectProductCommand
  | DispenseCommand
  | RefundCommand
  | RestockCommand
  | ShutdownCommand
  | BeginMaintenanceCommand;

export type MachineCommandName = MachineCommand["type"];

/**
 * Every command name, in the order the command table lists them.
 */
export const MACHINE_COMMANDS = [
  "insertCoin",
  "selectProduct",
  "dispense",
  "refund",
  "restock",
  "shutdown",
  "beginMaintenance",
] as const satisfies readonly MachineCommandName[];
