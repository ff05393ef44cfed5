/**
 * Zod schemas for product definitions. Shared by the inventory's
 * `register` path and the machine configuration file.
 */
import { z } from "zod";

export const ProductIdSchema = z.string().trim().min(1, "Product id must not be empty");

export const ProductDefinitionSchema = z.object({
  id: ProductIdSchema,
  name: z.string().min(1),
  /** Price in the smallest currency unit */
  price: z.number().int().nonnegative().safe("Price must be a safe integer"),
  stock: z.number().int().nonnegative().safe("Stock must be a safe integer"),
  /** Par level restockAll() fills up to */
  capacity: z.number().int().positive().safe("Capacity must be a safe integer").optional(),
});

export type ProductDefinition = z.input<typeof ProductDefinitionSchema>;

/**
 * Format zod issues as `path: message` pairs for error messages.
 */
export function formatIssues(error: z.ZodError): Array<{ path: string; message: string; code: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}
