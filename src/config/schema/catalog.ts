import { z } from "zod";

export const CatalogSchema = z
  .object({
    ttlMs: z.number().int().positive().optional(),
    retryBackoffMs: z.number().int().nonnegative().optional(),
  })
  .strict();
