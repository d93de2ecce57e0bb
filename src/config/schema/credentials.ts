import { z } from "zod";

export const CredentialsSchema = z
  .object({
    label: z.string().trim().min(1).optional(),
    listCacheTtlMs: z.number().int().nonnegative().optional(),
    limit: z.number().positive().optional(),
  })
  .strict();
