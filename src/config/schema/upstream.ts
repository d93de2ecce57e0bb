import { z } from "zod";

export const UpstreamSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    // Account-level key; only used to manage delegated credentials.
    provisioningKey: z.string().optional(),
    timeoutMs: z.number().int().positive().optional(),
    appName: z.string().min(1).optional(),
    appUrl: z.string().url().optional(),
  })
  .strict();
