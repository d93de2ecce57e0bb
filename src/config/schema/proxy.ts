import { z } from "zod";

export const ProxySchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    allowOrigins: z.array(z.string().min(1)).optional(),
  })
  .strict();
