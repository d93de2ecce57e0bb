import { z } from "zod";

export const StorageSchema = z
  .object({
    path: z.string().min(1).optional(),
    masterKeyEnv: z
      .string()
      .regex(/^[A-Z][A-Z0-9_]*$/, "must be an environment variable name")
      .optional(),
  })
  .strict();
