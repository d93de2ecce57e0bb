import { z } from "zod";

export const TranslationSchema = z
  .object({
    defaultTemperature: z.number().min(0).max(2).optional(),
    /** 0 or less leaves max_tokens to the upstream default. */
    defaultMaxTokens: z.number().int().optional(),
  })
  .strict();
