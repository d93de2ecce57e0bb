import { z } from "zod";

export const CredentialSummarySchema = z.object({
  hash: z.string().min(1),
  name: z.string(),
  label: z.string(),
  limit: z.number().nullable().optional(),
  usage: z.number().optional(),
  disabled: z.boolean().optional(),
  created_at: z.string(),
  updated_at: z.string().nullable().optional(),
});

export const CredentialListResponseSchema = z.object({
  data: z.array(CredentialSummarySchema),
});

export const CredentialCreateResponseSchema = z.object({
  data: CredentialSummarySchema,
  key: z.string().min(1),
});

export const CredentialDeleteResponseSchema = z.object({
  deleted: z.boolean(),
});

export const ModelEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  context_length: z.number().nullable().optional(),
  architecture: z
    .object({
      input_modalities: z.array(z.string()).optional(),
    })
    .optional(),
});

export const ModelListResponseSchema = z.object({
  data: z.array(ModelEntrySchema),
});

export const UpstreamErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.union([z.string(), z.number()]).optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  }),
});

export type CredentialSummaryPayload = z.infer<typeof CredentialSummarySchema>;
export type ModelEntryPayload = z.infer<typeof ModelEntrySchema>;
