import { z } from "zod";

/**
 * Inbound chat-completion wire schema (the shape the IDE sends).
 * Content parts are not validated: untagged and unknown parts pass through untouched.
 */
export const InboundContentPartSchema = z.unknown();

export const InboundMessageSchema = z.object({
  role: z.string(),
  content: z.union([z.string(), z.array(InboundContentPartSchema)]),
  name: z.string().optional(),
});

const optionalNumber = z.number().nullish().transform((value) => value ?? undefined);

export const ChatCompletionRequestSchema = z
  .object({
    model: z.string(),
    messages: z.array(InboundMessageSchema),
    temperature: optionalNumber,
    max_tokens: optionalNumber,
    top_p: optionalNumber,
    frequency_penalty: optionalNumber,
    presence_penalty: optionalNumber,
    stop: z
      .union([z.string(), z.array(z.string())])
      .nullish()
      .transform((value) => (typeof value === "string" ? [value] : (value ?? undefined))),
    stream: z.boolean().nullish(),
    user: z.string().nullish(),
  })
  .transform((wire) => ({
    model: wire.model,
    messages: wire.messages,
    temperature: wire.temperature,
    maxTokens: wire.max_tokens,
    topP: wire.top_p,
    frequencyPenalty: wire.frequency_penalty,
    presencePenalty: wire.presence_penalty,
    stop: wire.stop,
    stream: wire.stream ?? undefined,
    user: wire.user ?? undefined,
  }));

export type InboundContentPart = z.infer<typeof InboundContentPartSchema>;
export type InboundMessage = z.infer<typeof InboundMessageSchema>;
export type InboundRequest = z.output<typeof ChatCompletionRequestSchema>;

export type InboundParseResult =
  | { success: true; request: InboundRequest }
  | { success: false; message: string };

export function parseInboundRequest(body: unknown): InboundParseResult {
  const parsed = ChatCompletionRequestSchema.safeParse(body);
  if (parsed.success) {
    return { success: true, request: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return { success: false, message: `Invalid request: ${where}${issue?.message ?? "malformed body"}` };
}
