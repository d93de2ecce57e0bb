import type { BridgeSettings } from "../config";
import type { OutboundMessage, OutboundRequest } from "../upstream";
import type { InboundRequest } from "./protocol";

export type TranslationOptions = BridgeSettings["translation"];

export type TranslationCheck = { valid: true } | { valid: false; reason: string };

function hasContent(content: OutboundMessage["content"]): boolean {
  return typeof content === "string" ? content.trim().length > 0 : content.length > 0;
}

function inRange(value: number | undefined, min: number, max: number): boolean {
  return value === undefined || (value >= min && value <= max);
}

/**
 * Maps the inbound request onto the upstream schema. Model ids pass through
 * unchanged; only temperature and (when enabled) max_tokens get defaults.
 */
export class RequestTranslator {
  constructor(private readonly options: TranslationOptions) {}

  translate(inbound: InboundRequest): OutboundRequest {
    const outbound: OutboundRequest = {
      model: inbound.model,
      messages: inbound.messages.map((message) => ({
        role: message.role,
        content: message.content,
        ...(message.name === undefined ? {} : { name: message.name }),
      })),
      temperature: inbound.temperature ?? this.options.defaultTemperature,
      stream: inbound.stream ?? false,
    };

    const maxTokens =
      inbound.maxTokens ??
      (this.options.defaultMaxTokens > 0 ? this.options.defaultMaxTokens : undefined);
    if (maxTokens !== undefined) {
      outbound.max_tokens = maxTokens;
    }
    if (inbound.topP !== undefined) {
      outbound.top_p = inbound.topP;
    }
    if (inbound.frequencyPenalty !== undefined) {
      outbound.frequency_penalty = inbound.frequencyPenalty;
    }
    if (inbound.presencePenalty !== undefined) {
      outbound.presence_penalty = inbound.presencePenalty;
    }
    if (inbound.stop !== undefined) {
      outbound.stop = inbound.stop;
    }
    if (inbound.user !== undefined) {
      outbound.user = inbound.user;
    }
    return outbound;
  }
}

export function validateTranslatedRequest(request: OutboundRequest): TranslationCheck {
  if (!request.model.trim()) {
    return { valid: false, reason: "Model must not be blank" };
  }
  if (request.messages.length === 0) {
    return { valid: false, reason: "Messages cannot be empty" };
  }
  const badIndex = request.messages.findIndex(
    (message) => !message.role.trim() || !hasContent(message.content),
  );
  if (badIndex >= 0) {
    return { valid: false, reason: `Message ${badIndex} needs a role and non-empty content` };
  }
  if (!inRange(request.temperature, 0, 2)) {
    return { valid: false, reason: "temperature must be between 0 and 2" };
  }
  if (request.max_tokens !== undefined && request.max_tokens <= 0) {
    return { valid: false, reason: "max_tokens must be greater than 0" };
  }
  if (!inRange(request.top_p, 0, 1)) {
    return { valid: false, reason: "top_p must be between 0 and 1" };
  }
  return { valid: true };
}
