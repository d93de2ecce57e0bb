import {
  GENERAL_SUGGESTIONS,
  formatSuggestionSection,
  renderUnsupportedModalityMessage,
  type ModalityTag,
} from "../catalog/modality";
import { extractErrorMessage } from "./client";

const CAPABILITY_PATTERNS: ReadonlyArray<[ModalityTag, readonly string[]]> = [
  ["image", ["support image input"]],
  ["audio", ["support audio input", "audio not supported"]],
  ["video", ["support video input", "video not supported"]],
  ["file", ["support pdf", "support file", "pdf not supported", "file not supported"]],
];

const NO_ENDPOINTS_FOUND = "no endpoints found";
const NO_ENDPOINTS_MODEL = /No endpoints found for ([^.]+)/;
const PAID_SLUG = /migrate to the paid slug[:\s]+([^\s"]+)/i;

function includesIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function detectUnsupportedModality(body: string): ModalityTag | null {
  for (const [tag, patterns] of CAPABILITY_PATTERNS) {
    if (patterns.some((pattern) => includesIgnoreCase(body, pattern))) {
      return tag;
    }
  }
  return null;
}

export function isFreeTierEnded(body: string): boolean {
  return (
    includesIgnoreCase(body, "free") &&
    (includesIgnoreCase(body, "period has ended") ||
      includesIgnoreCase(body, "migrate to") ||
      includesIgnoreCase(body, "paid slug"))
  );
}

function freeTierEndedMessage(paidSlug: string | undefined): string {
  const lines = ["Free Tier Ended", "", "The free period for this model has ended.", ""];
  if (paidSlug) {
    lines.push(`To continue using this model, switch to the paid version: \`${paidSlug}\``, "");
  }
  lines.push(
    "Alternatives:",
    "- Select a different model in the bridge settings",
    "- Use another free model if available",
    "- Add credits to your account for paid models",
  );
  return lines.join("\n");
}

function modelUnavailableMessage(modelName: string): string {
  return `Model Unavailable: ${modelName}\n\n${formatSuggestionSection(GENERAL_SUGGESTIONS)}\n\nCheck model status: https://openrouter.ai/models`;
}

function rateLimitMessage(detail: string | undefined): string {
  const base = "Rate limit exceeded. Please wait a moment and try again.";
  if (detail && includesIgnoreCase(detail, "free")) {
    return `${base}\n\nTip: Free tier models have lower rate limits. Consider using a paid model for higher limits.`;
  }
  return base;
}

function serverErrorMessage(detail: string | undefined, status: number): string {
  const lines = [`Upstream server error (HTTP ${status}).`, ""];
  if (detail) {
    lines.push(`Details: ${detail}`, "");
  }
  lines.push(
    "This is usually a temporary issue. Please try again in a moment.",
    "If the problem persists, check the status page: https://status.openrouter.ai",
  );
  return lines.join("\n");
}

/** Turns an upstream error response into the text shown in the IDE chat. */
export function describeUpstreamError(status: number, body: string): string {
  const detail = extractErrorMessage(body);

  if (includesIgnoreCase(body, NO_ENDPOINTS_FOUND)) {
    const tag = detectUnsupportedModality(body);
    if (tag) {
      return renderUnsupportedModalityMessage(tag);
    }
    const modelName = NO_ENDPOINTS_MODEL.exec(body)?.[1] ?? "the requested model";
    return modelUnavailableMessage(modelName);
  }

  if (isFreeTierEnded(body)) {
    return freeTierEndedMessage(PAID_SLUG.exec(body)?.[1]);
  }

  if (status === 404) {
    const tag = detectUnsupportedModality(body);
    if (tag) {
      return renderUnsupportedModalityMessage(tag);
    }
  }

  switch (status) {
    case 401:
      return detail
        ? `Authentication failed: ${detail}`
        : "Authentication failed. Please check your API key.";
    case 402:
      return detail
        ? `Insufficient credits: ${detail}`
        : "Insufficient credits. Please add credits to your account.";
    case 429:
      return rateLimitMessage(detail);
    case 500:
    case 502:
    case 503:
      return serverErrorMessage(detail, status);
    default:
      return detail ?? `Request failed (HTTP ${status}). Please try again.`;
  }
}
