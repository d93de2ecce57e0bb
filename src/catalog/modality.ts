export const MODALITY_TAGS = ["image", "audio", "video", "file"] as const;

/** Non-text content kinds a model may or may not accept. Array order is the fixed check order. */
export type ModalityTag = (typeof MODALITY_TAGS)[number];

export const MODEL_DOCS_URL = "https://openrouter.ai/models";

const ACCEPTED_MODALITIES: Record<ModalityTag, readonly string[]> = {
  image: ["image"],
  audio: ["audio"],
  video: ["video"],
  file: ["file", "document"],
};

const UNSUPPORTED_HEADERS: Record<ModalityTag, string> = {
  image: "This model doesn't support image input.",
  audio: "This model doesn't support audio input.",
  video: "This model doesn't support video input.",
  file: "This model doesn't support file/document input.",
};

interface SuggestionSection {
  header: string;
  models: readonly string[];
}

export const DEFAULT_SUGGESTIONS: Record<ModalityTag, SuggestionSection> = {
  image: {
    header: "Try a vision-capable model like:",
    models: ["openai/gpt-4o", "openai/gpt-4o-mini", "anthropic/claude-4.5-sonnet", "google/gemini-2.5-pro"],
  },
  audio: {
    header: "Try an audio-capable model like:",
    models: ["openai/gpt-4o-audio-preview", "google/gemini-2.0-flash-exp", "google/gemini-2.5-pro"],
  },
  video: {
    header: "Try a video-capable model like:",
    models: [
      "google/gemini-2.0-flash-exp",
      "google/gemini-2.5-pro",
      "openai/gpt-4o (for video frames)",
    ],
  },
  file: {
    header: "Try a model with file support like:",
    models: ["google/gemini-2.5-pro", "anthropic/claude-4.5-sonnet", "openai/gpt-4o"],
  },
};

export const GENERAL_SUGGESTIONS: SuggestionSection = {
  header: "This model is currently unavailable. Try:",
  models: [
    "openai/gpt-4o-mini (fast, affordable)",
    "anthropic/claude-3.5-sonnet (high quality)",
    "google/gemini-pro-1.5 (large context)",
  ],
};

export const FAVORITES_SUGGESTION_HEADER = "Try one of your favorite models that supports this:";

/** Case-insensitive check of a model's declared input modalities. */
export function supportsModality(inputModalities: readonly string[], tag: ModalityTag): boolean {
  const accepted = ACCEPTED_MODALITIES[tag];
  return inputModalities.some((modality) => accepted.includes(modality.toLowerCase()));
}

export function formatSuggestionSection(section: SuggestionSection): string {
  return [section.header, ...section.models.map((model) => `- ${model}`)].join("\n");
}

export function renderUnsupportedModalityMessage(
  tag: ModalityTag,
  section: SuggestionSection = DEFAULT_SUGGESTIONS[tag],
): string {
  return `${UNSUPPORTED_HEADERS[tag]}\n${formatSuggestionSection(section)}\n\nCheck model capabilities: ${MODEL_DOCS_URL}`;
}
