import type { ModalityTag } from "../catalog";
import type { InboundMessage } from "./protocol";

const PART_MODALITIES: Readonly<Record<string, ModalityTag>> = {
  image_url: "image",
  input_audio: "audio",
  audio: "audio",
  video_url: "video",
  video: "video",
  file: "file",
  document: "file",
};

export function modalityOfPart(type: string): ModalityTag | undefined {
  return Object.hasOwn(PART_MODALITIES, type) ? PART_MODALITIES[type] : undefined;
}

function partType(part: unknown): string | undefined {
  if (typeof part !== "object" || part === null || !("type" in part)) {
    return undefined;
  }
  return typeof part.type === "string" ? part.type : undefined;
}

/** Collects the non-text modalities used anywhere in the conversation. String content contributes nothing. */
export function classify(messages: readonly InboundMessage[]): Set<ModalityTag> {
  const tags = new Set<ModalityTag>();
  for (const message of messages) {
    if (typeof message.content === "string") {
      continue;
    }
    for (const part of message.content) {
      const type = partType(part);
      const tag = type === undefined ? undefined : modalityOfPart(type);
      if (tag) {
        tags.add(tag);
      }
    }
  }
  return tags;
}
