import {
  FAVORITES_SUGGESTION_HEADER,
  MODALITY_TAGS,
  renderUnsupportedModalityMessage,
  supportsModality,
  type ModalityTag,
} from "../catalog";
import { logger } from "../logger";
import type { ModelCapabilities } from "../upstream";
import { classify } from "./content-inspector";
import type { InboundRequest } from "./protocol";

export const MAX_SUGGESTIONS = 5;

export type ValidationOutcome =
  | { valid: true }
  | { valid: false; modality: ModalityTag; modelId: string; message: string };

export interface CapabilityLookup {
  get(modelId: string): ModelCapabilities | undefined;
}

export interface FavoritesProvider {
  getFavoriteModelIds(): string[];
  getCachedModelById(modelId: string): ModelCapabilities | undefined;
}

export class CapabilityValidator {
  constructor(
    private readonly capabilities: CapabilityLookup,
    private readonly favorites: FavoritesProvider,
  ) {}

  validate(request: Pick<InboundRequest, "model" | "messages">, requestId: string): ValidationOutcome {
    try {
      return this.check(request, requestId);
    } catch (error) {
      logger.warn({ requestId, error }, "Capability check failed; letting request through");
      return { valid: true };
    }
  }

  private check(
    request: Pick<InboundRequest, "model" | "messages">,
    requestId: string,
  ): ValidationOutcome {
    const detected = classify(request.messages);
    if (detected.size === 0) {
      return { valid: true };
    }

    const modelId = request.model;
    const model = this.capabilities.get(modelId);
    if (!model) {
      logger.debug({ requestId, modelId }, "Model not in capability cache; skipping pre-validation");
      return { valid: true };
    }

    for (const tag of MODALITY_TAGS) {
      if (!detected.has(tag) || supportsModality(model.inputModalities, tag)) {
        continue;
      }
      logger.info({ requestId, modelId, modality: tag }, "Model does not accept request content");
      return { valid: false, modality: tag, modelId, message: this.renderMessage(tag) };
    }
    return { valid: true };
  }

  private renderMessage(tag: ModalityTag): string {
    const suggestions = this.suggestFavorites(tag);
    if (suggestions.length === 0) {
      return renderUnsupportedModalityMessage(tag);
    }
    return renderUnsupportedModalityMessage(tag, {
      header: FAVORITES_SUGGESTION_HEADER,
      models: suggestions,
    });
  }

  /** Favorites that are cached and accept the modality, in the user's own order. */
  private suggestFavorites(tag: ModalityTag): string[] {
    let favoriteIds: string[];
    try {
      favoriteIds = this.favorites.getFavoriteModelIds();
    } catch (error) {
      logger.warn({ error }, "Failed to read favorite models for suggestions");
      return [];
    }
    const suggestions: string[] = [];
    for (const favoriteId of favoriteIds) {
      const favorite = this.favorites.getCachedModelById(favoriteId);
      if (favorite && supportsModality(favorite.inputModalities, tag)) {
        suggestions.push(favoriteId);
      }
      if (suggestions.length >= MAX_SUGGESTIONS) {
        break;
      }
    }
    return suggestions;
  }
}
