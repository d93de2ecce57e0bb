export { ModelCapabilityIndex } from "./capability-index";
export type { CatalogRefreshOutcome, ModelCatalogSource } from "./capability-index";
export {
  DEFAULT_SUGGESTIONS,
  FAVORITES_SUGGESTION_HEADER,
  GENERAL_SUGGESTIONS,
  MODALITY_TAGS,
  MODEL_DOCS_URL,
  formatSuggestionSection,
  renderUnsupportedModalityMessage,
  supportsModality,
} from "./modality";
export type { ModalityTag } from "./modality";
