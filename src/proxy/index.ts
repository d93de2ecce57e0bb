export { CapabilityValidator, MAX_SUGGESTIONS } from "./capability-validator";
export type { CapabilityLookup, FavoritesProvider, ValidationOutcome } from "./capability-validator";
export { classify, modalityOfPart } from "./content-inspector";
export { DuplicateDetector, createRequestIdGenerator } from "./duplicate-detector";
export { parseInboundRequest } from "./protocol";
export type { InboundContentPart, InboundMessage, InboundRequest } from "./protocol";
export { RequestAcceptor } from "./request-acceptor";
export type { AcceptOutcome, DispatchOutcome } from "./request-acceptor";
export { RequestTranslator, validateTranslatedRequest } from "./request-translator";
export type { TranslationCheck, TranslationOptions } from "./request-translator";
export { BridgeServer } from "./server";
export type { BridgeServerDeps, ProxyOptions } from "./server";
