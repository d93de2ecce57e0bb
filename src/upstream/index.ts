export { PROVISIONING_KEY_MISSING, RouterApiClient, extractErrorMessage, parseJson } from "./client";
export type { UpstreamOptions } from "./client";
export { describeUpstreamError, detectUnsupportedModality, isFreeTierEnded } from "./errors";
export type {
  ApiResult,
  CreatedCredential,
  ModelCapabilities,
  OutboundContentPart,
  OutboundMessage,
  OutboundRequest,
  RemoteCredentialSummary,
  RouterApi,
} from "./types";
