export { CredentialLifecycleManager } from "./lifecycle-manager";
export type { CredentialLifecycleOptions } from "./lifecycle-manager";
export { CredentialListCache } from "./list-cache";
export { SqliteCredentialStore } from "./store";
export { openValue, resolveMasterKey, sealValue } from "./crypto";
export type {
  CredentialApi,
  CredentialCheckOutcome,
  CredentialProvenance,
  CredentialSource,
  CredentialStore,
} from "./types";
