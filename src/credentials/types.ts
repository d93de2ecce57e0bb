import type { CredentialSource } from "../storage/db";
import type { RouterApi } from "../upstream";

export type { CredentialSource };

export interface CredentialProvenance {
  remoteId?: string;
  label: string;
  source: CredentialSource;
  updatedAt: string;
}

/** Durable home of the single delegated credential. */
export interface CredentialStore {
  get(): Promise<string | null>;
  set(value: string, origin?: { remoteId?: string; label?: string }): Promise<void>;
  setManual(value: string): Promise<void>;
  clear(): Promise<boolean>;
  provenance(): Promise<CredentialProvenance | null>;
}

export type CredentialApi = Pick<
  RouterApi,
  "listCredentials" | "createCredential" | "deleteCredential"
> & {
  readonly hasProvisioningKey: boolean;
};

export type CredentialCheckOutcome =
  | { status: "local-present" }
  | { status: "created"; remoteId: string }
  | { status: "repaired"; remoteId: string; removed: number }
  | { status: "in-progress" }
  | { status: "not-configured"; message: string }
  | { status: "failed"; message: string };
