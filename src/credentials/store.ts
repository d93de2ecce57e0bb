import { DEFAULT_CREDENTIAL_LABEL } from "../config/settings";
import { delegatedCredentials } from "../storage/db";
import type { CredentialProvenance, CredentialSource, CredentialStore } from "./types";
import { openValue, resolveMasterKey, sealValue } from "./crypto";

const DEFAULT_CREDENTIAL_NAME = "delegated";

export class SqliteCredentialStore implements CredentialStore {
  private readonly name: string;
  private readonly label: string;

  constructor(
    private readonly masterKeyEnv: string,
    options: { name?: string; label?: string } = {},
  ) {
    this.name = options.name ?? DEFAULT_CREDENTIAL_NAME;
    this.label = options.label ?? DEFAULT_CREDENTIAL_LABEL;
  }

  async get(): Promise<string | null> {
    const row = delegatedCredentials.get(this.name);
    if (!row) {
      return null;
    }
    return openValue(
      { ciphertext: row.value_ciphertext, nonce: row.value_nonce },
      resolveMasterKey(this.masterKeyEnv),
    );
  }

  async set(value: string, origin: { remoteId?: string; label?: string } = {}): Promise<void> {
    this.write(value, "created", origin);
  }

  async setManual(value: string): Promise<void> {
    this.write(value, "manual", {});
  }

  async clear(): Promise<boolean> {
    return delegatedCredentials.delete(this.name);
  }

  async provenance(): Promise<CredentialProvenance | null> {
    const row = delegatedCredentials.get(this.name);
    if (!row) {
      return null;
    }
    return {
      remoteId: row.remote_id ?? undefined,
      label: row.label,
      source: row.source,
      updatedAt: row.updated_at,
    };
  }

  private write(
    value: string,
    source: CredentialSource,
    origin: { remoteId?: string; label?: string },
  ): void {
    if (!value.trim()) {
      throw new Error("Credential value must not be blank");
    }
    const sealed = sealValue(value, resolveMasterKey(this.masterKeyEnv));
    delegatedCredentials.upsert({
      name: this.name,
      valueCiphertext: sealed.ciphertext,
      valueNonce: sealed.nonce,
      remoteId: origin.remoteId,
      label: origin.label ?? this.label,
      source,
    });
  }
}
