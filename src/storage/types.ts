export type CredentialSource = "created" | "manual";

export interface DelegatedCredentialRow {
  name: string;
  value_ciphertext: Buffer;
  value_nonce: Buffer;
  remote_id: string | null;
  label: string;
  source: CredentialSource;
  created_at: string;
  updated_at: string;
}

export interface FavoriteModelRow {
  model_id: string;
  position: number;
  added_at: string;
}
