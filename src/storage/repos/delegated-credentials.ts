import { withConnection } from "../connection";
import type { CredentialSource, DelegatedCredentialRow } from "../types";

export const delegatedCredentials = {
  upsert: (row: {
    name: string;
    valueCiphertext: Buffer;
    valueNonce: Buffer;
    remoteId?: string;
    label: string;
    source: CredentialSource;
  }) => {
    return withConnection((conn) => {
      const now = new Date().toISOString();
      conn
        .prepare(
          `INSERT INTO delegated_credentials (name, value_ciphertext, value_nonce, remote_id, label, source, created_at, updated_at)
           VALUES ($name, $value_ciphertext, $value_nonce, $remote_id, $label, $source, $created_at, $updated_at)
           ON CONFLICT(name)
           DO UPDATE SET value_ciphertext = excluded.value_ciphertext, value_nonce = excluded.value_nonce, remote_id = excluded.remote_id, label = excluded.label, source = excluded.source, updated_at = excluded.updated_at`,
        )
        .run({
          name: row.name,
          value_ciphertext: row.valueCiphertext,
          value_nonce: row.valueNonce,
          remote_id: row.remoteId ?? null,
          label: row.label,
          source: row.source,
          created_at: now,
          updated_at: now,
        });
    });
  },
  get: (name: string): DelegatedCredentialRow | null => {
    return withConnection(
      (conn) =>
        (conn.prepare(`SELECT * FROM delegated_credentials WHERE name = $name`).get({ name }) as
          | DelegatedCredentialRow
          | undefined) ?? null,
    );
  },
  delete: (name: string): boolean => {
    return withConnection(
      (conn) =>
        conn.prepare(`DELETE FROM delegated_credentials WHERE name = $name`).run({ name }).changes >
        0,
    );
  },
};
