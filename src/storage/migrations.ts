import type { Database as DatabaseType } from "better-sqlite3";

export function runMigrations(conn: DatabaseType): void {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS delegated_credentials (
      name TEXT PRIMARY KEY,
      value_ciphertext BLOB NOT NULL,
      value_nonce BLOB NOT NULL,
      remote_id TEXT,
      label TEXT NOT NULL,
      source TEXT NOT NULL DEFAULT 'created',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  conn.exec(`
    CREATE TABLE IF NOT EXISTS favorite_models (
      model_id TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      added_at TEXT NOT NULL
    );
  `);

  conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_favorite_models_position ON favorite_models(position);
  `);
}
