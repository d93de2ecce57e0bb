import Database, { type Database as DatabaseType } from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../logger";
import { runMigrations } from "./migrations";

const MEMORY_PATH = ":memory:";

let connection: DatabaseType | null = null;

function setupConnection(conn: DatabaseType, dbPath: string): void {
  if (dbPath !== MEMORY_PATH) {
    conn.pragma("journal_mode = WAL");
  }
  conn.pragma("synchronous = NORMAL");
  conn.pragma("busy_timeout = 5000");
}

export function isDbInitialized(): boolean {
  return connection !== null;
}

export function initDb(dbPath: string): void {
  closeDb();

  if (dbPath !== MEMORY_PATH) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const conn = new Database(dbPath);
  setupConnection(conn, dbPath);
  runMigrations(conn);
  connection = conn;
  logger.debug({ dbPath }, "Database initialized");
}

export function withConnection<T>(fn: (conn: DatabaseType) => T): T {
  if (!connection) {
    throw new Error("Database not initialized");
  }
  return fn(connection);
}

export function closeDb(): void {
  connection?.close();
  connection = null;
}
