import BetterSqlite3 from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

/**
 * better-sqlite3 blocks the event loop while it waits, so this stays short;
 * withBusyRetry yields between the tries.
 */
export const DEFAULT_BUSY_TIMEOUT_MS = 1000;

export interface DbClientOptions {
  /** How long SQLite itself waits on a locked database before reporting SQLITE_BUSY. */
  busyTimeoutMs?: number;
}

/**
 * Opens the SQLite file and wraps it in a Drizzle client.
 *
 * WAL keeps readers from being blocked by the writer; `synchronous=NORMAL`
 * is durable across process crashes in WAL mode.
 *
 * Returns both the raw `sqlite` handle (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(file: string, options: DbClientOptions = {}) {
  const sqlite = new BetterSqlite3(file, { timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS });
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');

  const db = drizzle(sqlite, { schema });

  return { sqlite, db };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];

/**
 * Creates tables and indexes if they do not exist yet.
 *
 * Lightweight startup migration; `drizzle-kit generate` produces the
 * equivalent migration from schema.ts when a managed migration is wanted.
 */
export function ensureTables(sqlite: DbClient['sqlite']): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS processed_messages (
      packet_id        INTEGER PRIMARY KEY,
      from_node_id     INTEGER NOT NULL,
      to_node_id       INTEGER NOT NULL,
      channel          TEXT    NOT NULL,
      text             TEXT    NOT NULL,
      forward_status   TEXT    NOT NULL DEFAULT 'pending',
      forward_attempts INTEGER NOT NULL DEFAULT 0,
      forwarded_at     TEXT,
      created_at       TEXT    NOT NULL,
      updated_at       TEXT    NOT NULL
    )
  `);
  sqlite.exec('CREATE INDEX IF NOT EXISTS idx_processed_messages_status ON processed_messages (forward_status)');
  sqlite.exec('CREATE INDEX IF NOT EXISTS idx_processed_messages_created_at ON processed_messages (created_at)');
}
