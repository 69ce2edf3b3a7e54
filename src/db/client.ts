/**
 * SQLite Database Client
 *
 * Opens the single-file SQLite database that backs the watcher's state and makes
 * sure the schema exists. Tests open private `:memory:` databases instead.
 *
 * Tables:
 * - seen: digests of everything already notified
 * - cursors: per-source resume points
 * - market_trades: archive of large fills used for cluster detection
 * - suspicious_clusters: detected clusters
 * - elevated_wallets: persisted elevated watchlist
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { serviceLoggers } from "../utils/logger";

export type SqliteDatabase = Database.Database;

/**
 * Configuration options for opening a database
 */
export interface DatabaseClientConfig {
  /** File path, or ":memory:" for a private in-memory database */
  path?: string;
  /** Use write-ahead logging. Default: true for file databases */
  wal?: boolean;
}

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS seen (
    digest TEXT PRIMARY KEY,
    ts INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS cursors (
    source TEXT PRIMARY KEY,
    last_ms INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS market_trades (
    trade_id TEXT PRIMARY KEY,
    wallet TEXT NOT NULL,
    token TEXT NOT NULL,
    side TEXT,
    notional REAL NOT NULL,
    timestamp_ms INTEGER NOT NULL,
    wallet_age_days REAL
  );

  CREATE TABLE IF NOT EXISTS suspicious_clusters (
    cluster_id TEXT PRIMARY KEY,
    wallets TEXT NOT NULL,
    token TEXT NOT NULL,
    direction TEXT NOT NULL,
    total_notional REAL NOT NULL,
    trade_count INTEGER NOT NULL,
    time_span_minutes REAL NOT NULL,
    suspicion_score INTEGER NOT NULL,
    signals TEXT NOT NULL,
    trades TEXT NOT NULL,
    first_trade_ms INTEGER NOT NULL,
    last_trade_ms INTEGER NOT NULL,
    detected_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS elevated_wallets (
    address TEXT PRIMARY KEY,
    reason TEXT NOT NULL,
    added_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_market_trades_ts ON market_trades(timestamp_ms);
  CREATE INDEX IF NOT EXISTS idx_clusters_detected ON suspicious_clusters(detected_at);
  CREATE INDEX IF NOT EXISTS idx_elevated_added ON elevated_wallets(added_at);
`;

/**
 * Open a database and apply the schema.
 *
 * @example
 * ```typescript
 * const db = openDatabase({ path: ":memory:" });
 * ```
 */
export function openDatabase(config: DatabaseClientConfig = {}): SqliteDatabase {
  const path = config.path ?? process.env.DB_PATH ?? "./data/ledger-watch.db";
  const inMemory = path === ":memory:";

  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (config.wal ?? !inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.exec(SCHEMA_SQL);

  serviceLoggers.store.debug("Database opened", { path });
  return db;
}
