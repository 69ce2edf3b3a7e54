/**
 * Event Store
 *
 * Durable state of the watcher, kept in SQLite through better-sqlite3.
 *
 * Features:
 * - Append-only seen digests for notification deduplication
 * - Monotonic per-source resume cursors
 * - Archive of large fills feeding cluster detection
 * - Detected clusters and the persisted elevated watchlist
 *
 * Every method runs as a single statement or a single transaction, so each call
 * is atomic on its own.
 */

import type { TradeSide } from "../api/hyperliquid/types";
import type {
  Cluster,
  ClusterDirection,
  ClusterSignals,
  LargeTradeRecord,
  SignalPoints,
} from "../detection/types";
import { digest } from "../utils/digest";
import { openDatabase, type SqliteDatabase } from "./client";

// ============================================================================
// Types
// ============================================================================

/** An address on the persisted elevated watchlist */
export interface ElevatedEntry {
  address: string;
  reason: string;
  addedAt: number;
}

/** Input accepted by {@link EventStore.recordLargeTrade} */
export interface LargeTradeInput {
  /** Upstream trade id; may be empty */
  tradeId: string;
  wallet: string;
  instrument: string;
  side: TradeSide | null;
  notional: number;
  timestamp: number;
  accountAgeDays?: number | null;
}

/** Row counts per table */
export interface StoreCounts {
  seen: number;
  cursors: number;
  marketTrades: number;
  clusters: number;
  elevated: number;
}

export interface EventStoreConfig {
  /** Existing connection; a new one is opened from `path` otherwise */
  db?: SqliteDatabase;
  path?: string;
}

interface CursorRow {
  last_ms: number;
}

interface TradeRow {
  trade_id: string;
  wallet: string;
  token: string;
  side: string | null;
  notional: number;
  timestamp_ms: number;
  wallet_age_days: number | null;
}

interface ClusterRow {
  cluster_id: string;
  wallets: string;
  token: string;
  direction: string;
  total_notional: number;
  trade_count: number;
  time_span_minutes: number;
  suspicion_score: number;
  signals: string;
  trades: string;
  first_trade_ms: number;
  last_trade_ms: number;
  detected_at: number;
}

interface ElevatedRow {
  address: string;
  reason: string;
  added_at: number;
}

interface CountRow {
  n: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

function toSide(value: unknown): TradeSide | null {
  return value === "buy" || value === "sell" ? value : null;
}

function toDirection(value: string): ClusterDirection {
  return value === "SHORT" ? "SHORT" : "LONG";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === "string" ? value : "";
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function parseWallets(text: string): string[] {
  const value = parseJson(text);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function parseTrades(text: string): LargeTradeRecord[] {
  const value = parseJson(text);
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map((item) => {
    const age = item.accountAgeDays;
    return {
      tradeKey: readString(item, "tradeKey"),
      wallet: readString(item, "wallet"),
      instrument: readString(item, "instrument"),
      side: toSide(item.side),
      notional: readNumber(item, "notional"),
      timestamp: readNumber(item, "timestamp"),
      accountAgeDays: typeof age === "number" ? age : null,
    };
  });
}

function parseSignals(text: string): ClusterSignals & { points: SignalPoints } {
  const value = parseJson(text);
  const source = isRecord(value) ? value : {};
  const points = isRecord(source.points) ? source.points : {};
  return {
    timeSpanMinutes: readNumber(source, "timeSpanMinutes"),
    totalNotional: readNumber(source, "totalNotional"),
    walletCount: readNumber(source, "walletCount"),
    avgAccountAgeDays: readNumber(source, "avgAccountAgeDays"),
    alignment: readNumber(source, "alignment"),
    sizeVariation: readNumber(source, "sizeVariation"),
    recurrence: readNumber(source, "recurrence"),
    points: {
      timing: readNumber(points, "timing"),
      notional: readNumber(points, "notional"),
      wallets: readNumber(points, "wallets"),
      accountAge: readNumber(points, "accountAge"),
      alignment: readNumber(points, "alignment"),
      homogeneity: readNumber(points, "homogeneity"),
      recurrence: readNumber(points, "recurrence"),
    },
  };
}

function rowToTrade(row: TradeRow): LargeTradeRecord {
  return {
    tradeKey: row.trade_id,
    wallet: row.wallet,
    instrument: row.token,
    side: toSide(row.side),
    notional: row.notional,
    timestamp: row.timestamp_ms,
    accountAgeDays: row.wallet_age_days,
  };
}

function rowToCluster(row: ClusterRow): Cluster {
  const wallets = parseWallets(row.wallets);
  const signals = parseSignals(row.signals);
  return {
    clusterId: row.cluster_id,
    wallets,
    instrument: row.token,
    direction: toDirection(row.direction),
    trades: parseTrades(row.trades),
    totalNotional: row.total_notional,
    walletCount: wallets.length,
    tradeCount: row.trade_count,
    timeSpanMinutes: row.time_span_minutes,
    alignment: signals.alignment,
    score: row.suspicion_score,
    signals,
    firstTradeMs: row.first_trade_ms,
    lastTradeMs: row.last_trade_ms,
    detectedAt: row.detected_at,
  };
}

/**
 * Key under which a large fill is archived. The upstream trade id is shared by
 * both counterparties, so the wallet is part of the key.
 */
export function largeTradeKey(input: Pick<LargeTradeInput, "tradeId" | "wallet" | "instrument" | "timestamp">): string {
  const wallet = input.wallet.toLowerCase();
  if (input.tradeId !== "") {
    return `${input.tradeId}:${wallet}`;
  }
  return digest(wallet, input.instrument, input.timestamp);
}

// ============================================================================
// Main Class
// ============================================================================

export class EventStore {
  private readonly db: SqliteDatabase;

  constructor(config: EventStoreConfig = {}) {
    this.db = config.db ?? openDatabase({ path: config.path });
  }

  /**
   * Record a digest as notified. Returns true when it was not seen before.
   */
  markSeen(value: string, nowMs: number = Date.now()): boolean {
    const result = this.db
      .prepare<[string, number]>("INSERT OR IGNORE INTO seen (digest, ts) VALUES (?, ?)")
      .run(value, nowMs);
    return result.changes > 0;
  }

  isSeen(value: string): boolean {
    const row = this.db.prepare<[string], CountRow>("SELECT 1 AS n FROM seen WHERE digest = ?").get(value);
    return row !== undefined;
  }

  /**
   * Resume point of a source. On first use the fallback is persisted and returned.
   */
  getCursor(source: string, fallbackMs: number): number {
    const read = this.db.prepare<[string], CursorRow>("SELECT last_ms FROM cursors WHERE source = ?");
    const insert = this.db.prepare<[string, number]>("INSERT INTO cursors (source, last_ms) VALUES (?, ?)");

    const tx = this.db.transaction((key: string, fallback: number): number => {
      const row = read.get(key);
      if (row) {
        return row.last_ms;
      }
      insert.run(key, fallback);
      return fallback;
    });

    return tx(source, fallbackMs);
  }

  /**
   * Advance a cursor. Values older than the stored one are ignored.
   */
  setCursor(source: string, ms: number): void {
    this.db
      .prepare<[string, number]>(
        `INSERT INTO cursors (source, last_ms) VALUES (?, ?)
         ON CONFLICT(source) DO UPDATE SET last_ms = MAX(last_ms, excluded.last_ms)`
      )
      .run(source, ms);
  }

  /** Delete a cursor so the next read falls back again. Returns true if one existed. */
  resetCursor(source: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM cursors WHERE source = ?").run(source).changes > 0;
  }

  /**
   * Upsert a large fill into the archive and return its key
   */
  recordLargeTrade(input: LargeTradeInput): string {
    const key = largeTradeKey(input);
    this.db
      .prepare<[string, string, string, string | null, number, number, number | null]>(
        `INSERT INTO market_trades (trade_id, wallet, token, side, notional, timestamp_ms, wallet_age_days)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(trade_id) DO UPDATE SET
           wallet = excluded.wallet,
           token = excluded.token,
           side = excluded.side,
           notional = excluded.notional,
           timestamp_ms = excluded.timestamp_ms,
           wallet_age_days = COALESCE(excluded.wallet_age_days, market_trades.wallet_age_days)`
      )
      .run(
        key,
        input.wallet.toLowerCase(),
        input.instrument,
        input.side,
        input.notional,
        input.timestamp,
        input.accountAgeDays ?? null
      );
    return key;
  }

  /**
   * Archived fills inside the window with at least the given notional, newest first
   */
  recentLargeTrades(windowMinutes: number, minNotional: number, nowMs: number = Date.now()): LargeTradeRecord[] {
    const cutoff = nowMs - windowMinutes * 60 * 1000;
    return this.db
      .prepare<[number, number], TradeRow>(
        `SELECT trade_id, wallet, token, side, notional, timestamp_ms, wallet_age_days
         FROM market_trades
         WHERE notional >= ? AND timestamp_ms >= ?
         ORDER BY timestamp_ms DESC`
      )
      .all(minNotional, cutoff)
      .map(rowToTrade);
  }

  /**
   * Persist a cluster. Returns false when a cluster with the same id exists.
   */
  saveCluster(cluster: Cluster): boolean {
    const result = this.db
      .prepare<[string, string, string, string, number, number, number, number, string, string, number, number, number]>(
        `INSERT OR IGNORE INTO suspicious_clusters
         (cluster_id, wallets, token, direction, total_notional, trade_count, time_span_minutes,
          suspicion_score, signals, trades, first_trade_ms, last_trade_ms, detected_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        cluster.clusterId,
        JSON.stringify(cluster.wallets),
        cluster.instrument,
        cluster.direction,
        cluster.totalNotional,
        cluster.tradeCount,
        cluster.timeSpanMinutes,
        cluster.score,
        JSON.stringify(cluster.signals),
        JSON.stringify(cluster.trades),
        cluster.firstTradeMs,
        cluster.lastTradeMs,
        cluster.detectedAt
      );
    return result.changes > 0;
  }

  listClusters(limit = 20): Cluster[] {
    return this.db
      .prepare<[number], ClusterRow>("SELECT * FROM suspicious_clusters ORDER BY detected_at DESC, rowid DESC LIMIT ?")
      .all(Math.max(0, Math.floor(limit)))
      .map(rowToCluster);
  }

  /**
   * Add an address to the elevated watchlist. Returns true when newly inserted.
   */
  addElevated(address: string, reason: string, addedAtMs: number = Date.now()): boolean {
    const result = this.db
      .prepare<[string, string, number]>("INSERT OR IGNORE INTO elevated_wallets (address, reason, added_at) VALUES (?, ?, ?)")
      .run(address.toLowerCase(), reason, addedAtMs);
    return result.changes > 0;
  }

  listElevated(): ElevatedEntry[] {
    return this.db
      .prepare<[], ElevatedRow>("SELECT address, reason, added_at FROM elevated_wallets ORDER BY added_at ASC, rowid ASC")
      .all()
      .map((row) => ({ address: row.address, reason: row.reason, addedAt: row.added_at }));
  }

  counts(): StoreCounts {
    const count = (table: string): number =>
      this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;

    return {
      seen: count("seen"),
      cursors: count("cursors"),
      marketTrades: count("market_trades"),
      clusters: count("suspicious_clusters"),
      elevated: count("elevated_wallets"),
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createEventStore(config: EventStoreConfig = {}): EventStore {
  return new EventStore(config);
}

/**
 * Source key of an address's resume cursor
 */
export function addressCursorKey(address: string): string {
  return `hyperliquid:addr:${address.toLowerCase()}`;
}
