/**
 * Hyperliquid Ledger Fetcher
 *
 * Pulls an account's fills and non-funding ledger updates from the info API and
 * normalizes them into Fill and Transfer records.
 *
 * Features:
 * - Time-bounded queries (`userFillsByTime`, `userNonFundingLedgerUpdates`)
 * - Client-side filtering to `timestamp >= since`
 * - Side normalization across upstream encodings
 * - Earliest ledger activity lookup for account age
 * - Success/failure of every call reported to a FetchHealthTracker
 */

import type { FetchHealthTracker } from "../../services/fetch-health";
import { HyperliquidClient } from "./client";
import {
  HyperliquidApiException,
  type Fill,
  type InfoRequest,
  type RawFill,
  type RawLedgerDelta,
  type RawLedgerUpdate,
  type TradeSide,
  type Transfer,
  type TransferKind,
} from "./types";

// ============================================================================
// Types
// ============================================================================

/** Source of account activity used by the scan loop */
export interface LedgerFetcher {
  fetchFills(address: string, sinceMs: number): Promise<Fill[]>;
  fetchTransfers(address: string, sinceMs: number): Promise<Transfer[]>;
  /** Earliest known ledger activity, or null when the account has none */
  fetchFirstActivityMs(address: string): Promise<number | null>;
}

export interface LedgerFetcherConfig {
  client?: HyperliquidClient;
  health?: FetchHealthTracker;
}

// ============================================================================
// Normalization
// ============================================================================

const BUY_SIDES = new Set(["b", "buy", "bid", "long"]);
const SELL_SIDES = new Set(["a", "sell", "ask", "short"]);

const TRANSFER_KINDS = new Map<string, TransferKind>([
  ["deposit", "deposit"],
  ["withdraw", "withdrawal"],
  ["internalTransfer", "internal_transfer"],
]);

/**
 * Map an upstream side encoding to buy/sell, or null when unrecognized
 */
export function normalizeSide(value: unknown): TradeSide | null {
  if (typeof value !== "string") {
    return null;
  }
  const key = value.trim().toLowerCase();
  if (BUY_SIDES.has(key)) {
    return "buy";
  }
  if (SELL_SIDES.has(key)) {
    return "sell";
  }
  return null;
}

/** Finite number from a string or number field, zero otherwise */
export function toFiniteNumber(value: unknown): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  return Number.isFinite(parsed) ? parsed : 0;
}

function toId(value: unknown): string {
  return typeof value === "string" || typeof value === "number" ? String(value) : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function normalizeFill(raw: RawFill): Fill {
  const side = normalizeSide(raw.side);
  const magnitude = Math.abs(toFiniteNumber(raw.sz));
  const price = toFiniteNumber(raw.px);
  const tradeId = toId(raw.tid);

  return {
    instrument: typeof raw.coin === "string" ? raw.coin : "",
    size: side === "sell" ? -magnitude : magnitude,
    price,
    side,
    direction: typeof raw.dir === "string" ? raw.dir : "",
    timestamp: Math.trunc(toFiniteNumber(raw.time)),
    notional: magnitude * price,
    tradeId: tradeId !== "" ? tradeId : toId(raw.hash),
    orderId: toId(raw.oid),
  };
}

/**
 * Normalize a ledger update; null for delta types that are not transfers
 */
export function normalizeLedgerUpdate(raw: RawLedgerUpdate): Transfer | null {
  const delta: RawLedgerDelta = isRecord(raw.delta) ? raw.delta : {};
  const kind = typeof delta.type === "string" ? TRANSFER_KINDS.get(delta.type) : undefined;
  if (!kind) {
    return null;
  }

  return {
    kind,
    token: typeof delta.token === "string" && delta.token !== "" ? delta.token.toUpperCase() : "USDC",
    amountUsd: Math.abs(toFiniteNumber(delta.usdc ?? delta.usdcValue ?? delta.amount)),
    timestamp: Math.trunc(toFiniteNumber(raw.time)),
    sourceId: typeof raw.hash === "string" ? raw.hash : "",
  };
}

// ============================================================================
// Main Class
// ============================================================================

export class HyperliquidLedgerFetcher implements LedgerFetcher {
  private readonly client: HyperliquidClient;
  private readonly health: FetchHealthTracker | undefined;

  constructor(config: LedgerFetcherConfig = {}) {
    this.client = config.client ?? new HyperliquidClient();
    this.health = config.health;
  }

  async fetchFills(address: string, sinceMs: number): Promise<Fill[]> {
    const rows = await this.requestList({
      type: "userFillsByTime",
      user: address.toLowerCase(),
      startTime: Math.max(0, Math.floor(sinceMs)),
    });

    return rows
      .filter(isRecord)
      .map((row) => normalizeFill(row))
      .filter((fill) => fill.timestamp >= sinceMs);
  }

  async fetchTransfers(address: string, sinceMs: number): Promise<Transfer[]> {
    const rows = await this.requestList({
      type: "userNonFundingLedgerUpdates",
      user: address.toLowerCase(),
      startTime: Math.max(0, Math.floor(sinceMs)),
    });

    const transfers: Transfer[] = [];
    for (const row of rows) {
      if (!isRecord(row)) {
        continue;
      }
      const transfer = normalizeLedgerUpdate(row);
      if (transfer && transfer.timestamp >= sinceMs) {
        transfers.push(transfer);
      }
    }
    return transfers;
  }

  async fetchFirstActivityMs(address: string): Promise<number | null> {
    const rows = await this.requestList({
      type: "userNonFundingLedgerUpdates",
      user: address.toLowerCase(),
      startTime: 0,
    });

    let earliest: number | null = null;
    for (const row of rows) {
      if (!isRecord(row)) {
        continue;
      }
      const time = toFiniteNumber(row.time);
      if (time > 0 && (earliest === null || time < earliest)) {
        earliest = time;
      }
    }
    return earliest;
  }

  /**
   * Issue one info request that must answer with a JSON array
   */
  private async requestList(body: InfoRequest): Promise<unknown[]> {
    try {
      const data = await this.client.info(body);
      if (!Array.isArray(data)) {
        throw new HyperliquidApiException(`Malformed ${body.type} payload: expected an array`);
      }
      this.health?.recordSuccess();
      return data;
    } catch (error) {
      this.health?.recordFailure(error);
      throw error;
    }
  }
}

export function createLedgerFetcher(config: LedgerFetcherConfig = {}): HyperliquidLedgerFetcher {
  return new HyperliquidLedgerFetcher(config);
}
