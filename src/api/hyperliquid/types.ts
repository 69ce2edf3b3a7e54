/**
 * Hyperliquid Info API types
 *
 * Raw payload shapes returned by the public `info` endpoint, and the normalized
 * Fill and Transfer records the rest of the watcher works with.
 */

// ============================================================================
// Raw payloads
// ============================================================================

/** One entry of a `userFills` / `userFillsByTime` response */
export interface RawFill {
  /** Instrument, e.g. "BTC" */
  coin?: unknown;
  /** Price as a decimal string */
  px?: unknown;
  /** Unsigned size as a decimal string */
  sz?: unknown;
  /** "B" (bid) or "A" (ask) */
  side?: unknown;
  time?: unknown;
  /** e.g. "Open Short", "Close Long" */
  dir?: unknown;
  hash?: unknown;
  oid?: unknown;
  tid?: unknown;
  [key: string]: unknown;
}

/** `delta` object of a non-funding ledger update */
export interface RawLedgerDelta {
  /** "deposit", "withdraw", "internalTransfer", ... */
  type?: unknown;
  usdc?: unknown;
  token?: unknown;
  amount?: unknown;
  usdcValue?: unknown;
  [key: string]: unknown;
}

/** One entry of a `userNonFundingLedgerUpdates` response */
export interface RawLedgerUpdate {
  time?: unknown;
  hash?: unknown;
  delta?: unknown;
  [key: string]: unknown;
}

/** Request body accepted by the info endpoint */
export type InfoRequest =
  | { type: "userFills"; user: string }
  | { type: "userFillsByTime"; user: string; startTime: number; endTime?: number }
  | { type: "userNonFundingLedgerUpdates"; user: string; startTime: number; endTime?: number };

// ============================================================================
// Normalized records
// ============================================================================

export type TradeSide = "buy" | "sell";

/** A single executed trade of an account */
export interface Fill {
  instrument: string;
  /** Signed size, negative for sells */
  size: number;
  price: number;
  /** null when the upstream encoding is not recognized */
  side: TradeSide | null;
  /** Direction label such as "Open Short"; may be empty */
  direction: string;
  /** Epoch milliseconds, 0 when missing */
  timestamp: number;
  notional: number;
  tradeId: string;
  orderId: string;
}

export type TransferKind = "deposit" | "withdrawal" | "internal_transfer";

/** A ledger movement of an account */
export interface Transfer {
  kind: TransferKind;
  token: string;
  /** Absolute USD value */
  amountUsd: number;
  timestamp: number;
  sourceId: string;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error raised for any failed or malformed info API exchange
 */
export class HyperliquidApiException extends Error {
  public readonly statusCode: number | undefined;
  public readonly retryable: boolean;

  constructor(message: string, statusCode?: number, retryable = false) {
    super(message);
    this.name = "HyperliquidApiException";
    this.statusCode = statusCode;
    this.retryable = retryable;
  }
}
