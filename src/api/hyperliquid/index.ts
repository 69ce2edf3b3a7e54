/**
 * Hyperliquid API module
 */

export { HyperliquidClient, createHyperliquidClient } from "./client";
export type { HyperliquidClientConfig } from "./client";
export {
  HyperliquidLedgerFetcher,
  createLedgerFetcher,
  normalizeFill,
  normalizeLedgerUpdate,
  normalizeSide,
  toFiniteNumber,
} from "./ledger-fetcher";
export type { LedgerFetcher, LedgerFetcherConfig } from "./ledger-fetcher";
export { HyperliquidApiException } from "./types";
export type {
  Fill,
  InfoRequest,
  RawFill,
  RawLedgerDelta,
  RawLedgerUpdate,
  TradeSide,
  Transfer,
  TransferKind,
} from "./types";
