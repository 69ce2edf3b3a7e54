/**
 * Offline cluster research
 *
 * Pulls the fills of a set of wallets for a fixed time window, keeps the large
 * sell-side ones and summarizes them per wallet. Used to find the wallets worth
 * seeding into ELEVATED_ADDRESSES after a market event.
 */

import type { LedgerFetcher } from "../api/hyperliquid/ledger-fetcher";
import type { Fill } from "../api/hyperliquid/types";
import { serviceLoggers } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

export interface ResearchWindow {
  startMs: number;
  endMs: number;
}

export interface ResearchTrade {
  wallet: string;
  instrument: string;
  size: number;
  price: number;
  notional: number;
  timestamp: number;
  timestampUtc: string;
  /** Minutes between the trade and the end of the window */
  minutesBeforeEnd: number;
  tradeId: string;
  orderId: string;
}

export interface WalletBreakdown {
  trades: number;
  notional: number;
  instruments: string[];
}

export interface ResearchAnalysis {
  totalTrades: number;
  uniqueWallets: number;
  totalNotional: number;
  timeSpanMinutes: number;
  firstTrade: ResearchTrade;
  lastTrade: ResearchTrade;
  instruments: string[];
  walletBreakdown: Record<string, WalletBreakdown>;
}

export interface ResearchReport {
  windowStartUtc: string;
  windowEndUtc: string;
  minNotionalUsd: number;
  walletsScanned: string[];
  walletErrors: Record<string, string>;
  analysis: ResearchAnalysis | null;
  trades: ResearchTrade[];
}

export const DEFAULT_RESEARCH_MIN_NOTIONAL = 5_000_000;

const MS_PER_MINUTE = 60 * 1000;

// ============================================================================
// Analysis
// ============================================================================

/**
 * Large sell-side fills of one wallet inside the window (both ends inclusive)
 */
export function filterWindowShorts(
  wallet: string,
  fills: readonly Fill[],
  window: ResearchWindow,
  minNotionalUsd: number
): ResearchTrade[] {
  return fills
    .filter(
      (fill) =>
        fill.side === "sell" &&
        fill.timestamp >= window.startMs &&
        fill.timestamp <= window.endMs &&
        fill.notional >= minNotionalUsd
    )
    .map((fill) => toResearchTrade(wallet, fill, window));
}

function toResearchTrade(
  wallet: string,
  fill: Fill,
  window: ResearchWindow
): ResearchTrade {
  return {
    wallet: wallet.toLowerCase(),
    instrument: fill.instrument,
    size: Math.abs(fill.size),
    price: fill.price,
    notional: fill.notional,
    timestamp: fill.timestamp,
    timestampUtc: new Date(fill.timestamp).toISOString(),
    minutesBeforeEnd: (window.endMs - fill.timestamp) / MS_PER_MINUTE,
    tradeId: fill.tradeId,
    orderId: fill.orderId,
  };
}

/**
 * Summarize a set of trades; null when there are none
 */
export function analyzeTrades(trades: readonly ResearchTrade[]): ResearchAnalysis | null {
  const sorted = [...trades].sort((a, b) => a.timestamp - b.timestamp);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last) {
    return null;
  }

  const walletBreakdown: Record<string, WalletBreakdown> = {};
  const instruments = new Set<string>();
  let totalNotional = 0;

  for (const trade of sorted) {
    totalNotional += trade.notional;
    instruments.add(trade.instrument);

    const entry = walletBreakdown[trade.wallet] ?? { trades: 0, notional: 0, instruments: [] };
    entry.trades++;
    entry.notional += trade.notional;
    if (!entry.instruments.includes(trade.instrument)) {
      entry.instruments.push(trade.instrument);
    }
    walletBreakdown[trade.wallet] = entry;
  }

  return {
    totalTrades: sorted.length,
    uniqueWallets: Object.keys(walletBreakdown).length,
    totalNotional,
    timeSpanMinutes: (last.timestamp - first.timestamp) / MS_PER_MINUTE,
    firstTrade: first,
    lastTrade: last,
    instruments: [...instruments],
    walletBreakdown,
  };
}

/**
 * Fetch every wallet's fills for the window and analyze the large shorts.
 * A wallet whose fetch fails is reported in walletErrors and skipped.
 */
export async function runClusterResearch(
  fetcher: Pick<LedgerFetcher, "fetchFills">,
  wallets: readonly string[],
  window: ResearchWindow,
  minNotionalUsd: number = DEFAULT_RESEARCH_MIN_NOTIONAL
): Promise<ResearchReport> {
  const log = serviceLoggers.api;
  const trades: ResearchTrade[] = [];
  const walletErrors: Record<string, string> = {};
  const scanned = [...new Set(wallets.map((wallet) => wallet.toLowerCase()))];

  for (const wallet of scanned) {
    try {
      const fills = await fetcher.fetchFills(wallet, window.startMs);
      trades.push(...filterWindowShorts(wallet, fills, window, minNotionalUsd));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      walletErrors[wallet] = message;
      log.warn("Research fetch failed", { wallet, error: message });
    }
  }

  trades.sort((a, b) => a.timestamp - b.timestamp);

  return {
    windowStartUtc: new Date(window.startMs).toISOString(),
    windowEndUtc: new Date(window.endMs).toISOString(),
    minNotionalUsd,
    walletsScanned: scanned,
    walletErrors,
    analysis: analyzeTrades(trades),
    trades,
  };
}

/**
 * The env line that seeds the elevated watchlist with every wallet in the report
 */
export function elevatedAddressesLine(report: Pick<ResearchReport, "trades">): string {
  const wallets = [...new Set(report.trades.map((trade) => trade.wallet))];
  return `ELEVATED_ADDRESSES=${wallets.join(",")}`;
}
