/**
 * Cluster Detector
 *
 * Detects coordinated trading across distinct accounts from the archive of
 * large fills.
 *
 * Features:
 * - Per-instrument grouping of the recent large-trade window
 * - Cardinality, wallet, span, notional and alignment gates
 * - Suspicion scoring over timing, size, wallets, account age, alignment,
 *   size homogeneity and cross-instrument recurrence
 * - Deterministic cluster ids
 * - Event emission for detections
 */

import { EventEmitter } from "events";
import type { EventStore } from "../db/event-store";
import { digest } from "../utils/digest";
import { serviceLoggers } from "../utils/logger";
import { averageAccountAgeDays, type AccountAgeProvider } from "./account-age";
import { ALIGNMENT_GATE, coefficientOfVariation, scoreSignals } from "./suspicion-scorer";
import type { Cluster, ClusterDirection, ClusterSignals, LargeTradeRecord } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface ClusterDetectorConfig {
  store: Pick<EventStore, "recentLargeTrades">;
  /** Account age lookups; neutral age for everyone when absent */
  ageProvider?: AccountAgeProvider;
  /** Scan window in minutes (default: 60) */
  windowMinutes?: number;
  /** Minimum suspicion score (default: 70) */
  minScore?: number;
  /** Minimum total cluster notional (default: 50M) */
  minNotionalUsd?: number;
  /** Minimum notional of a trade to be considered (default: 5M) */
  minTradeSizeUsd?: number;
  /** Instrument allowlist; empty means every instrument */
  instruments?: readonly string[];
  /** Emit events (default: true) */
  enableEvents?: boolean;
}

/** Outcome of one detection pass */
export interface ClusterScanSummary {
  tradesScanned: number;
  instrumentsEvaluated: number;
  candidatesScored: number;
  clustersFound: number;
  scannedAt: number;
}

// ============================================================================
// Constants
// ============================================================================

export const MIN_CLUSTER_TRADES = 3;
export const MIN_CLUSTER_WALLETS = 2;
export const DEFAULT_CLUSTER_WINDOW_MINUTES = 60;
export const DEFAULT_CLUSTER_MIN_SCORE = 70;
export const DEFAULT_CLUSTER_MIN_NOTIONAL = 50_000_000;
export const DEFAULT_MARKET_MIN_TRADE_SIZE = 5_000_000;

// ============================================================================
// Helper Functions
// ============================================================================

function groupByInstrument(trades: readonly LargeTradeRecord[]): Map<string, LargeTradeRecord[]> {
  const groups = new Map<string, LargeTradeRecord[]>();
  for (const trade of trades) {
    const group = groups.get(trade.instrument);
    if (group) {
      group.push(trade);
    } else {
      groups.set(trade.instrument, [trade]);
    }
  }
  return groups;
}

/** Most frequent value, the earliest seen winning ties */
function mostFrequent(values: readonly string[]): string {
  const counts = new Map<string, number>();
  let best = "";
  let bestCount = 0;
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Number of other instruments on which at least two of the wallets traded
 */
export function countRecurrence(
  wallets: ReadonlySet<string>,
  instrument: string,
  groups: ReadonlyMap<string, readonly LargeTradeRecord[]>
): number {
  let recurrence = 0;
  for (const [other, trades] of groups) {
    if (other === instrument) {
      continue;
    }
    const shared = new Set(trades.map((t) => t.wallet).filter((w) => wallets.has(w)));
    if (shared.size >= MIN_CLUSTER_WALLETS) {
      recurrence++;
    }
  }
  return recurrence;
}

/**
 * Deterministic id of a cluster signature
 */
export function clusterIdFor(
  firstTradeMs: number,
  walletCount: number,
  instrument: string,
  direction: ClusterDirection
): string {
  return digest(firstTradeMs, walletCount, instrument, direction);
}

// ============================================================================
// Main Class
// ============================================================================

export class ClusterDetector extends EventEmitter {
  private readonly store: Pick<EventStore, "recentLargeTrades">;
  private readonly ageProvider: AccountAgeProvider | undefined;
  private readonly windowMinutes: number;
  private readonly minScore: number;
  private readonly minNotionalUsd: number;
  private readonly minTradeSizeUsd: number;
  private readonly instruments: ReadonlySet<string>;
  private readonly enableEvents: boolean;
  private lastSummary: ClusterScanSummary | null = null;

  constructor(config: ClusterDetectorConfig) {
    super();
    this.store = config.store;
    this.ageProvider = config.ageProvider;
    this.windowMinutes = config.windowMinutes ?? DEFAULT_CLUSTER_WINDOW_MINUTES;
    this.minScore = config.minScore ?? DEFAULT_CLUSTER_MIN_SCORE;
    this.minNotionalUsd = config.minNotionalUsd ?? DEFAULT_CLUSTER_MIN_NOTIONAL;
    this.minTradeSizeUsd = config.minTradeSizeUsd ?? DEFAULT_MARKET_MIN_TRADE_SIZE;
    this.instruments = new Set((config.instruments ?? []).map((i) => i.toUpperCase()));
    this.enableEvents = config.enableEvents ?? true;
  }

  /**
   * Scan the recent large-trade window and return clusters that pass every
   * gate and reach the minimum score, highest score first
   */
  async detect(nowMs: number = Date.now()): Promise<Cluster[]> {
    const recent = this.store.recentLargeTrades(this.windowMinutes, this.minTradeSizeUsd, nowMs);
    const trades =
      this.instruments.size === 0 ? recent : recent.filter((t) => this.instruments.has(t.instrument.toUpperCase()));
    const groups = groupByInstrument(trades);

    const clusters: Cluster[] = [];
    let candidates = 0;

    for (const [instrument, group] of groups) {
      if (group.length < MIN_CLUSTER_TRADES) {
        continue;
      }
      const cluster = await this.evaluate(instrument, group, groups, nowMs);
      if (cluster === "gated") {
        continue;
      }
      candidates++;
      if (cluster) {
        clusters.push(cluster);
        serviceLoggers.detector.info("Cluster detected", {
          clusterId: cluster.clusterId,
          instrument: cluster.instrument,
          direction: cluster.direction,
          wallets: cluster.walletCount,
          score: cluster.score,
        });
        if (this.enableEvents) {
          this.emit("cluster:detected", cluster);
        }
      }
    }

    clusters.sort((a, b) => b.score - a.score);

    this.lastSummary = {
      tradesScanned: trades.length,
      instrumentsEvaluated: groups.size,
      candidatesScored: candidates,
      clustersFound: clusters.length,
      scannedAt: nowMs,
    };
    if (this.enableEvents) {
      this.emit("scan:complete", this.lastSummary);
    }
    return clusters;
  }

  getLastSummary(): ClusterScanSummary | null {
    return this.lastSummary;
  }

  /**
   * Score one instrument's trades. "gated" when a hard gate fails, null when the
   * score stays under the minimum.
   */
  private async evaluate(
    instrument: string,
    group: readonly LargeTradeRecord[],
    groups: ReadonlyMap<string, readonly LargeTradeRecord[]>,
    nowMs: number
  ): Promise<Cluster | null | "gated"> {
    const wallets = new Set(group.map((t) => t.wallet));
    if (wallets.size < MIN_CLUSTER_WALLETS) {
      return "gated";
    }

    const timestamps = group.map((t) => t.timestamp);
    const firstTradeMs = Math.min(...timestamps);
    const lastTradeMs = Math.max(...timestamps);
    const timeSpanMinutes = (lastTradeMs - firstTradeMs) / 60000;
    if (timeSpanMinutes > this.windowMinutes) {
      return "gated";
    }

    const notionals = group.map((t) => t.notional);
    const totalNotional = notionals.reduce((sum, n) => sum + n, 0);
    if (totalNotional < this.minNotionalUsd) {
      return "gated";
    }

    const sells = group.filter((t) => t.side === "sell").length;
    const buys = group.filter((t) => t.side === "buy").length;
    const alignment = Math.max(sells, buys) / group.length;
    if (alignment < ALIGNMENT_GATE) {
      return "gated";
    }

    const walletList = [...wallets];
    const signals: ClusterSignals = {
      timeSpanMinutes,
      totalNotional,
      walletCount: wallets.size,
      avgAccountAgeDays: await averageAccountAgeDays(this.ageLookup(group), walletList, nowMs),
      alignment,
      sizeVariation: coefficientOfVariation(notionals),
      recurrence: countRecurrence(wallets, instrument, groups),
    };

    const { score, points } = scoreSignals(signals);
    if (score < this.minScore) {
      serviceLoggers.detector.debug("Candidate below minimum score", { instrument, score, minScore: this.minScore });
      return null;
    }

    const direction: ClusterDirection = sells > buys ? "SHORT" : "LONG";
    const label = mostFrequent(group.map((t) => t.instrument));
    const ordered = [...group].sort((a, b) => a.timestamp - b.timestamp);

    return {
      clusterId: clusterIdFor(firstTradeMs, wallets.size, label, direction),
      wallets: walletList,
      instrument: label,
      direction,
      trades: ordered,
      totalNotional,
      walletCount: wallets.size,
      tradeCount: group.length,
      timeSpanMinutes,
      alignment,
      score,
      signals: { ...signals, points },
      firstTradeMs,
      lastTradeMs,
      detectedAt: nowMs,
    };
  }

  /**
   * Ages recorded with the trades take precedence over live lookups
   */
  private ageLookup(group: readonly LargeTradeRecord[]): AccountAgeProvider | undefined {
    const recorded = new Map<string, number>();
    for (const trade of group) {
      if (trade.accountAgeDays !== null) {
        recorded.set(trade.wallet, trade.accountAgeDays);
      }
    }
    const provider = this.ageProvider;
    if (recorded.size === 0) {
      return provider;
    }
    return {
      async getAgeDays(address: string, nowMs?: number): Promise<number | null> {
        const known = recorded.get(address);
        if (known !== undefined) {
          return known;
        }
        return provider ? provider.getAgeDays(address, nowMs) : null;
      },
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createClusterDetector(config: ClusterDetectorConfig): ClusterDetector {
  return new ClusterDetector(config);
}
