/**
 * Detection domain types shared by the classifier, the cluster detector and the store
 */

import type { TradeSide } from "../api/hyperliquid/types";

export type FindingKind = "ELEVATED_ACTIVITY" | "LARGE_DEPOSIT" | "LARGE_OPEN_SHORT" | "ACTIVITY_SUMMARY";

/** A notable event worth telling an operator about */
export interface Finding {
  kind: FindingKind;
  address: string;
  token: string;
  notional: number;
  timestamp: number;
  sourceId: string;
  /** Human-readable activity label, e.g. "Deposit" or "Open Short" */
  activity: string;
  size?: number;
  price?: number;
  /** Only set on ACTIVITY_SUMMARY findings */
  summary?: string;
}

/** A large fill kept for cross-account cluster analysis */
export interface LargeTradeRecord {
  tradeKey: string;
  wallet: string;
  instrument: string;
  side: TradeSide | null;
  notional: number;
  timestamp: number;
  accountAgeDays: number | null;
}

export type ClusterDirection = "LONG" | "SHORT";

/** Inputs to the suspicion score */
export interface ClusterSignals {
  timeSpanMinutes: number;
  totalNotional: number;
  walletCount: number;
  avgAccountAgeDays: number;
  alignment: number;
  /** Coefficient of variation of trade notionals */
  sizeVariation: number;
  /** Other instruments in the window traded by at least two of the wallets */
  recurrence: number;
}

export interface SignalPoints {
  timing: number;
  notional: number;
  wallets: number;
  accountAge: number;
  alignment: number;
  homogeneity: number;
  recurrence: number;
}

export interface SuspicionBreakdown {
  score: number;
  points: SignalPoints;
}

/** Coordinated activity across distinct accounts on one instrument */
export interface Cluster {
  clusterId: string;
  wallets: string[];
  instrument: string;
  direction: ClusterDirection;
  trades: LargeTradeRecord[];
  totalNotional: number;
  walletCount: number;
  tradeCount: number;
  timeSpanMinutes: number;
  alignment: number;
  score: number;
  signals: ClusterSignals & { points: SignalPoints };
  firstTradeMs: number;
  lastTradeMs: number;
  detectedAt: number;
}
