/**
 * Suspicion Scorer
 *
 * Pure scoring of a cluster's signal bundle into an integer in [0, 100].
 * Each signal has its own cap; none of them alone reaches the default
 * qualification threshold of 70.
 */

import type { ClusterSignals, SignalPoints, SuspicionBreakdown } from "./types";

// ============================================================================
// Constants
// ============================================================================

export const MAX_SUSPICION_SCORE = 100;

/** Timing tightness bands: [upper bound in minutes, points, inclusive] */
export const TIMING_BANDS: ReadonlyArray<{ maxMinutes: number; points: number; inclusive: boolean }> = [
  { maxMinutes: 1, points: 25, inclusive: false },
  { maxMinutes: 5, points: 20, inclusive: false },
  { maxMinutes: 15, points: 14, inclusive: false },
  { maxMinutes: 30, points: 8, inclusive: false },
  { maxMinutes: 60, points: 3, inclusive: true },
];
export const TIMING_CAP = 25;

export const NOTIONAL_REFERENCE_USD = 100_000_000;
export const NOTIONAL_POINTS_AT_REFERENCE = 20;
export const NOTIONAL_CAP = 20;

export const POINTS_PER_WALLET = 8;
export const WALLET_CAP = 20;

/** Younger accounts score higher: [upper bound in days (exclusive), points] */
export const ACCOUNT_AGE_BANDS: ReadonlyArray<{ maxDays: number; points: number }> = [
  { maxDays: 3, points: 10 },
  { maxDays: 7, points: 7 },
  { maxDays: 14, points: 4 },
];
export const ACCOUNT_AGE_CAP = 10;
/** Age assumed when no lookup is possible; scores zero */
export const NEUTRAL_ACCOUNT_AGE_DAYS = 30;

export const ALIGNMENT_GATE = 0.8;
export const ALIGNMENT_SCALE = 50;
export const ALIGNMENT_CAP = 10;

/** Coefficient-of-variation bands: [upper bound (inclusive), points] */
export const HOMOGENEITY_BANDS: ReadonlyArray<{ maxVariation: number; points: number }> = [
  { maxVariation: 0.05, points: 10 },
  { maxVariation: 0.15, points: 7 },
  { maxVariation: 0.3, points: 4 },
  { maxVariation: 0.5, points: 2 },
];
export const HOMOGENEITY_CAP = 10;

export const RECURRENCE_POINTS_SINGLE = 5;
export const RECURRENCE_POINTS_MULTIPLE = 10;
export const RECURRENCE_CAP = 10;

// ============================================================================
// Signal scorers
// ============================================================================

function cap(points: number, limit: number): number {
  return Math.max(0, Math.min(limit, points));
}

export function scoreTiming(timeSpanMinutes: number): number {
  for (const band of TIMING_BANDS) {
    const inside = band.inclusive ? timeSpanMinutes <= band.maxMinutes : timeSpanMinutes < band.maxMinutes;
    if (inside) {
      return cap(band.points, TIMING_CAP);
    }
  }
  return 0;
}

export function scoreNotional(totalNotional: number): number {
  return cap(Math.floor((totalNotional / NOTIONAL_REFERENCE_USD) * NOTIONAL_POINTS_AT_REFERENCE), NOTIONAL_CAP);
}

export function scoreWallets(walletCount: number): number {
  return cap(walletCount * POINTS_PER_WALLET, WALLET_CAP);
}

export function scoreAccountAge(avgAccountAgeDays: number): number {
  for (const band of ACCOUNT_AGE_BANDS) {
    if (avgAccountAgeDays < band.maxDays) {
      return cap(band.points, ACCOUNT_AGE_CAP);
    }
  }
  return 0;
}

export function scoreAlignment(alignment: number): number {
  if (alignment <= ALIGNMENT_GATE) {
    return 0;
  }
  return cap(Math.round((alignment - ALIGNMENT_GATE) * ALIGNMENT_SCALE), ALIGNMENT_CAP);
}

export function scoreHomogeneity(sizeVariation: number): number {
  for (const band of HOMOGENEITY_BANDS) {
    if (sizeVariation <= band.maxVariation) {
      return cap(band.points, HOMOGENEITY_CAP);
    }
  }
  return 0;
}

export function scoreRecurrence(otherInstruments: number): number {
  if (otherInstruments <= 0) {
    return 0;
  }
  return cap(otherInstruments === 1 ? RECURRENCE_POINTS_SINGLE : RECURRENCE_POINTS_MULTIPLE, RECURRENCE_CAP);
}

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Per-signal points and their capped total
 */
export function scoreSignals(signals: ClusterSignals): SuspicionBreakdown {
  const points: SignalPoints = {
    timing: scoreTiming(signals.timeSpanMinutes),
    notional: scoreNotional(signals.totalNotional),
    wallets: scoreWallets(signals.walletCount),
    accountAge: scoreAccountAge(signals.avgAccountAgeDays),
    alignment: scoreAlignment(signals.alignment),
    homogeneity: scoreHomogeneity(signals.sizeVariation),
    recurrence: scoreRecurrence(signals.recurrence),
  };

  const total = Object.values(points).reduce((sum, value) => sum + value, 0);
  return { score: Math.min(MAX_SUSPICION_SCORE, Math.round(total)), points };
}

export function computeSuspicionScore(signals: ClusterSignals): number {
  return scoreSignals(signals).score;
}

/**
 * Coefficient of variation (population standard deviation over mean); 0 for
 * fewer than two values or a zero mean
 */
export function coefficientOfVariation(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  if (mean === 0) {
    return 0;
  }
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance) / Math.abs(mean);
}
