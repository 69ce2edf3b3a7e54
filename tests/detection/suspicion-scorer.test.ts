/**
 * Unit Tests for the suspicion scorer
 */

import { describe, it, expect } from "vitest";
import {
  ACCOUNT_AGE_CAP,
  ALIGNMENT_CAP,
  HOMOGENEITY_CAP,
  MAX_SUSPICION_SCORE,
  NOTIONAL_CAP,
  RECURRENCE_CAP,
  TIMING_CAP,
  WALLET_CAP,
  coefficientOfVariation,
  computeSuspicionScore,
  scoreAccountAge,
  scoreAlignment,
  scoreHomogeneity,
  scoreNotional,
  scoreRecurrence,
  scoreSignals,
  scoreTiming,
  scoreWallets,
} from "../../src/detection/suspicion-scorer";
import type { ClusterSignals } from "../../src/detection/types";

function signals(overrides: Partial<ClusterSignals> = {}): ClusterSignals {
  return {
    timeSpanMinutes: 0.75,
    totalNotional: 60_000_000,
    walletCount: 3,
    avgAccountAgeDays: 30,
    alignment: 1,
    sizeVariation: 0,
    recurrence: 0,
    ...overrides,
  };
}

describe("signal scorers", () => {
  it("should score timing by band", () => {
    expect(scoreTiming(0.5)).toBe(25);
    expect(scoreTiming(1)).toBe(20);
    expect(scoreTiming(4.99)).toBe(20);
    expect(scoreTiming(5)).toBe(14);
    expect(scoreTiming(15)).toBe(8);
    expect(scoreTiming(30)).toBe(3);
    expect(scoreTiming(60)).toBe(3);
    expect(scoreTiming(60.01)).toBe(0);
  });

  it("should score notional linearly up to its cap", () => {
    expect(scoreNotional(49_990_000)).toBe(9);
    expect(scoreNotional(60_000_000)).toBe(12);
    expect(scoreNotional(100_000_000)).toBe(20);
    expect(scoreNotional(500_000_000)).toBe(20);
  });

  it("should score wallets per wallet up to its cap", () => {
    expect(scoreWallets(2)).toBe(16);
    expect(scoreWallets(3)).toBe(20);
    expect(scoreWallets(8)).toBe(20);
  });

  it("should score younger accounts higher", () => {
    expect(scoreAccountAge(2.9)).toBe(10);
    expect(scoreAccountAge(3)).toBe(7);
    expect(scoreAccountAge(7)).toBe(4);
    expect(scoreAccountAge(13)).toBe(4);
    expect(scoreAccountAge(14)).toBe(0);
    expect(scoreAccountAge(30)).toBe(0);
  });

  it("should score alignment above the gate only", () => {
    expect(scoreAlignment(0.8)).toBe(0);
    expect(scoreAlignment(0.9)).toBe(5);
    expect(scoreAlignment(1)).toBe(10);
  });

  it("should score homogeneous sizes higher", () => {
    expect(scoreHomogeneity(0)).toBe(10);
    expect(scoreHomogeneity(0.05)).toBe(10);
    expect(scoreHomogeneity(0.1)).toBe(7);
    expect(scoreHomogeneity(0.3)).toBe(4);
    expect(scoreHomogeneity(0.5)).toBe(2);
    expect(scoreHomogeneity(0.51)).toBe(0);
  });

  it("should score recurrence on other instruments", () => {
    expect(scoreRecurrence(0)).toBe(0);
    expect(scoreRecurrence(1)).toBe(5);
    expect(scoreRecurrence(2)).toBe(10);
    expect(scoreRecurrence(6)).toBe(10);
  });

  it("should keep every single signal under the default threshold", () => {
    for (const limit of [TIMING_CAP, NOTIONAL_CAP, WALLET_CAP, ACCOUNT_AGE_CAP, ALIGNMENT_CAP, HOMOGENEITY_CAP, RECURRENCE_CAP]) {
      expect(limit).toBeLessThan(70);
    }
  });
});

describe("scoreSignals", () => {
  it("should add the per-signal points", () => {
    expect(scoreSignals(signals())).toEqual({
      score: 77,
      points: { timing: 25, notional: 12, wallets: 20, accountAge: 0, alignment: 10, homogeneity: 10, recurrence: 0 },
    });
  });

  it("should cap the total at 100", () => {
    const score = computeSuspicionScore(
      signals({ totalNotional: 1e9, avgAccountAgeDays: 1, recurrence: 3 })
    );
    expect(score).toBe(MAX_SUSPICION_SCORE);
  });

  it("should be deterministic", () => {
    expect(computeSuspicionScore(signals({ sizeVariation: 0.2 }))).toBe(computeSuspicionScore(signals({ sizeVariation: 0.2 })));
  });
});

describe("score monotonicity", () => {
  it("should never decrease as the time span tightens", () => {
    const base = signals({ walletCount: 2, totalNotional: 51_000_000 });
    let previous = -1;
    for (let span = 10; span >= 0.5; span -= 0.25) {
      const score = computeSuspicionScore({ ...base, timeSpanMinutes: span });
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
    expect(previous).toBe(71);
  });

  it("should never decrease as trade sizes converge", () => {
    const base = signals({ walletCount: 2, totalNotional: 51_000_000 });
    let previous = -1;
    for (let step = 100; step >= 0; step -= 5) {
      const score = computeSuspicionScore({ ...base, sizeVariation: step / 100 });
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
    expect(previous).toBe(71);
  });
});

describe("coefficientOfVariation", () => {
  it("should be zero for identical values, single values and a zero mean", () => {
    expect(coefficientOfVariation([10, 10, 10])).toBe(0);
    expect(coefficientOfVariation([5])).toBe(0);
    expect(coefficientOfVariation([])).toBe(0);
    expect(coefficientOfVariation([0, 0])).toBe(0);
  });

  it("should use the population standard deviation", () => {
    expect(coefficientOfVariation([1, 3])).toBe(0.5);
  });
});
