/**
 * Unit Tests for the activity classifier
 */

import { describe, it, expect } from "vitest";
import type { Fill, Transfer } from "../../src/api/hyperliquid/types";
import {
  classifyActivity,
  findingDigest,
  isShortOpenLabel,
  summarizeFindings,
  type ClassifierOptions,
} from "../../src/detection/classifier";
import type { Finding } from "../../src/detection/types";

const ADDRESS = "0xAbCdEf0000000000000000000000000000000001";
const OWNER = ADDRESS.toLowerCase();

const normal: ClassifierOptions = {
  isElevated: false,
  depositThresholdUsd: 20_000_000,
  shortThresholdUsd: 25_000_000,
};
const elevated: ClassifierOptions = { ...normal, isElevated: true };

function fill(overrides: Partial<Fill> = {}): Fill {
  return {
    instrument: "BTC",
    size: -300,
    price: 100_000,
    side: "sell",
    direction: "Open Short",
    timestamp: 2000,
    notional: 30_000_000,
    tradeId: "t1",
    orderId: "o1",
    ...overrides,
  };
}

function transfer(overrides: Partial<Transfer> = {}): Transfer {
  return {
    kind: "deposit",
    token: "USDC",
    amountUsd: 21_000_000,
    timestamp: 1000,
    sourceId: "0xdep",
    ...overrides,
  };
}

describe("classifyActivity", () => {
  describe("non-elevated accounts", () => {
    it("should report a large stablecoin deposit", () => {
      const findings = classifyActivity(ADDRESS, [], [transfer()], normal);
      expect(findings).toEqual([
        {
          kind: "LARGE_DEPOSIT",
          address: OWNER,
          token: "USDC",
          notional: 21_000_000,
          timestamp: 1000,
          sourceId: "0xdep",
          activity: "Deposit",
          size: 21_000_000,
        },
      ]);
    });

    it("should include deposits exactly at the threshold", () => {
      const findings = classifyActivity(ADDRESS, [], [transfer({ amountUsd: 20_000_000 })], normal);
      expect(findings).toHaveLength(1);
    });

    it("should ignore small deposits, non-stable tokens and withdrawals", () => {
      const findings = classifyActivity(
        ADDRESS,
        [],
        [
          transfer({ amountUsd: 19_999_999 }),
          transfer({ token: "ETH" }),
          transfer({ kind: "withdrawal" }),
          transfer({ kind: "internal_transfer" }),
        ],
        normal
      );
      expect(findings).toEqual([]);
    });

    it("should honour a custom stable token set", () => {
      const findings = classifyActivity(ADDRESS, [], [transfer({ token: "usde" })], {
        ...normal,
        stableTokens: ["USDE"],
      });
      expect(findings.map((f) => f.token)).toEqual(["USDE"]);
    });

    it("should report a large short open with size and price", () => {
      const [finding] = classifyActivity(ADDRESS, [fill()], [], normal);
      expect(finding).toEqual({
        kind: "LARGE_OPEN_SHORT",
        address: OWNER,
        token: "BTC",
        notional: 30_000_000,
        timestamp: 2000,
        sourceId: "t1",
        size: -300,
        price: 100_000,
        activity: "Open Short",
      });
    });

    it("should treat a short-open label as a short even without a sell side", () => {
      const findings = classifyActivity(ADDRESS, [fill({ side: null, direction: "Open Short" })], [], normal);
      expect(findings.map((f) => f.kind)).toEqual(["LARGE_OPEN_SHORT"]);
    });

    it("should label a sell without direction as Open Short", () => {
      const [finding] = classifyActivity(ADDRESS, [fill({ direction: "" })], [], normal);
      expect(finding?.activity).toBe("Open Short");
    });

    it("should ignore buys and small shorts", () => {
      const findings = classifyActivity(
        ADDRESS,
        [
          fill({ side: "buy", direction: "Open Long", size: 300 }),
          fill({ notional: 24_999_999 }),
        ],
        [],
        normal
      );
      expect(findings).toEqual([]);
    });
  });

  describe("elevated accounts", () => {
    it("should report every fill regardless of size", () => {
      const findings = classifyActivity(
        ADDRESS,
        [
          fill({ side: "buy", direction: "Open Long", notional: 10, tradeId: "a" }),
          fill({ side: "sell", direction: "", notional: 5, tradeId: "b", timestamp: 2001 }),
          fill({ side: null, direction: "", notional: 1, tradeId: "c", timestamp: 2002 }),
        ],
        [],
        elevated
      );
      expect(findings.map((f) => [f.kind, f.activity])).toEqual([
        ["ELEVATED_ACTIVITY", "Open Long"],
        ["ELEVATED_ACTIVITY", "SELL"],
        ["ELEVATED_ACTIVITY", "TRADE"],
      ]);
    });

    it("should report deposits and withdrawals but not internal transfers", () => {
      const findings = classifyActivity(
        ADDRESS,
        [],
        [
          transfer({ amountUsd: 5, sourceId: "d" }),
          transfer({ kind: "withdrawal", amountUsd: 7, sourceId: "w", timestamp: 1001 }),
          transfer({ kind: "internal_transfer", sourceId: "i", timestamp: 1002 }),
        ],
        elevated
      );
      expect(findings.map((f) => [f.activity, f.size])).toEqual([
        ["Deposit", 5],
        ["Withdraw", 7],
      ]);
    });
  });

  describe("ordering", () => {
    it("should order by timestamp with transfers first on ties", () => {
      const findings = classifyActivity(
        ADDRESS,
        [fill({ timestamp: 1000, tradeId: "f" })],
        [transfer({ timestamp: 1000, sourceId: "t" }), transfer({ timestamp: 500, sourceId: "early" })],
        elevated
      );
      expect(findings.map((f) => f.sourceId)).toEqual(["early", "t", "f"]);
    });

    it("should rank missing timestamps last", () => {
      const findings = classifyActivity(
        ADDRESS,
        [fill({ timestamp: 0, tradeId: "zero" }), fill({ timestamp: 3000, tradeId: "late" })],
        [],
        elevated
      );
      expect(findings.map((f) => f.sourceId)).toEqual(["late", "zero"]);
    });
  });
});

describe("isShortOpenLabel", () => {
  it("should recognise short-open labels", () => {
    expect(isShortOpenLabel("Open Short")).toBe(true);
    expect(isShortOpenLabel("SHORT_OPEN")).toBe(true);
    expect(isShortOpenLabel("Close Short")).toBe(false);
    expect(isShortOpenLabel("Open Long")).toBe(false);
  });
});

describe("findingDigest", () => {
  it("should be stable and case-insensitive on the address", () => {
    const finding = { address: OWNER, kind: "LARGE_DEPOSIT" as const, sourceId: "x", timestamp: 1 };
    expect(findingDigest(finding)).toBe(findingDigest({ ...finding, address: ADDRESS }));
    expect(findingDigest(finding)).not.toBe(findingDigest({ ...finding, timestamp: 2 }));
  });
});

describe("summarizeFindings", () => {
  it("should collapse a batch into one summary finding", () => {
    const findings: Finding[] = [
      ...classifyActivity(ADDRESS, [fill({ tradeId: "a", timestamp: 10 }), fill({ tradeId: "b", timestamp: 30, instrument: "ETH" })], [], elevated),
      ...classifyActivity(ADDRESS, [], [transfer({ amountUsd: 1_000_000, timestamp: 20 })], elevated),
    ];

    const summary = summarizeFindings(ADDRESS, findings);

    expect(summary).toEqual({
      kind: "ACTIVITY_SUMMARY",
      address: OWNER,
      token: "BTC,ETH,USDC",
      notional: 61_000_000,
      timestamp: 30,
      sourceId: "summary:3",
      activity: "Summary",
      summary: "3 new findings (3 ELEVATED_ACTIVITY), total notional $61,000,000",
    });
  });
});
