/**
 * Unit Tests for offline cluster research
 */

import { describe, it, expect, vi } from "vitest";
import type { Fill } from "../../src/api/hyperliquid/types";
import {
  analyzeTrades,
  elevatedAddressesLine,
  filterWindowShorts,
  runClusterResearch,
  type ResearchWindow,
} from "../../src/research/cluster-research";

const WALLET_A = "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
const WALLET_B = "0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";
const START = Date.UTC(2025, 9, 10, 20, 0, 0);
const END = Date.UTC(2025, 9, 10, 21, 0, 0);
const WINDOW: ResearchWindow = { startMs: START, endMs: END };
const MINUTE = 60_000;

function fill(overrides: Partial<Fill> = {}): Fill {
  return {
    instrument: "BTC",
    size: -100,
    price: 100_000,
    side: "sell",
    direction: "Open Short",
    timestamp: END - 10 * MINUTE,
    notional: 10_000_000,
    tradeId: "t1",
    orderId: "o1",
    ...overrides,
  };
}

describe("filterWindowShorts", () => {
  it("should keep large sells inside the window, both ends included", () => {
    const trades = filterWindowShorts(
      WALLET_A.toUpperCase().replace("0X", "0x"),
      [
        fill({ tradeId: "start", timestamp: START }),
        fill({ tradeId: "end", timestamp: END }),
        fill({ tradeId: "before", timestamp: START - 1 }),
        fill({ tradeId: "after", timestamp: END + 1 }),
        fill({ tradeId: "buy", side: "buy", size: 100 }),
        fill({ tradeId: "small", notional: 4_999_999 }),
      ],
      WINDOW,
      5_000_000
    );

    expect(trades.map((t) => t.tradeId)).toEqual(["start", "end"]);
    expect(trades[0]).toEqual({
      wallet: WALLET_A,
      instrument: "BTC",
      size: 100,
      price: 100_000,
      notional: 10_000_000,
      timestamp: START,
      timestampUtc: "2025-10-10T20:00:00.000Z",
      minutesBeforeEnd: 60,
      tradeId: "start",
      orderId: "o1",
    });
    expect(trades[1]?.minutesBeforeEnd).toBe(0);
  });
});

describe("analyzeTrades", () => {
  it("should return null without trades", () => {
    expect(analyzeTrades([])).toBeNull();
  });

  it("should summarize per wallet and instrument", () => {
    const trades = [
      ...filterWindowShorts(WALLET_B, [fill({ tradeId: "b1", instrument: "ETH", timestamp: END - 5 * MINUTE })], WINDOW, 0),
      ...filterWindowShorts(
        WALLET_A,
        [fill({ tradeId: "a1", timestamp: END - 20 * MINUTE }), fill({ tradeId: "a2", instrument: "ETH", timestamp: END - 15 * MINUTE })],
        WINDOW,
        0
      ),
    ];

    const analysis = analyzeTrades(trades);

    expect(analysis).toMatchObject({
      totalTrades: 3,
      uniqueWallets: 2,
      totalNotional: 30_000_000,
      timeSpanMinutes: 15,
      instruments: ["BTC", "ETH"],
      walletBreakdown: {
        [WALLET_A]: { trades: 2, notional: 20_000_000, instruments: ["BTC", "ETH"] },
        [WALLET_B]: { trades: 1, notional: 10_000_000, instruments: ["ETH"] },
      },
    });
    expect(analysis?.firstTrade.tradeId).toBe("a1");
    expect(analysis?.lastTrade.tradeId).toBe("b1");
  });
});

describe("runClusterResearch", () => {
  it("should fetch each wallet once and record failures", async () => {
    const fetchFills = vi.fn(async (wallet: string, _sinceMs: number): Promise<Fill[]> => {
      if (wallet === WALLET_B) {
        throw new Error("HTTP 429");
      }
      return [fill({ tradeId: "late", timestamp: END - MINUTE }), fill({ tradeId: "early", timestamp: START + MINUTE })];
    });

    const report = await runClusterResearch({ fetchFills }, [WALLET_A, WALLET_A.toUpperCase().replace("0X", "0x"), WALLET_B], WINDOW);

    expect(fetchFills).toHaveBeenCalledTimes(2);
    expect(fetchFills).toHaveBeenCalledWith(WALLET_A, START);
    expect(report.windowStartUtc).toBe("2025-10-10T20:00:00.000Z");
    expect(report.windowEndUtc).toBe("2025-10-10T21:00:00.000Z");
    expect(report.minNotionalUsd).toBe(5_000_000);
    expect(report.walletsScanned).toEqual([WALLET_A, WALLET_B]);
    expect(report.walletErrors).toEqual({ [WALLET_B]: "HTTP 429" });
    expect(report.trades.map((t) => t.tradeId)).toEqual(["early", "late"]);
    expect(report.analysis?.totalTrades).toBe(2);
  });

  it("should report no analysis when nothing qualifies", async () => {
    const report = await runClusterResearch({ fetchFills: async () => [] }, [WALLET_A], WINDOW);
    expect(report.analysis).toBeNull();
    expect(elevatedAddressesLine(report)).toBe("ELEVATED_ADDRESSES=");
  });
});

describe("elevatedAddressesLine", () => {
  it("should list each wallet once in first-trade order", () => {
    const trades = [
      ...filterWindowShorts(WALLET_B, [fill()], WINDOW, 0),
      ...filterWindowShorts(WALLET_A, [fill(), fill({ tradeId: "t2" })], WINDOW, 0),
    ];
    expect(elevatedAddressesLine({ trades })).toBe(`ELEVATED_ADDRESSES=${WALLET_B},${WALLET_A}`);
  });
});
