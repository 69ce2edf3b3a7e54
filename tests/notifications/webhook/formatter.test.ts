/**
 * Unit Tests for webhook message formatting
 */

import { describe, it, expect } from "vitest";
import type { Cluster, Finding } from "../../../src/detection/types";
import {
  DISCORD_CONTENT_LIMIT,
  formatCluster,
  formatClusterDiscord,
  formatClusterSlack,
  formatFindings,
  formatFindingsDiscord,
  formatFindingsSlack,
  formatPercent,
  formatStatusDiscord,
  formatStatusSlack,
  formatTime,
  formatUptime,
  formatUsd,
  shortAddress,
} from "../../../src/notifications/webhook/formatter";
import { maskWebhookUrl } from "../../../src/notifications/webhook/types";

const ADDRESS = "0xabcdef0000000000000000000000000000000001";
const SHORT = "0xabcdef00...000001";
const WALLET_A = "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
const WALLET_B = "0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";
const TIME = Date.UTC(2025, 0, 2, 3, 4, 5);
const TIME_ISO = "2025-01-02T03:04:05.000Z";

const deposit: Finding = {
  kind: "LARGE_DEPOSIT",
  address: ADDRESS,
  token: "USDC",
  notional: 21_000_000,
  timestamp: TIME,
  sourceId: "0xdep",
  activity: "Deposit",
  size: 21_000_000,
};

const short: Finding = {
  kind: "LARGE_OPEN_SHORT",
  address: ADDRESS,
  token: "BTC",
  notional: 30_000_000,
  timestamp: TIME,
  sourceId: "t1",
  activity: "Open Short",
  size: -300,
  price: 100_000,
};

const cluster: Cluster = {
  clusterId: "abcdef0123456789",
  wallets: [WALLET_A, WALLET_B],
  instrument: "BTC",
  direction: "SHORT",
  trades: [
    { tradeKey: "1", wallet: WALLET_A, instrument: "BTC", side: "sell", notional: 30_000_000, timestamp: TIME, accountAgeDays: null },
    { tradeKey: "2", wallet: WALLET_B, instrument: "BTC", side: "sell", notional: 25_000_000, timestamp: TIME + 60_000, accountAgeDays: null },
  ],
  totalNotional: 55_000_000,
  walletCount: 2,
  tradeCount: 2,
  timeSpanMinutes: 1,
  alignment: 1,
  score: 72,
  signals: {
    timeSpanMinutes: 1,
    totalNotional: 55_000_000,
    walletCount: 2,
    avgAccountAgeDays: 30,
    alignment: 1,
    sizeVariation: 0.09,
    recurrence: 0,
    points: { timing: 20, notional: 11, wallets: 12, accountAge: 0, alignment: 10, homogeneity: 7, recurrence: 0 },
  },
  firstTradeMs: TIME,
  lastTradeMs: TIME + 60_000,
  detectedAt: TIME + 120_000,
};

describe("value formatting", () => {
  it("should shorten long addresses only", () => {
    expect(shortAddress(WALLET_A)).toBe("0xaaaaaaaa...aaaaaa");
    expect(shortAddress("0xabc")).toBe("0xabc");
  });

  it("should format USD amounts with grouping", () => {
    expect(formatUsd(21_000_000)).toBe("$21,000,000");
    expect(formatUsd(1234.5, 2)).toBe("$1,234.50");
    expect(formatUsd(Number.NaN)).toBe("$0");
  });

  it("should format times, uptimes and percentages", () => {
    expect(formatTime(TIME)).toBe(TIME_ISO);
    expect(formatTime(0)).toBe("unknown");
    expect(formatUptime(3_723_000)).toBe("1h 2m");
    expect(formatPercent(0.4)).toBe("40.0%");
  });

  it("should mask webhook URLs down to their origin", () => {
    expect(maskWebhookUrl("https://hooks.example.com/services/test-secret")).toBe("https://hooks.example.com/****");
    expect(maskWebhookUrl(undefined)).toBe("(not set)");
    expect(maskWebhookUrl("nope")).toBe("****");
  });
});

describe("findings", () => {
  it("should render one Discord line per finding", () => {
    expect(formatFindingsDiscord(ADDRESS, [deposit, short], false)).toEqual({
      content: [
        `**Hyperliquid Alert - ${SHORT}**`,
        `Large Deposit | USDC | Notional $21,000,000 | ${TIME_ISO} UTC`,
        `Large Short Open | BTC | size -300 @ $100,000.00 | Notional $30,000,000 | ${TIME_ISO} UTC`,
      ].join("\n"),
    });
  });

  it("should mark elevated wallets in the heading", () => {
    const message = formatFindingsSlack(ADDRESS, [deposit], true);
    expect(message.text).toBe(`ELEVATED WALLET Hyperliquid Alert - ${SHORT}`);
    expect(message.blocks[0]).toEqual({
      type: "header",
      text: { type: "plain_text", text: `ELEVATED WALLET Hyperliquid Alert - ${SHORT}` },
    });
  });

  it("should render a Slack section and divider per finding", () => {
    const message = formatFindingsSlack(ADDRESS, [short], false);
    expect(message.blocks).toHaveLength(3);
    expect(message.blocks[1]).toEqual({
      type: "section",
      text: {
        type: "mrkdwn",
        text: [
          "*Large Short Open*",
          "• BTC size: `-300` @ `$100,000.00`",
          "• Notional: *$30,000,000*",
          `• Time (UTC): \`${TIME_ISO}\``,
          "• Tx: `t1`",
        ].join("\n"),
      },
    });
    expect(message.blocks[2]).toEqual({ type: "divider" });
  });

  it("should render a summary finding by its summary text", () => {
    const summary: Finding = {
      kind: "ACTIVITY_SUMMARY",
      address: ADDRESS,
      token: "BTC",
      notional: 5,
      timestamp: TIME,
      sourceId: "summary:12",
      activity: "Summary",
      summary: "12 new findings (12 ELEVATED_ACTIVITY), total notional $5",
    };
    expect(formatFindingsDiscord(ADDRESS, [summary], true).content).toBe(
      `**ELEVATED WALLET Hyperliquid Alert - ${SHORT}**\nActivity Summary | 12 new findings (12 ELEVATED_ACTIVITY), total notional $5`
    );
  });

  it("should truncate Discord content to the message limit", () => {
    const many = Array.from({ length: 100 }, (_, i) => ({ ...deposit, sourceId: `d${i}` }));
    const { content } = formatFindingsDiscord(ADDRESS, many, false);
    expect(content).toHaveLength(DISCORD_CONTENT_LIMIT);
    expect(content.endsWith("...")).toBe(true);
  });

  it("should dispatch on the target", () => {
    expect(formatFindings("slack", ADDRESS, [deposit], false)).toHaveProperty("blocks");
    expect(formatFindings("discord", ADDRESS, [deposit], false)).toHaveProperty("content");
  });
});

describe("clusters", () => {
  it("should render the Discord cluster message", () => {
    expect(formatClusterDiscord(cluster).content).toBe(
      [
        "**SUSPICIOUS CLUSTER DETECTED** | Score 72/100 | abcdef01",
        "• Wallets: 2",
        "• Instrument: BTC",
        "• Total notional: $55,000,000",
        "• Time window: 1.0 minutes",
        "• Direction: SHORT",
        "• Alignment: 100%",
        `• First trade: ${TIME_ISO}`,
        "• Last trade: 2025-01-02T03:05:05.000Z",
        "• `0xaaaaaaaa...aaaaaa` ($30.0M)",
        "• `0xbbbbbbbb...bbbbbb` ($25.0M)",
      ].join("\n")
    );
  });

  it("should render the Slack cluster message with the short id", () => {
    const message = formatClusterSlack(cluster);
    expect(message.text).toBe("Suspicious cluster on BTC");
    expect(message.blocks[0]).toEqual({ type: "header", text: { type: "plain_text", text: "SUSPICIOUS CLUSTER DETECTED" } });
    expect(message.blocks[2]).toEqual({ type: "context", elements: [{ type: "mrkdwn", text: "Cluster `abcdef01`" }] });
    expect(formatCluster("slack", cluster)).toEqual(message);
  });
});

describe("status messages", () => {
  it("should render the startup message", () => {
    const message = formatStatusDiscord({
      kind: "startup",
      watchedCount: 3,
      elevatedCount: 1,
      pollSeconds: 30,
      shortThresholdUsd: 25_000_000,
      depositThresholdUsd: 20_000_000,
      clusterDetectionEnabled: true,
    });
    expect(message.content).toBe(
      [
        "**Ledger watch started**",
        "Monitoring 3 addresses",
        "Elevated watchlist: 1 addresses",
        "Polling every 30s",
        "Short threshold: $25,000,000",
        "Deposit threshold: $20,000,000",
        "Cluster detection: enabled",
      ].join("\n")
    );
  });

  it("should render the api error message", () => {
    expect(formatStatusDiscord({ kind: "api_error", error: "timeout", successRate: 0.4 }).content).toBe(
      "**Upstream API degraded**\nHyperliquid API: timeout\nSuccess rate: 40.0%"
    );
  });

  it("should render the recovery message as Slack blocks", () => {
    expect(formatStatusSlack({ kind: "recovery" })).toEqual({
      text: "Upstream API recovered",
      blocks: [
        { type: "header", text: { type: "plain_text", text: "Upstream API recovered" } },
        { type: "section", text: { type: "mrkdwn", text: "Connection to Hyperliquid restored" } },
        { type: "divider" },
      ],
    });
  });

  it("should include the counters in the status report", () => {
    const { content } = formatStatusDiscord({
      kind: "status_report",
      uptimeMs: 7_200_000,
      cyclesCompleted: 10,
      addressScans: 40,
      clusterScansCompleted: 10,
      apiCallsSucceeded: 80,
      apiCallsFailed: 2,
      alertsSent: 3,
      clustersDetected: 1,
      walletsPromoted: 2,
      upstreamStatus: "healthy",
      clusterDetectionEnabled: false,
    });
    expect(content.split("\n")).toEqual([
      "**Status report**",
      "Uptime: 2h 0m",
      "Cycles: 10 | Address scans: 40",
      "Cluster scans: 10",
      "Upstream: healthy",
      "API calls: 80 ok, 2 failed",
      "Alerts sent: 3",
      "Clusters detected: 1 | Wallets promoted: 2",
      "Cluster detection: disabled",
    ]);
  });
});
