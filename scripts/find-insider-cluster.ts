/**
 * Insider cluster research
 *
 * Looks for large shorts opened by a set of wallets inside a time window,
 * typically the hours before a market-moving announcement.
 *
 * Usage:
 *   npm run research -- --addresses 0xabc...,0xdef... \
 *     --start 2025-10-14T11:07:00Z --end 2025-10-14T13:07:00Z \
 *     [--min-notional 5000000] [--out research/cluster-analysis.json]
 */

import { Command, InvalidArgumentError } from "commander";
import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { isAddress } from "viem";
import { env } from "../config/env";
import { createHyperliquidClient, createLedgerFetcher } from "../src/api/hyperliquid";
import { formatUsd, shortAddress } from "../src/notifications/webhook";
import {
  DEFAULT_RESEARCH_MIN_NOTIONAL,
  elevatedAddressesLine,
  runClusterResearch,
  type ResearchReport,
} from "../src/research/cluster-research";

interface ResearchOptions {
  addresses: string[];
  start: number;
  end: number;
  minNotional: number;
  out?: string;
}

function parseAddresses(value: string): string[] {
  const addresses = value
    .split(",")
    .map((address) => address.trim().toLowerCase())
    .filter((address) => address.length > 0);
  const invalid = addresses.filter((address) => !isAddress(address, { strict: false }));
  if (addresses.length === 0 || invalid.length > 0) {
    throw new InvalidArgumentError(`Not valid addresses: ${invalid.join(", ") || value}`);
  }
  return addresses;
}

function parseTime(value: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError(`Not an ISO timestamp: ${value}`);
  }
  return ms;
}

function parseNotional(value: string): number {
  const amount = Number(value.replace(/_/g, ""));
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidArgumentError(`Not a USD amount: ${value}`);
  }
  return amount;
}

function printReport(report: ResearchReport): void {
  const line = "=".repeat(80);
  console.log(line);
  console.log("INSIDER CLUSTER RESEARCH");
  console.log(line);
  console.log(`Window: ${report.windowStartUtc} -> ${report.windowEndUtc}`);
  console.log(`Threshold: ${formatUsd(report.minNotionalUsd)} minimum notional`);
  console.log(`Wallets scanned: ${report.walletsScanned.length}`);

  for (const [wallet, error] of Object.entries(report.walletErrors)) {
    console.log(`  ! ${shortAddress(wallet)}: ${error}`);
  }

  const analysis = report.analysis;
  if (!analysis) {
    console.log("\nNo large shorts found in the window.");
    console.log(line);
    return;
  }

  console.log("\nCluster summary:");
  console.log(`  Total trades:   ${analysis.totalTrades}`);
  console.log(`  Unique wallets: ${analysis.uniqueWallets}`);
  console.log(`  Total notional: ${formatUsd(analysis.totalNotional)}`);
  console.log(`  Time span:      ${analysis.timeSpanMinutes.toFixed(1)} minutes`);
  console.log(`  Instruments:    ${analysis.instruments.join(", ")}`);

  console.log("\nTimeline:");
  console.log(
    `  First trade: ${analysis.firstTrade.timestampUtc} (${analysis.firstTrade.minutesBeforeEnd.toFixed(1)} min before end)`
  );
  console.log(
    `  Last trade:  ${analysis.lastTrade.timestampUtc} (${analysis.lastTrade.minutesBeforeEnd.toFixed(1)} min before end)`
  );

  console.log("\nWallet breakdown:");
  for (const [wallet, data] of Object.entries(analysis.walletBreakdown)) {
    console.log(`  ${wallet}`);
    console.log(`    Trades:      ${data.trades}`);
    console.log(`    Notional:    ${formatUsd(data.notional)}`);
    console.log(`    Instruments: ${data.instruments.join(", ")}`);
  }

  console.log(`\n${line}`);
  console.log("Seed the elevated watchlist with:");
  console.log(elevatedAddressesLine(report));
  console.log(line);
}

async function main(options: ResearchOptions): Promise<void> {
  if (options.end < options.start) {
    throw new Error("--end must not be before --start");
  }

  const fetcher = createLedgerFetcher({
    client: createHyperliquidClient({ apiUrl: env.HYPERLIQUID_API_URL, timeout: 30000 }),
  });

  const report = await runClusterResearch(
    fetcher,
    options.addresses,
    { startMs: options.start, endMs: options.end },
    options.minNotional
  );

  printReport(report);

  if (options.out) {
    mkdirSync(dirname(options.out), { recursive: true });
    writeFileSync(options.out, JSON.stringify(report, null, 2));
    console.log(`Saved analysis to: ${options.out}`);
  }
}

const program = new Command();

program
  .name("find-insider-cluster")
  .description("Find large shorts opened by a set of wallets inside a time window")
  .requiredOption("--addresses <list>", "comma-separated wallet addresses", parseAddresses)
  .requiredOption("--start <iso>", "window start (ISO 8601)", parseTime)
  .requiredOption("--end <iso>", "window end (ISO 8601)", parseTime)
  .option("--min-notional <usd>", "minimum fill notional", parseNotional, DEFAULT_RESEARCH_MIN_NOTIONAL)
  .option("--out <file>", "write the JSON analysis to this file")
  .action(async () => {
    try {
      await main(program.opts<ResearchOptions>());
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
