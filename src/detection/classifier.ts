/**
 * Activity Classifier
 *
 * Turns an account's fills and transfers into Findings. Pure: no I/O, no state.
 *
 * - Elevated accounts: every deposit/withdrawal and every fill is reported.
 * - Other accounts: only large stablecoin deposits and large short opens.
 */

import type { Fill, Transfer } from "../api/hyperliquid/types";
import { digest } from "../utils/digest";
import type { Finding, FindingKind } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface ClassifierOptions {
  isElevated: boolean;
  depositThresholdUsd: number;
  shortThresholdUsd: number;
  /** Upper-case tokens counted as stablecoins (default: USDC, USDT) */
  stableTokens?: readonly string[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_STABLE_TOKENS: readonly string[] = ["USDC", "USDT"];

const TRANSFER_LABELS: Record<Transfer["kind"], string> = {
  deposit: "Deposit",
  withdrawal: "Withdraw",
  internal_transfer: "Internal Transfer",
};

// ============================================================================
// Helper Functions
// ============================================================================

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

/** True when the direction label describes opening a short, e.g. "Open Short" */
export function isShortOpenLabel(direction: string): boolean {
  const label = direction.toLowerCase();
  return (label.includes("open") && label.includes("short")) || label.includes("short_open");
}

function fillActivity(fill: Fill): string {
  if (fill.direction !== "") {
    return fill.direction;
  }
  return fill.side ? fill.side.toUpperCase() : "TRADE";
}

/** Missing timestamps rank after every real one */
function compareTimestamps(a: number, b: number): number {
  if (a <= 0 || b <= 0) {
    return (a <= 0 ? 1 : 0) - (b <= 0 ? 1 : 0);
  }
  return a - b;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Classify one account's activity since its resume cursor.
 *
 * Findings come back in ascending timestamp order. Transfers precede fills on
 * equal timestamps, and zero timestamps are ranked last.
 */
export function classifyActivity(
  address: string,
  fills: readonly Fill[],
  transfers: readonly Transfer[],
  options: ClassifierOptions
): Finding[] {
  const owner = address.toLowerCase();
  const stableTokens = new Set((options.stableTokens ?? DEFAULT_STABLE_TOKENS).map((t) => t.toUpperCase()));
  const findings: Finding[] = [];

  for (const transfer of transfers) {
    const amount = finite(transfer.amountUsd);
    const timestamp = finite(transfer.timestamp);
    const token = transfer.token.toUpperCase();

    if (options.isElevated) {
      if (transfer.kind === "internal_transfer") {
        continue;
      }
      findings.push({
        kind: "ELEVATED_ACTIVITY",
        address: owner,
        token,
        notional: amount,
        timestamp,
        sourceId: transfer.sourceId,
        activity: TRANSFER_LABELS[transfer.kind],
        size: amount,
      });
    } else if (transfer.kind === "deposit" && stableTokens.has(token) && amount >= options.depositThresholdUsd) {
      findings.push({
        kind: "LARGE_DEPOSIT",
        address: owner,
        token,
        notional: amount,
        timestamp,
        sourceId: transfer.sourceId,
        activity: TRANSFER_LABELS.deposit,
        size: amount,
      });
    }
  }

  for (const fill of fills) {
    const notional = finite(fill.notional);
    const base = {
      address: owner,
      token: fill.instrument,
      notional,
      timestamp: finite(fill.timestamp),
      sourceId: fill.tradeId,
      size: finite(fill.size),
      price: finite(fill.price),
    };

    if (options.isElevated) {
      findings.push({ ...base, kind: "ELEVATED_ACTIVITY", activity: fillActivity(fill) });
      continue;
    }

    const opensShort = fill.side === "sell" || isShortOpenLabel(fill.direction);
    if (opensShort && notional >= options.shortThresholdUsd) {
      findings.push({
        ...base,
        kind: "LARGE_OPEN_SHORT",
        activity: fill.direction !== "" ? fill.direction : "Open Short",
      });
    }
  }

  // Array.prototype.sort is stable, so transfers keep their lead on ties
  return findings.sort((a, b) => compareTimestamps(a.timestamp, b.timestamp));
}

// ============================================================================
// Deduplication and summaries
// ============================================================================

/**
 * Seen digest of a finding: (address, kind, source id, timestamp)
 */
export function findingDigest(finding: Pick<Finding, "address" | "kind" | "sourceId" | "timestamp">): string {
  return digest(finding.address.toLowerCase(), finding.kind, finding.sourceId, finding.timestamp);
}

/**
 * Collapse a batch of findings into one ACTIVITY_SUMMARY finding
 */
export function summarizeFindings(address: string, findings: readonly Finding[]): Finding {
  const byKind = new Map<FindingKind, number>();
  const tokens = new Set<string>();
  let notional = 0;
  let latest = 0;

  for (const finding of findings) {
    byKind.set(finding.kind, (byKind.get(finding.kind) ?? 0) + 1);
    if (finding.token !== "") {
      tokens.add(finding.token);
    }
    notional += finding.notional;
    latest = Math.max(latest, finding.timestamp);
  }

  const kinds = [...byKind.entries()].map(([kind, count]) => `${count} ${kind}`).join(", ");
  const total = `$${Math.round(notional).toLocaleString("en-US")}`;

  return {
    kind: "ACTIVITY_SUMMARY",
    address: address.toLowerCase(),
    token: [...tokens].join(","),
    notional,
    timestamp: latest,
    sourceId: `summary:${findings.length}`,
    activity: "Summary",
    summary: `${findings.length} new findings (${kinds}), total notional ${total}`,
  };
}
