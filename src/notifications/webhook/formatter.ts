/**
 * Webhook message formatter
 *
 * Renders findings, clusters and status messages as Slack block messages or
 * Discord content messages.
 */

import type { Cluster, Finding } from "../../detection/types";
import type {
  DiscordMessage,
  SlackBlock,
  SlackMessage,
  StatusMessage,
  WebhookPayload,
  WebhookTarget,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Discord rejects message content above this length */
export const DISCORD_CONTENT_LIMIT = 2000;
/** Slack rejects section text above this length */
export const SLACK_SECTION_LIMIT = 3000;
/** Wallets listed in a cluster message */
export const CLUSTER_WALLETS_SHOWN = 10;

const FINDING_TITLES: Record<Finding["kind"], string> = {
  LARGE_DEPOSIT: "Large Deposit",
  LARGE_OPEN_SHORT: "Large Short Open",
  ELEVATED_ACTIVITY: "Elevated Activity",
  ACTIVITY_SUMMARY: "Activity Summary",
};

// ============================================================================
// Value formatting
// ============================================================================

export function shortAddress(address: string): string {
  if (address.length <= 16) {
    return address;
  }
  return `${address.slice(0, 10)}...${address.slice(-6)}`;
}

export function formatUsd(value: number, decimals = 0): string {
  const amount = Number.isFinite(value) ? value : 0;
  return `$${amount.toLocaleString("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  })}`;
}

export function formatTime(ms: number): string {
  return ms > 0 ? new Date(ms).toISOString() : "unknown";
}

export function formatUptime(ms: number): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60000));
  return `${Math.floor(totalMinutes / 60)}h ${totalMinutes % 60}m`;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function truncate(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit - 3)}...`;
}

function section(text: string): SlackBlock {
  return { type: "section", text: { type: "mrkdwn", text: truncate(text, SLACK_SECTION_LIMIT) } };
}

function header(text: string): SlackBlock {
  return { type: "header", text: { type: "plain_text", text: truncate(text, 150) } };
}

// ============================================================================
// Findings
// ============================================================================

function findingTitle(finding: Finding): string {
  const title = FINDING_TITLES[finding.kind];
  return finding.kind === "ELEVATED_ACTIVITY" ? `${title}: ${finding.activity}` : title;
}

function findingMarkdown(finding: Finding): string {
  const lines = [`*${findingTitle(finding)}*`];

  switch (finding.kind) {
    case "LARGE_DEPOSIT":
      lines.push(`• Token: \`${finding.token}\``, `• USD: *${formatUsd(finding.notional)}*`);
      break;
    case "LARGE_OPEN_SHORT":
      lines.push(
        `• ${finding.token} size: \`${finding.size ?? "?"}\` @ \`${formatUsd(finding.price ?? 0, 2)}\``,
        `• Notional: *${formatUsd(finding.notional)}*`
      );
      break;
    case "ELEVATED_ACTIVITY":
      lines.push(`• Token: \`${finding.token}\``);
      if (finding.price !== undefined) {
        lines.push(`• Size: \`${finding.size ?? "?"}\` @ \`${formatUsd(finding.price, 2)}\``);
      }
      lines.push(`• Notional: *${formatUsd(finding.notional, 2)}*`);
      break;
    case "ACTIVITY_SUMMARY":
      lines.push(finding.summary ?? "");
      return lines.join("\n");
  }

  lines.push(`• Time (UTC): \`${formatTime(finding.timestamp)}\``, `• Tx: \`${finding.sourceId}\``);
  return lines.join("\n");
}

function findingLine(finding: Finding): string {
  if (finding.kind === "ACTIVITY_SUMMARY") {
    return `${findingTitle(finding)} | ${finding.summary ?? ""}`;
  }
  const parts = [findingTitle(finding), finding.token];
  if (finding.price !== undefined) {
    parts.push(`size ${finding.size ?? "?"} @ ${formatUsd(finding.price, 2)}`);
  }
  parts.push(`Notional ${formatUsd(finding.notional)}`, `${formatTime(finding.timestamp)} UTC`);
  return parts.join(" | ");
}

function alertHeading(address: string, isElevated: boolean): string {
  return `${isElevated ? "ELEVATED WALLET " : ""}Hyperliquid Alert - ${shortAddress(address)}`;
}

export function formatFindingsSlack(address: string, findings: readonly Finding[], isElevated: boolean): SlackMessage {
  const blocks: SlackBlock[] = [header(alertHeading(address, isElevated))];
  for (const finding of findings) {
    blocks.push(section(findingMarkdown(finding)), { type: "divider" });
  }
  return { text: alertHeading(address, isElevated), blocks };
}

export function formatFindingsDiscord(address: string, findings: readonly Finding[], isElevated: boolean): DiscordMessage {
  const lines = [`**${alertHeading(address, isElevated)}**`, ...findings.map(findingLine)];
  return { content: truncate(lines.join("\n"), DISCORD_CONTENT_LIMIT) };
}

// ============================================================================
// Clusters
// ============================================================================

function walletLines(cluster: Cluster): string[] {
  return cluster.wallets.slice(0, CLUSTER_WALLETS_SHOWN).map((wallet) => {
    const notional = cluster.trades
      .filter((trade) => trade.wallet === wallet)
      .reduce((sum, trade) => sum + trade.notional, 0);
    return `• \`${shortAddress(wallet)}\` (${formatUsd(notional / 1e6, 1)}M)`;
  });
}

function clusterDetails(cluster: Cluster): string[] {
  return [
    `• Wallets: *${cluster.walletCount}*`,
    `• Instrument: *${cluster.instrument}*`,
    `• Total notional: *${formatUsd(cluster.totalNotional)}*`,
    `• Time window: *${cluster.timeSpanMinutes.toFixed(1)} minutes*`,
    `• Direction: *${cluster.direction}*`,
    `• Alignment: *${Math.round(cluster.alignment * 100)}%*`,
  ];
}

export function formatClusterSlack(cluster: Cluster): SlackMessage {
  const text = [
    `*Suspicion Score: ${cluster.score}/100*`,
    "",
    ...clusterDetails(cluster),
    "",
    `• First trade: \`${formatTime(cluster.firstTradeMs)}\``,
    `• Last trade: \`${formatTime(cluster.lastTradeMs)}\``,
    "",
    "*Wallets:*",
    ...walletLines(cluster),
    "",
    "All wallets are being added to the elevated watchlist.",
  ].join("\n");

  return {
    text: `Suspicious cluster on ${cluster.instrument}`,
    blocks: [
      header("SUSPICIOUS CLUSTER DETECTED"),
      section(text),
      { type: "context", elements: [{ type: "mrkdwn", text: `Cluster \`${cluster.clusterId.slice(0, 8)}\`` }] },
      { type: "divider" },
    ],
  };
}

export function formatClusterDiscord(cluster: Cluster): DiscordMessage {
  const lines = [
    `**SUSPICIOUS CLUSTER DETECTED** | Score ${cluster.score}/100 | ${cluster.clusterId.slice(0, 8)}`,
    ...clusterDetails(cluster).map((line) => line.replace(/\*/g, "")),
    `• First trade: ${formatTime(cluster.firstTradeMs)}`,
    `• Last trade: ${formatTime(cluster.lastTradeMs)}`,
    ...walletLines(cluster),
  ];
  return { content: truncate(lines.join("\n"), DISCORD_CONTENT_LIMIT) };
}

// ============================================================================
// Status messages
// ============================================================================

function statusLines(message: StatusMessage): { title: string; lines: string[] } {
  switch (message.kind) {
    case "startup":
      return {
        title: "Ledger watch started",
        lines: [
          `Monitoring *${message.watchedCount}* addresses`,
          `Elevated watchlist: *${message.elevatedCount}* addresses`,
          `Polling every *${message.pollSeconds}s*`,
          `Short threshold: *${formatUsd(message.shortThresholdUsd)}*`,
          `Deposit threshold: *${formatUsd(message.depositThresholdUsd)}*`,
          `Cluster detection: *${message.clusterDetectionEnabled ? "enabled" : "disabled"}*`,
        ],
      };
    case "status_report":
      return {
        title: "Status report",
        lines: [
          `Uptime: *${formatUptime(message.uptimeMs)}*`,
          `Cycles: *${message.cyclesCompleted}* | Address scans: *${message.addressScans}*`,
          `Cluster scans: *${message.clusterScansCompleted}*`,
          `Upstream: *${message.upstreamStatus}*`,
          `API calls: *${message.apiCallsSucceeded}* ok, *${message.apiCallsFailed}* failed`,
          `Alerts sent: *${message.alertsSent}*`,
          `Clusters detected: *${message.clustersDetected}* | Wallets promoted: *${message.walletsPromoted}*`,
          `Cluster detection: *${message.clusterDetectionEnabled ? "enabled" : "disabled"}*`,
        ],
      };
    case "api_error":
      return {
        title: "Upstream API degraded",
        lines: [`Hyperliquid API: ${message.error}`, `Success rate: ${formatPercent(message.successRate)}`],
      };
    case "recovery":
      return {
        title: "Upstream API recovered",
        lines: ["Connection to Hyperliquid restored"],
      };
  }
}

export function formatStatusSlack(message: StatusMessage): SlackMessage {
  const { title, lines } = statusLines(message);
  return { text: title, blocks: [header(title), section(lines.join("\n")), { type: "divider" }] };
}

export function formatStatusDiscord(message: StatusMessage): DiscordMessage {
  const { title, lines } = statusLines(message);
  const body = lines.map((line) => line.replace(/\*/g, "")).join("\n");
  return { content: truncate(`**${title}**\n${body}`, DISCORD_CONTENT_LIMIT) };
}

// ============================================================================
// Target dispatch
// ============================================================================

export function formatFindings(
  target: WebhookTarget,
  address: string,
  findings: readonly Finding[],
  isElevated: boolean
): WebhookPayload {
  return target === "slack"
    ? formatFindingsSlack(address, findings, isElevated)
    : formatFindingsDiscord(address, findings, isElevated);
}

export function formatCluster(target: WebhookTarget, cluster: Cluster): WebhookPayload {
  return target === "slack" ? formatClusterSlack(cluster) : formatClusterDiscord(cluster);
}

export function formatStatus(target: WebhookTarget, message: StatusMessage): WebhookPayload {
  return target === "slack" ? formatStatusSlack(message) : formatStatusDiscord(message);
}
