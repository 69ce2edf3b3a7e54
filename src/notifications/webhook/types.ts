/**
 * Webhook notification types
 */

import type { Cluster, Finding } from "../../detection/types";

export type WebhookTarget = "slack" | "discord";

// ============================================================================
// Payloads
// ============================================================================

export interface SlackTextObject {
  type: "plain_text" | "mrkdwn";
  text: string;
}

export type SlackBlock =
  | { type: "header"; text: SlackTextObject }
  | { type: "section"; text: SlackTextObject }
  | { type: "context"; elements: SlackTextObject[] }
  | { type: "divider" };

export interface SlackMessage {
  text?: string;
  blocks: SlackBlock[];
}

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title?: string;
  description?: string;
  color?: number;
  fields?: DiscordEmbedField[];
  timestamp?: string;
}

export interface DiscordMessage {
  content: string;
  embeds?: DiscordEmbed[];
}

export type WebhookPayload = SlackMessage | DiscordMessage;

// ============================================================================
// Status messages
// ============================================================================

export interface StartupStatus {
  kind: "startup";
  watchedCount: number;
  elevatedCount: number;
  pollSeconds: number;
  shortThresholdUsd: number;
  depositThresholdUsd: number;
  clusterDetectionEnabled: boolean;
}

export interface StatusReport {
  kind: "status_report";
  uptimeMs: number;
  cyclesCompleted: number;
  addressScans: number;
  clusterScansCompleted: number;
  apiCallsSucceeded: number;
  apiCallsFailed: number;
  alertsSent: number;
  clustersDetected: number;
  walletsPromoted: number;
  upstreamStatus: string;
  clusterDetectionEnabled: boolean;
}

export interface ApiErrorStatus {
  kind: "api_error";
  error: string;
  /** 0..1 */
  successRate: number;
}

export interface RecoveryStatus {
  kind: "recovery";
}

export type StatusMessage = StartupStatus | StatusReport | ApiErrorStatus | RecoveryStatus;

export type StatusKind = StatusMessage["kind"];

// ============================================================================
// Notifier contract
// ============================================================================

/**
 * Delivery of findings, clusters and operational messages to an external channel
 */
export interface Notifier {
  notify(address: string, findings: readonly Finding[], isElevated: boolean): Promise<void>;
  notifyCluster(cluster: Cluster): Promise<void>;
  notifyStatus(message: StatusMessage): Promise<void>;
}

// ============================================================================
// Errors
// ============================================================================

export class WebhookDeliveryError extends Error {
  public readonly statusCode: number | undefined;
  public readonly retryable: boolean;

  constructor(message: string, options: { statusCode?: number; retryable?: boolean; cause?: Error } = {}) {
    super(message);
    this.name = "WebhookDeliveryError";
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    if (options.cause) {
      this.cause = options.cause;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Mask a webhook URL for logging, keeping only the host
 */
export function maskWebhookUrl(url: string | undefined): string {
  if (!url) {
    return "(not set)";
  }
  try {
    return `${new URL(url).origin}/****`;
  } catch {
    return "****";
  }
}
