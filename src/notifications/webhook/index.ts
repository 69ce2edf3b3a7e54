/**
 * Webhook notification module exports
 */

export { WebhookClient, createWebhookClient } from "./client";
export type { WebhookClientConfig, WebhookSendResult } from "./client";
export { WebhookNotifier, createWebhookNotifier } from "./notifier";
export type { WebhookNotifierConfig } from "./notifier";
export {
  formatCluster,
  formatClusterDiscord,
  formatClusterSlack,
  formatFindings,
  formatFindingsDiscord,
  formatFindingsSlack,
  formatStatus,
  formatStatusDiscord,
  formatStatusSlack,
  formatUptime,
  formatUsd,
  shortAddress,
} from "./formatter";
export { WebhookDeliveryError, maskWebhookUrl } from "./types";
export type {
  DiscordMessage,
  Notifier,
  SlackBlock,
  SlackMessage,
  StatusKind,
  StatusMessage,
  WebhookPayload,
  WebhookTarget,
} from "./types";
