/**
 * Webhook notifier
 *
 * Formats findings, clusters and status messages for the configured target and
 * hands them to the webhook client.
 */

import type { Cluster, Finding } from "../../detection/types";
import { WebhookClient } from "./client";
import { formatCluster, formatFindings, formatStatus } from "./formatter";
import type { Notifier, StatusMessage, WebhookPayload, WebhookTarget } from "./types";

export interface WebhookNotifierConfig {
  target?: WebhookTarget;
  client?: WebhookClient;
  webhookUrl?: string;
  timeout?: number;
}

export class WebhookNotifier implements Notifier {
  private readonly target: WebhookTarget;
  private readonly client: WebhookClient;
  private alertsSent = 0;

  constructor(config: WebhookNotifierConfig = {}) {
    this.target = config.target ?? "slack";
    this.client = config.client ?? new WebhookClient({ webhookUrl: config.webhookUrl, timeout: config.timeout });
  }

  getTarget(): WebhookTarget {
    return this.target;
  }

  /** Messages handed to the channel, dev-mode logs included */
  getAlertsSent(): number {
    return this.alertsSent;
  }

  async notify(address: string, findings: readonly Finding[], isElevated: boolean): Promise<void> {
    if (findings.length === 0) {
      return;
    }
    await this.deliver(formatFindings(this.target, address, findings, isElevated));
  }

  async notifyCluster(cluster: Cluster): Promise<void> {
    await this.deliver(formatCluster(this.target, cluster));
  }

  async notifyStatus(message: StatusMessage): Promise<void> {
    await this.deliver(formatStatus(this.target, message));
  }

  private async deliver(payload: WebhookPayload): Promise<void> {
    await this.client.send(payload);
    this.alertsSent++;
  }
}

export function createWebhookNotifier(config: WebhookNotifierConfig = {}): WebhookNotifier {
  return new WebhookNotifier(config);
}
