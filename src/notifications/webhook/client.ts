/**
 * Webhook client
 *
 * Posts JSON payloads to a Slack or Discord incoming webhook with a timeout and
 * retries on 429, 5xx and network errors. Without a webhook URL the client runs
 * in dev mode and only logs what it would send.
 */

import { EventEmitter } from "events";
import { serviceLoggers } from "../../utils/logger";
import { WebhookDeliveryError, maskWebhookUrl, type WebhookPayload } from "./types";

export interface WebhookClientConfig {
  webhookUrl?: string;
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Total attempts (default: 3) */
  maxRetries?: number;
  /** Base backoff delay in milliseconds (default: 1000) */
  retryDelay?: number;
  fetchFn?: typeof fetch;
}

export interface WebhookSendResult {
  delivered: boolean;
  devMode: boolean;
  attempts: number;
}

const DEFAULT_TIMEOUT = 10000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY = 1000;

export class WebhookClient extends EventEmitter {
  private readonly webhookUrl: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly fetchFn: typeof fetch;
  private sentCount = 0;
  private failedCount = 0;

  constructor(config: WebhookClientConfig = {}) {
    super();
    this.webhookUrl = config.webhookUrl;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.maxRetries = Math.max(1, config.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelay = config.retryDelay ?? DEFAULT_RETRY_DELAY;
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  isDevMode(): boolean {
    return !this.webhookUrl;
  }

  getStats(): { sent: number; failed: number } {
    return { sent: this.sentCount, failed: this.failedCount };
  }

  /**
   * Deliver one payload
   *
   * @throws WebhookDeliveryError once every attempt has failed
   */
  async send(payload: WebhookPayload): Promise<WebhookSendResult> {
    if (!this.webhookUrl) {
      serviceLoggers.notifier.info("[WEBHOOK DEV MODE] Would send message", { payload });
      this.sentCount++;
      return { delivered: false, devMode: true, attempts: 0 };
    }

    let lastError: WebhookDeliveryError | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        await this.post(this.webhookUrl, payload);
        this.sentCount++;
        this.emit("message:sent", { attempts: attempt });
        return { delivered: true, devMode: false, attempts: attempt };
      } catch (error) {
        lastError =
          error instanceof WebhookDeliveryError
            ? error
            : new WebhookDeliveryError(error instanceof Error ? error.message : String(error), { retryable: true });

        if (!lastError.retryable || attempt === this.maxRetries) {
          break;
        }
        await this.sleep(this.retryDelay * Math.pow(2, attempt - 1));
      }
    }

    this.failedCount++;
    const failure = lastError ?? new WebhookDeliveryError("Webhook delivery failed");
    serviceLoggers.notifier.warn("Webhook delivery failed", {
      webhook: maskWebhookUrl(this.webhookUrl),
      error: failure.message,
      statusCode: failure.statusCode,
    });
    this.emit("message:failed", { error: failure.message });
    throw failure;
  }

  private async post(url: string, payload: WebhookPayload): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new WebhookDeliveryError(body !== "" ? body : `Webhook responded with ${response.status}`, {
          statusCode: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }
    } catch (error) {
      if (error instanceof WebhookDeliveryError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new WebhookDeliveryError("Request timeout", { retryable: true });
      }
      throw new WebhookDeliveryError(
        `Webhook call failed: ${error instanceof Error ? error.message : String(error)}`,
        { retryable: true, cause: error instanceof Error ? error : undefined }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function createWebhookClient(config: WebhookClientConfig = {}): WebhookClient {
  return new WebhookClient(config);
}
