/**
 * Hyperliquid Info API Client
 *
 * HTTP client for the public `info` endpoint. Every request is a JSON POST.
 * Uses native fetch with a per-attempt timeout and retries with exponential
 * backoff on network errors and 5xx responses.
 */

import { serviceLoggers } from "../../utils/logger";
import { HyperliquidApiException, type InfoRequest } from "./types";

export interface HyperliquidClientConfig {
  /** Full URL of the info endpoint */
  apiUrl?: string;
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Total attempts per request (default: 3) */
  retries?: number;
  /** Base backoff delay in milliseconds (default: 1000) */
  retryDelayMs?: number;
  /** fetch implementation; the global one by default */
  fetchFn?: typeof fetch;
}

const DEFAULT_CONFIG: Required<Omit<HyperliquidClientConfig, "fetchFn">> = {
  apiUrl: "https://api.hyperliquid.xyz/info",
  timeout: 10000,
  retries: 3,
  retryDelayMs: 1000,
};

const MAX_BACKOFF_MS = 10000;

/**
 * @example
 * ```typescript
 * const client = new HyperliquidClient({ timeout: 5000 });
 * const fills = await client.info({ type: "userFills", user: address });
 * ```
 */
export class HyperliquidClient {
  private readonly config: Required<Omit<HyperliquidClientConfig, "fetchFn">>;
  private readonly fetchFn: typeof fetch;

  constructor(config: HyperliquidClientConfig = {}) {
    this.config = {
      apiUrl: config.apiUrl ?? DEFAULT_CONFIG.apiUrl,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
      retries: Math.max(1, config.retries ?? DEFAULT_CONFIG.retries),
      retryDelayMs: config.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs,
    };
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  public getApiUrl(): string {
    return this.config.apiUrl;
  }

  public getTimeout(): number {
    return this.config.timeout;
  }

  /**
   * POST a request to the info endpoint and return the decoded JSON body
   *
   * @throws HyperliquidApiException once all attempts have failed, or at once on 4xx
   */
  public async info(body: InfoRequest): Promise<unknown> {
    let lastError: HyperliquidApiException | null = null;

    for (let attempt = 1; attempt <= this.config.retries; attempt++) {
      try {
        return await this.attempt(body);
      } catch (error) {
        lastError = this.toException(error);

        if (!lastError.retryable) {
          throw lastError;
        }

        if (attempt < this.config.retries) {
          const delay = Math.min(this.config.retryDelayMs * Math.pow(2, attempt - 1), MAX_BACKOFF_MS);
          serviceLoggers.api.debug("Retrying info request", {
            type: body.type,
            attempt,
            delay,
            error: lastError.message,
          });
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw lastError ?? new HyperliquidApiException("Request failed after all retries");
  }

  private async attempt(body: InfoRequest): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await this.fetchFn(this.config.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          "User-Agent": "ledger-watch/1.0",
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        const message = text !== "" ? text : `HTTP ${response.status}: ${response.statusText}`;
        throw new HyperliquidApiException(message, response.status, response.status >= 500);
      }

      try {
        return text === "" ? null : JSON.parse(text);
      } catch {
        throw new HyperliquidApiException("Malformed JSON in info response", response.status, false);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private toException(error: unknown): HyperliquidApiException {
    if (error instanceof HyperliquidApiException) {
      return error;
    }
    if (error instanceof Error && error.name === "AbortError") {
      return new HyperliquidApiException(`Request timeout after ${this.config.timeout}ms`, undefined, true);
    }
    return new HyperliquidApiException(error instanceof Error ? error.message : String(error), undefined, true);
  }
}

export function createHyperliquidClient(config: HyperliquidClientConfig = {}): HyperliquidClient {
  return new HyperliquidClient(config);
}
