/**
 * Unit Tests for the Hyperliquid info API client
 */

import { describe, it, expect, vi } from "vitest";
import { HyperliquidClient, createHyperliquidClient } from "../../../src/api/hyperliquid/client";
import { HyperliquidApiException } from "../../../src/api/hyperliquid/types";

const API_URL = "https://api.test.local/info";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function makeClient(fetchFn: typeof fetch, retries = 3): HyperliquidClient {
  return createHyperliquidClient({ apiUrl: API_URL, timeout: 1000, retries, retryDelayMs: 0, fetchFn });
}

describe("HyperliquidClient", () => {
  it("should use the default endpoint and timeout", () => {
    const client = new HyperliquidClient();
    expect(client.getApiUrl()).toBe("https://api.hyperliquid.xyz/info");
    expect(client.getTimeout()).toBe(10000);
  });

  it("should POST the request body as JSON", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ coin: "BTC" }]));
    const client = makeClient(fetchFn);

    const result = await client.info({ type: "userFills", user: "0xabc" });

    expect(result).toEqual([{ coin: "BTC" }]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe(API_URL);
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ type: "userFills", user: "0xabc" }));
  });

  it("should retry server errors and return the first success", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("busy", { status: 502 }))
      .mockResolvedValueOnce(jsonResponse([]));
    const client = makeClient(fetchFn);

    await expect(client.info({ type: "userFills", user: "0xabc" })).resolves.toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("should not retry client errors", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response("bad user", { status: 422 }));
    const client = makeClient(fetchFn);

    const error = await client.info({ type: "userFills", user: "x" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HyperliquidApiException);
    expect(error).toMatchObject({ message: "bad user", statusCode: 422, retryable: false });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("should give up after the configured attempts on network errors", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new Error("ECONNRESET"));
    const client = makeClient(fetchFn, 2);

    await expect(client.info({ type: "userFills", user: "0xabc" })).rejects.toThrow("ECONNRESET");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("should reject malformed JSON without retrying", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response("{not json", { status: 200 }));
    const client = makeClient(fetchFn);

    await expect(client.info({ type: "userFills", user: "0xabc" })).rejects.toThrow(
      "Malformed JSON in info response"
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("should turn an aborted request into a timeout error", async () => {
    const fetchFn = vi.fn<typeof fetch>((_input, init) => {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("aborted");
          error.name = "AbortError";
          reject(error);
        });
      });
    });
    const client = createHyperliquidClient({ apiUrl: API_URL, timeout: 10, retries: 1, fetchFn });

    await expect(client.info({ type: "userFills", user: "0xabc" })).rejects.toThrow("Request timeout after 10ms");
  });
});
