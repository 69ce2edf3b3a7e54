/**
 * Unit Tests for the webhook notifier
 */

import { describe, it, expect, vi } from "vitest";
import type { Finding } from "../../../src/detection/types";
import { WebhookClient } from "../../../src/notifications/webhook/client";
import { WebhookNotifier, createWebhookNotifier } from "../../../src/notifications/webhook/notifier";
import type { WebhookTarget } from "../../../src/notifications/webhook/types";

const ADDRESS = "0xabcdef0000000000000000000000000000000001";

const finding: Finding = {
  kind: "LARGE_DEPOSIT",
  address: ADDRESS,
  token: "USDC",
  notional: 21_000_000,
  timestamp: 0,
  sourceId: "0xdep",
  activity: "Deposit",
};

function setup(target: WebhookTarget, response = new Response("ok", { status: 200 })) {
  const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(response);
  const client = new WebhookClient({ webhookUrl: "https://hooks.example.com/test-secret", retryDelay: 0, maxRetries: 1, fetchFn });
  const notifier = createWebhookNotifier({ target, client });
  return { fetchFn, notifier };
}

function sentBody(fetchFn: ReturnType<typeof setup>["fetchFn"]): unknown {
  const init = fetchFn.mock.calls[0]?.[1];
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

describe("WebhookNotifier", () => {
  it("should default to Slack", () => {
    expect(new WebhookNotifier().getTarget()).toBe("slack");
  });

  it("should skip an empty batch", async () => {
    const { fetchFn, notifier } = setup("slack");
    await notifier.notify(ADDRESS, [], false);
    expect(fetchFn).not.toHaveBeenCalled();
    expect(notifier.getAlertsSent()).toBe(0);
  });

  it("should send findings in the Discord format", async () => {
    const { fetchFn, notifier } = setup("discord");

    await notifier.notify(ADDRESS, [finding], false);

    expect(sentBody(fetchFn)).toEqual({
      content: "**Hyperliquid Alert - 0xabcdef00...000001**\nLarge Deposit | USDC | Notional $21,000,000 | unknown UTC",
    });
    expect(notifier.getAlertsSent()).toBe(1);
  });

  it("should send status messages in the Slack format", async () => {
    const { fetchFn, notifier } = setup("slack");

    await notifier.notifyStatus({ kind: "recovery" });

    expect(sentBody(fetchFn)).toMatchObject({ text: "Upstream API recovered" });
  });

  it("should propagate delivery failures without counting them", async () => {
    const { notifier } = setup("slack", new Response("no_service", { status: 404 }));

    await expect(notifier.notifyStatus({ kind: "recovery" })).rejects.toThrow("no_service");
    expect(notifier.getAlertsSent()).toBe(0);
  });
});
