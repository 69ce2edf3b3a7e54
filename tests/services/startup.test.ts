/**
 * Unit Tests for application startup and shutdown
 */

import { describe, it, expect, vi } from "vitest";
import { buildEngineConfig, env, type EngineConfig, type Env } from "../../config/env";
import type { Fill, Transfer } from "../../src/api/hyperliquid/types";
import type { Cluster, Finding } from "../../src/detection/types";
import type { StatusMessage } from "../../src/notifications/webhook/types";
import { startApplication } from "../../src/services/startup";

const WALLET_A = "0x1111111111111111111111111111111111111111";
const WALLET_B = "0x2222222222222222222222222222222222222222";

function makeConfig(overrides: Partial<Env> = {}): EngineConfig {
  return buildEngineConfig({
    ...env,
    DB_PATH: ":memory:",
    POLL_SECONDS: 30,
    WATCH_ADDRESSES: [WALLET_A],
    ELEVATED_ADDRESSES: [WALLET_B],
    USD_SHORT_THRESHOLD: 25_000_000,
    USD_DEPOSIT_THRESHOLD: 20_000_000,
    CLUSTER_DETECTION_ENABLED: true,
    WEBHOOK_URL: undefined,
    WEBHOOK_TARGET: "slack",
    ...overrides,
  });
}

function stubs() {
  return {
    fetcher: {
      fetchFills: vi.fn(async (_address: string, _sinceMs: number): Promise<Fill[]> => []),
      fetchTransfers: vi.fn(async (_address: string, _sinceMs: number): Promise<Transfer[]> => []),
      fetchFirstActivityMs: vi.fn(async (_address: string): Promise<number | null> => null),
    },
    notifier: {
      notify: vi.fn(async (_address: string, _findings: readonly Finding[], _isElevated: boolean): Promise<void> => {}),
      notifyCluster: vi.fn(async (_cluster: Cluster): Promise<void> => {}),
      notifyStatus: vi.fn(async (_message: StatusMessage): Promise<void> => {}),
    },
  };
}

describe("startApplication", () => {
  it("should load the watchlist and announce the start", async () => {
    const { fetcher, notifier } = stubs();
    const app = await startApplication({
      config: makeConfig(),
      fetcher,
      notifier,
      enableAdminServer: false,
      enableScanLoop: false,
    });

    expect(app.watchlist.getWatched()).toEqual([WALLET_A, WALLET_B]);
    expect(app.store.listElevated().map((e) => e.address)).toEqual([WALLET_B]);
    expect(app.detector).toBeDefined();
    expect(app.server).toBeNull();
    expect(notifier.notifyStatus).toHaveBeenCalledWith({
      kind: "startup",
      watchedCount: 2,
      elevatedCount: 1,
      pollSeconds: 30,
      shortThresholdUsd: 25_000_000,
      depositThresholdUsd: 20_000_000,
      clusterDetectionEnabled: true,
    });

    const status = app.getStatus();
    expect(status.status).toBe("running");
    expect(status.services.map((s) => [s.name, s.status])).toEqual([
      ["store", "running"],
      ["watchlist", "running"],
      ["adminServer", "stopped"],
      ["scanLoop", "stopped"],
    ]);

    await app.stop();
    expect(app.getStatus().status).toBe("stopped");
  });

  it("should skip the detector when cluster detection is disabled", async () => {
    const { fetcher, notifier } = stubs();
    const app = await startApplication({
      config: makeConfig({ CLUSTER_DETECTION_ENABLED: false }),
      fetcher,
      notifier,
      enableAdminServer: false,
      enableScanLoop: false,
    });

    expect(app.detector).toBeUndefined();
    await app.stop();
  });

  it("should start even when the startup message cannot be delivered", async () => {
    const { fetcher, notifier } = stubs();
    notifier.notifyStatus.mockRejectedValueOnce(new Error("webhook down"));

    const app = await startApplication({
      config: makeConfig(),
      fetcher,
      notifier,
      enableAdminServer: false,
      enableScanLoop: false,
    });

    expect(app.getStatus().status).toBe("running");
    await app.stop();
  });

  it("should run the scan loop and stop it once", async () => {
    const { fetcher, notifier } = stubs();
    const app = await startApplication({ config: makeConfig(), fetcher, notifier, enableAdminServer: false });

    expect(app.orchestrator.getIsRunning()).toBe(true);
    await vi.waitFor(() => expect(app.orchestrator.getStats().cyclesCompleted).toBe(1));
    expect(fetcher.fetchFills).toHaveBeenCalledWith(WALLET_A, expect.any(Number));

    const first = app.stop();
    const second = app.stop();
    expect(second).toBe(first);
    await first;

    expect(app.orchestrator.getIsRunning()).toBe(false);
    expect(app.getStatus().services.find((s) => s.name === "scanLoop")?.status).toBe("stopped");
  });
});
