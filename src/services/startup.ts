/**
 * Application Startup
 *
 * Builds the watcher from its configuration and starts it in order:
 *
 * 1. Read and validate the environment into an immutable EngineConfig
 * 2. Open the event store and load the watchlist (persisting elevated seeds)
 * 3. Wire the ledger fetcher, account age lookups, cluster detector and notifier
 * 4. Start the admin server and send the startup message
 * 5. Start the scan loop
 *
 * Shutdown runs the same steps backwards: the loop finishes its in-flight
 * cycle, the admin server closes, and the store is closed last.
 */

import { EventEmitter } from "events";
import type { Server } from "http";
import { env, initializeEnv, type EngineConfig, type Env } from "../../config/env";
import { createHyperliquidClient, createLedgerFetcher, type LedgerFetcher } from "../api/hyperliquid";
import type { SqliteDatabase } from "../db/client";
import { createEventStore, type EventStore } from "../db/event-store";
import { createAccountAgeCalculator } from "../detection/account-age";
import { createClusterDetector, type ClusterDetector } from "../detection/cluster-detector";
import { createWebhookNotifier, type Notifier } from "../notifications/webhook";
import { createAdminApp, startAdminServer, stopAdminServer } from "../server/admin";
import { serviceLoggers } from "../utils/logger";
import { createScanOrchestrator, type ScanOrchestrator } from "../workers/scan-orchestrator";
import { createFetchHealthTracker, type FetchHealthTracker } from "./fetch-health";
import { createWatchlistManager, type WatchlistManager } from "./watchlist";

// ============================================================================
// Types
// ============================================================================

export interface StartupOptions {
  /** Environment snapshot to validate (default: process env) */
  source?: Env;
  /** Ready-made configuration; skips environment validation */
  config?: EngineConfig;
  /** Existing database connection */
  db?: SqliteDatabase;
  /** Replacements for the network-facing pieces */
  fetcher?: LedgerFetcher;
  notifier?: Notifier;
  fetchFn?: typeof fetch;
  /** Start the admin server (default: true) */
  enableAdminServer?: boolean;
  /** Start the scan loop (default: true) */
  enableScanLoop?: boolean;
}

export type ServiceStatus = "stopped" | "starting" | "running" | "stopping" | "error";

export interface ServiceInfo {
  name: string;
  status: ServiceStatus;
  startedAt: Date | null;
  error: string | null;
}

export interface StartupStatus {
  status: "stopped" | "starting" | "running" | "stopping" | "error";
  services: ServiceInfo[];
  startupCompletedAt: Date | null;
  startupTimeMs: number | null;
}

export interface ApplicationHandle {
  readonly config: EngineConfig;
  readonly store: EventStore;
  readonly health: FetchHealthTracker;
  readonly watchlist: WatchlistManager;
  readonly detector: ClusterDetector | undefined;
  readonly notifier: Notifier;
  readonly orchestrator: ScanOrchestrator;
  readonly server: Server | null;
  getStatus(): StartupStatus;
  /** Stop the loop, close the admin server and the store. Safe to call twice. */
  stop(): Promise<void>;
}

const log = serviceLoggers.startup;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Service status tracking
// ============================================================================

class ServiceRegistry extends EventEmitter {
  private readonly services = new Map<string, ServiceInfo>();

  constructor(names: readonly string[]) {
    super();
    for (const name of names) {
      this.services.set(name, { name, status: "stopped", startedAt: null, error: null });
    }
  }

  update(name: string, status: ServiceStatus, error?: string): void {
    const service = this.services.get(name);
    if (!service) {
      return;
    }
    service.status = status;
    if (status === "running") {
      service.startedAt = new Date();
      service.error = null;
    } else if (status === "error") {
      service.error = error ?? "Unknown error";
    } else if (status === "stopped") {
      service.startedAt = null;
      service.error = null;
    }
    this.emit("service:status", { name, status, error: service.error });
  }

  list(): ServiceInfo[] {
    return Array.from(this.services.values(), (service) => ({ ...service }));
  }
}

// ============================================================================
// Startup
// ============================================================================

/**
 * Build and start the watcher.
 *
 * @example
 * ```typescript
 * const app = await startApplication();
 * process.once("SIGTERM", () => void app.stop());
 * ```
 */
export async function startApplication(options: StartupOptions = {}): Promise<ApplicationHandle> {
  const startTime = Date.now();
  const enableAdminServer = options.enableAdminServer ?? true;
  const enableScanLoop = options.enableScanLoop ?? true;
  const registry = new ServiceRegistry(["store", "watchlist", "adminServer", "scanLoop"]);

  let overall: StartupStatus["status"] = "starting";
  let startupCompletedAt: Date | null = null;

  const config = options.config ?? initializeEnv(options.source ?? env);

  registry.update("store", "starting");
  const store = createEventStore({ db: options.db, path: config.dbPath });
  registry.update("store", "running");

  const health = createFetchHealthTracker();
  const fetcher =
    options.fetcher ??
    createLedgerFetcher({
      client: createHyperliquidClient({
        apiUrl: config.hyperliquidApiUrl,
        timeout: config.httpTimeoutMs,
        fetchFn: options.fetchFn,
      }),
      health,
    });

  const detector = config.clusterDetectionEnabled
    ? createClusterDetector({
        store,
        ageProvider: createAccountAgeCalculator({ source: fetcher }),
        windowMinutes: config.clusterWindowMinutes,
        minScore: config.clusterMinScore,
        minNotionalUsd: config.clusterMinNotionalUsd,
        minTradeSizeUsd: config.marketMinTradeSizeUsd,
        instruments: config.marketScanTokens,
      })
    : undefined;

  const notifier =
    options.notifier ??
    createWebhookNotifier({
      target: config.webhookTarget,
      webhookUrl: config.webhookUrl,
      timeout: config.httpTimeoutMs,
    });

  registry.update("watchlist", "starting");
  const watchlist = createWatchlistManager({
    store,
    watchAddresses: config.watchAddresses,
    elevatedAddresses: config.elevatedAddresses,
  });
  try {
    watchlist.load();
    registry.update("watchlist", "running");
  } catch (error) {
    registry.update("watchlist", "error", errorMessage(error));
    store.close();
    throw error;
  }

  const orchestrator = createScanOrchestrator({
    store,
    fetcher,
    watchlist,
    notifier,
    detector,
    health,
    settings: config,
  });

  let server: Server | null = null;
  if (enableAdminServer) {
    registry.update("adminServer", "starting");
    try {
      const app = createAdminApp({ store, watchlist, orchestrator, health, config });
      server = await startAdminServer(app, config.port);
      registry.update("adminServer", "running");
    } catch (error) {
      registry.update("adminServer", "error", errorMessage(error));
      store.close();
      throw error;
    }
  }

  try {
    await notifier.notifyStatus({
      kind: "startup",
      watchedCount: watchlist.getWatched().length,
      elevatedCount: watchlist.getElevated().length,
      pollSeconds: config.pollIntervalMs / 1000,
      shortThresholdUsd: config.shortThresholdUsd,
      depositThresholdUsd: config.depositThresholdUsd,
      clusterDetectionEnabled: config.clusterDetectionEnabled,
    });
  } catch (error) {
    log.warn("Failed to send startup message", { error: errorMessage(error) });
  }

  let loop: Promise<void> | null = null;
  if (enableScanLoop) {
    registry.update("scanLoop", "running");
    loop = orchestrator.start().catch((error: unknown) => {
      registry.update("scanLoop", "error", errorMessage(error));
      log.error("Scan loop exited with error", { error: errorMessage(error) });
    });
  }

  overall = "running";
  startupCompletedAt = new Date();
  const startupTimeMs = Date.now() - startTime;

  log.info("Application started", {
    startupTimeMs,
    watched: watchlist.getWatched().length,
    elevated: watchlist.getElevated().length,
    adminPort: server ? config.port : null,
    clusterDetection: config.clusterDetectionEnabled,
  });

  let stopping: Promise<void> | null = null;

  async function shutdown(): Promise<void> {
    overall = "stopping";
    log.info("Stopping application...");

    if (loop) {
      registry.update("scanLoop", "stopping");
      await orchestrator.stop();
      await loop;
      registry.update("scanLoop", "stopped");
    }

    if (server) {
      registry.update("adminServer", "stopping");
      try {
        await stopAdminServer(server);
        registry.update("adminServer", "stopped");
      } catch (error) {
        registry.update("adminServer", "error", errorMessage(error));
        log.error("Failed to close admin server", { error: errorMessage(error) });
      }
    }

    registry.update("watchlist", "stopped");
    store.close();
    registry.update("store", "stopped");

    overall = "stopped";
    log.info("Application stopped");
  }

  return {
    config,
    store,
    health,
    watchlist,
    detector,
    notifier,
    orchestrator,
    server,
    getStatus: () => ({
      status: overall,
      services: registry.list(),
      startupCompletedAt,
      startupTimeMs,
    }),
    stop: () => {
      stopping ??= shutdown();
      return stopping;
    },
  };
}
