/**
 * Admin HTTP server
 *
 * Small express surface for operators:
 *
 * - GET  /health                             liveness, plain "ok"
 * - GET  /status                             stats, watchlist, store counts, upstream health
 * - GET  /clusters?limit=N                   recently detected clusters
 * - POST /elevated/:address/reset-cursor     re-read an elevated address from its long lookback
 */

import express, { type Express } from "express";
import type { Server } from "http";
import type { EngineConfig } from "../../config/env";
import { addressCursorKey, type EventStore } from "../db/event-store";
import type { FetchHealthTracker } from "../services/fetch-health";
import type { WatchlistManager } from "../services/watchlist";
import { serviceLoggers } from "../utils/logger";
import type { ScanOrchestrator } from "../workers/scan-orchestrator";

// ============================================================================
// Types
// ============================================================================

export interface AdminDependencies {
  store: Pick<EventStore, "counts" | "listClusters" | "resetCursor">;
  watchlist: Pick<WatchlistManager, "getWatched" | "getElevated" | "isElevated">;
  orchestrator: Pick<ScanOrchestrator, "getStats" | "getIsRunning" | "getIsScanning">;
  health?: Pick<FetchHealthTracker, "getSnapshot">;
  config: Pick<
    EngineConfig,
    | "pollIntervalMs"
    | "shortThresholdUsd"
    | "depositThresholdUsd"
    | "clusterDetectionEnabled"
    | "clusterWindowMinutes"
    | "clusterMinScore"
    | "clusterMinNotionalUsd"
    | "webhookTarget"
  >;
}

export const DEFAULT_CLUSTER_LIMIT = 20;
export const MAX_CLUSTER_LIMIT = 200;

const log = serviceLoggers.admin;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse the ?limit= query value, clamped to [1, MAX_CLUSTER_LIMIT]
 */
export function parseLimit(value: unknown): number {
  if (typeof value !== "string" || value.trim() === "") {
    return DEFAULT_CLUSTER_LIMIT;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    return DEFAULT_CLUSTER_LIMIT;
  }
  return Math.min(parsed, MAX_CLUSTER_LIMIT);
}

// ============================================================================
// App
// ============================================================================

export function createAdminApp(deps: AdminDependencies): Express {
  const app = express();
  app.use(express.json());

  /**
   * GET /health
   */
  app.get("/health", (_req, res) => {
    res.type("text/plain").send("ok");
  });

  /**
   * GET /status
   */
  app.get("/status", (_req, res) => {
    try {
      const watched = deps.watchlist.getWatched();
      const elevated = deps.watchlist.getElevated();

      res.json({
        running: deps.orchestrator.getIsRunning(),
        scanning: deps.orchestrator.getIsScanning(),
        stats: deps.orchestrator.getStats(),
        watchlist: {
          watchedCount: watched.length,
          elevatedCount: elevated.length,
          watched,
          elevated,
        },
        store: deps.store.counts(),
        upstream: deps.health?.getSnapshot() ?? null,
        config: {
          pollSeconds: deps.config.pollIntervalMs / 1000,
          shortThresholdUsd: deps.config.shortThresholdUsd,
          depositThresholdUsd: deps.config.depositThresholdUsd,
          clusterDetectionEnabled: deps.config.clusterDetectionEnabled,
          clusterWindowMinutes: deps.config.clusterWindowMinutes,
          clusterMinScore: deps.config.clusterMinScore,
          clusterMinNotionalUsd: deps.config.clusterMinNotionalUsd,
          webhookTarget: deps.config.webhookTarget,
        },
      });
    } catch (error) {
      log.error("Failed to build status", { error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  /**
   * GET /clusters?limit=N
   */
  app.get("/clusters", (req, res) => {
    try {
      const limit = parseLimit(req.query.limit);
      const clusters = deps.store.listClusters(limit);
      res.json({ count: clusters.length, clusters });
    } catch (error) {
      log.error("Failed to list clusters", { error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  /**
   * POST /elevated/:address/reset-cursor
   */
  app.post("/elevated/:address/reset-cursor", (req, res) => {
    const address = req.params.address.toLowerCase();

    if (!deps.watchlist.isElevated(address)) {
      res.status(404).json({ error: `Not an elevated address: ${address}` });
      return;
    }

    try {
      const removed = deps.store.resetCursor(addressCursorKey(address));
      log.info("Cursor reset", { address, removed });
      res.json({ address, reset: true, hadCursor: removed });
    } catch (error) {
      log.error("Failed to reset cursor", { address, error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return app;
}

/**
 * Listen on the given port; resolves once the socket is bound
 */
export function startAdminServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info("Admin server listening", { port });
      resolve(server);
    });
    server.on("error", reject);
  });
}

/**
 * Close the server, resolving once open connections have ended
 */
export function stopAdminServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
