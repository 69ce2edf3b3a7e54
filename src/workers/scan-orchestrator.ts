/**
 * Scan Orchestrator
 *
 * Long-running worker that polls every watched account, reports notable
 * activity and runs cluster detection after each pass.
 *
 * Features:
 * - Runs continuously with a fixed sleep between cycles
 * - Per-address resume cursors, advanced to the start time of the pass
 * - Longer first-use lookback for elevated addresses
 * - Seen-digest deduplication and a per-alert finding cap
 * - Cluster detection strictly after all address scans of a cycle
 * - Promotion of cluster participants to the elevated watchlist
 * - Upstream degradation/recovery and periodic status messages
 * - A failing address never aborts the cycle; a failing cycle never stops the loop
 */

import { EventEmitter } from "events";
import type { EngineConfig } from "../../config/env";
import type { LedgerFetcher } from "../api/hyperliquid/ledger-fetcher";
import { addressCursorKey, type EventStore } from "../db/event-store";
import { classifyActivity, findingDigest, summarizeFindings } from "../detection/classifier";
import type { ClusterDetector } from "../detection/cluster-detector";
import type { Cluster, Finding } from "../detection/types";
import type { Notifier, StatusMessage } from "../notifications/webhook/types";
import type { DegradedEvent, FetchHealthTracker, UpstreamStatus } from "../services/fetch-health";
import type { WatchlistManager } from "../services/watchlist";
import { serviceLoggers } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

/** Engine settings the orchestrator reads */
export type ScanSettings = Pick<
  EngineConfig,
  | "pollIntervalMs"
  | "lookbackMs"
  | "elevatedLookbackMs"
  | "scanConcurrency"
  | "statusReportIntervalMs"
  | "shortThresholdUsd"
  | "depositThresholdUsd"
  | "stableTokens"
  | "maxFindingsPerAlert"
  | "clusterDetectionEnabled"
  | "marketMinTradeSizeUsd"
>;

export type OrchestratorStore = Pick<
  EventStore,
  "getCursor" | "setCursor" | "resetCursor" | "recordLargeTrade" | "markSeen" | "isSeen" | "saveCluster"
>;

export interface ScanOrchestratorConfig {
  store: OrchestratorStore;
  fetcher: LedgerFetcher;
  watchlist: WatchlistManager;
  notifier: Notifier;
  /** Omit to skip cluster detection regardless of settings */
  detector?: ClusterDetector;
  /** Upstream health; its degraded/recovered events become status messages */
  health?: FetchHealthTracker;
  settings?: Partial<ScanSettings>;
  /** Clock, overridable in tests */
  now?: () => number;
}

/** Running totals exposed on the status endpoint */
export interface ScanStats {
  startedAt: number | null;
  cyclesCompleted: number;
  cyclesFailed: number;
  addressScans: number;
  addressFailures: number;
  apiCallsSucceeded: number;
  apiCallsFailed: number;
  findingsEmitted: number;
  alertsSent: number;
  clusterScansCompleted: number;
  clustersDetected: number;
  walletsPromoted: number;
  lastCycleAt: number | null;
  lastCycleDurationMs: number | null;
  upstreamStatus: UpstreamStatus;
}

/** Outcome of scanning one address */
export interface AddressScanResult {
  address: string;
  elevated: boolean;
  sinceMs: number;
  fills: number;
  transfers: number;
  findings: Finding[];
  notified: boolean;
  error?: string;
}

/** Outcome of one cycle */
export interface CycleResult {
  cycle: number;
  startedAt: number;
  addressesScanned: number;
  addressFailures: number;
  findingsEmitted: number;
  clusters: Cluster[];
  walletsPromoted: string[];
  durationMs: number;
  completedAt: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SCAN_SETTINGS: ScanSettings = {
  pollIntervalMs: 30_000,
  lookbackMs: 10 * 60 * 1000,
  elevatedLookbackMs: 48 * 60 * 60 * 1000,
  scanConcurrency: 1,
  statusReportIntervalMs: 2 * 60 * 60 * 1000,
  shortThresholdUsd: 25_000_000,
  depositThresholdUsd: 20_000_000,
  stableTokens: ["USDC", "USDT"],
  maxFindingsPerAlert: 20,
  clusterDetectionEnabled: true,
  marketMinTradeSizeUsd: 5_000_000,
};

// ============================================================================
// Helper Functions
// ============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Watchlist promotion reason for a cluster's participants
 */
export function promotionReason(cluster: Pick<Cluster, "clusterId" | "score">): string {
  return `Cluster ${cluster.clusterId.slice(0, 8)} (score: ${cluster.score})`;
}

// ============================================================================
// Main Class
// ============================================================================

export class ScanOrchestrator extends EventEmitter {
  private readonly settings: ScanSettings;
  private readonly store: OrchestratorStore;
  private readonly fetcher: LedgerFetcher;
  private readonly watchlist: WatchlistManager;
  private readonly notifier: Notifier;
  private readonly detector: ClusterDetector | undefined;
  private readonly health: FetchHealthTracker | undefined;
  private readonly now: () => number;
  private readonly log = serviceLoggers.orchestrator;

  private isRunning = false;
  private shouldStop = false;
  private currentCycle: Promise<CycleResult> | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wakeUp: (() => void) | null = null;
  private cycleNumber = 0;
  private nextStatusReportAt: number | null = null;
  private pendingStatus: StatusMessage[] = [];

  private stats: Omit<ScanStats, "apiCallsSucceeded" | "apiCallsFailed" | "upstreamStatus"> = {
    startedAt: null,
    cyclesCompleted: 0,
    cyclesFailed: 0,
    addressScans: 0,
    addressFailures: 0,
    findingsEmitted: 0,
    alertsSent: 0,
    clusterScansCompleted: 0,
    clustersDetected: 0,
    walletsPromoted: 0,
    lastCycleAt: null,
    lastCycleDurationMs: null,
  };

  constructor(config: ScanOrchestratorConfig) {
    super();
    this.settings = Object.freeze({ ...DEFAULT_SCAN_SETTINGS, ...config.settings });
    this.store = config.store;
    this.fetcher = config.fetcher;
    this.watchlist = config.watchlist;
    this.notifier = config.notifier;
    this.detector = config.detector;
    this.health = config.health;
    this.now = config.now ?? Date.now;

    this.health?.on("degraded", (event: DegradedEvent) => {
      this.pendingStatus.push({ kind: "api_error", error: event.error, successRate: event.successRate });
    });
    this.health?.on("recovered", () => {
      this.pendingStatus.push({ kind: "recovery" });
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Run cycles until stop() is called. Resolves once the loop has exited.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      this.log.warn("Orchestrator already running");
      return;
    }

    this.isRunning = true;
    this.shouldStop = false;
    this.stats.startedAt = this.now();
    this.nextStatusReportAt = this.stats.startedAt + this.settings.statusReportIntervalMs;

    this.log.info("Starting scan loop", {
      pollIntervalMs: this.settings.pollIntervalMs,
      watched: this.watchlist.getWatched().length,
      elevated: this.watchlist.getElevated().length,
      concurrency: this.settings.scanConcurrency,
    });
    this.emit("started");

    try {
      await this.runLoop();
    } finally {
      this.isRunning = false;
      this.emit("stopped");
    }
  }

  /**
   * Stop after the in-flight cycle finishes
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.log.info("Stopping scan loop...");
    this.shouldStop = true;
    this.cancelSleep();

    if (this.currentCycle) {
      await this.currentCycle.catch(() => undefined);
    }
  }

  getIsRunning(): boolean {
    return this.isRunning;
  }

  getIsScanning(): boolean {
    return this.currentCycle !== null;
  }

  getStats(): ScanStats {
    const health = this.health?.getSnapshot();
    return {
      ...this.stats,
      apiCallsSucceeded: health?.totalSucceeded ?? 0,
      apiCallsFailed: health?.totalFailed ?? 0,
      upstreamStatus: health?.status ?? "unknown",
    };
  }

  // --------------------------------------------------------------------------
  // Loop
  // --------------------------------------------------------------------------

  private async runLoop(): Promise<void> {
    while (!this.shouldStop) {
      try {
        const result = await this.runCycle();
        this.emit("cycle:complete", result);
      } catch (error) {
        const message = errorMessage(error);
        this.stats.cyclesFailed++;
        this.log.error("Unexpected error in scan cycle", { error: message, cycle: this.cycleNumber });
        this.emit("cycle:error", { error: message, cycle: this.cycleNumber });
      }

      if (!this.shouldStop) {
        await this.sleepWithTimeout(this.settings.pollIntervalMs);
      }
    }

    this.log.info("Scan loop exited");
  }

  /**
   * Run one full pass: every watched address, then cluster detection, then
   * pending status messages
   */
  async runCycle(): Promise<CycleResult> {
    if (this.currentCycle) {
      throw new Error("Cycle already in progress");
    }

    const cycle = this.executeCycle();
    this.currentCycle = cycle;
    try {
      return await cycle;
    } finally {
      this.currentCycle = null;
    }
  }

  private async executeCycle(): Promise<CycleResult> {
    const startedAt = this.now();
    const cycle = ++this.cycleNumber;
    const addresses = this.watchlist.getWatched();
    const results: AddressScanResult[] = [];

    for (const batch of chunk(addresses, Math.max(1, this.settings.scanConcurrency))) {
      results.push(...(await Promise.all(batch.map((address) => this.scanAddress(address, startedAt)))));
    }

    const failures = results.filter((r) => r.error !== undefined).length;
    const findingsEmitted = results.reduce((sum, r) => sum + r.findings.length, 0);

    const { clusters, promoted } = await this.detectClusters();
    await this.flushStatus();
    await this.maybeSendStatusReport();

    const completedAt = this.now();
    this.stats.cyclesCompleted++;
    this.stats.lastCycleAt = completedAt;
    this.stats.lastCycleDurationMs = completedAt - startedAt;

    this.log.debug("Cycle complete", {
      cycle,
      addresses: addresses.length,
      failures,
      findings: findingsEmitted,
      clusters: clusters.length,
    });

    return {
      cycle,
      startedAt,
      addressesScanned: addresses.length,
      addressFailures: failures,
      findingsEmitted,
      clusters,
      walletsPromoted: promoted,
      durationMs: completedAt - startedAt,
      completedAt,
    };
  }

  // --------------------------------------------------------------------------
  // Address scans
  // --------------------------------------------------------------------------

  /**
   * Scan one address. Never throws; failures are reported in the result and
   * leave the cursor where it was.
   */
  async scanAddress(address: string, startedAt: number): Promise<AddressScanResult> {
    const elevated = this.watchlist.isElevated(address);
    const key = addressCursorKey(address);
    const result: AddressScanResult = {
      address,
      elevated,
      sinceMs: 0,
      fills: 0,
      transfers: 0,
      findings: [],
      notified: false,
    };

    try {
      const fallback = startedAt - (elevated ? this.settings.elevatedLookbackMs : this.settings.lookbackMs);
      const sinceMs = this.store.getCursor(key, fallback);
      result.sinceMs = sinceMs;

      const [fills, transfers] = await Promise.all([
        this.fetcher.fetchFills(address, sinceMs),
        this.fetcher.fetchTransfers(address, sinceMs),
      ]);
      result.fills = fills.length;
      result.transfers = transfers.length;

      for (const fill of fills) {
        if (fill.notional >= this.settings.marketMinTradeSizeUsd) {
          this.store.recordLargeTrade({
            tradeId: fill.tradeId,
            wallet: address,
            instrument: fill.instrument,
            side: fill.side,
            notional: fill.notional,
            timestamp: fill.timestamp,
          });
        }
      }

      const findings = classifyActivity(address, fills, transfers, {
        isElevated: elevated,
        depositThresholdUsd: this.settings.depositThresholdUsd,
        shortThresholdUsd: this.settings.shortThresholdUsd,
        stableTokens: this.settings.stableTokens,
      });

      result.findings = findings.filter((finding) => this.store.markSeen(findingDigest(finding), startedAt));

      if (result.findings.length > 0) {
        this.stats.findingsEmitted += result.findings.length;
        this.emit("findings", { address, elevated, findings: result.findings });
        result.notified = await this.deliverFindings(address, result.findings, elevated);
      }

      this.store.setCursor(key, startedAt);
      this.stats.addressScans++;
    } catch (error) {
      result.error = errorMessage(error);
      this.stats.addressFailures++;
      this.log.warn("Address scan failed", { address, error: result.error });
      this.emit("address:error", { address, error: result.error });
    }

    return result;
  }

  private async deliverFindings(address: string, findings: Finding[], elevated: boolean): Promise<boolean> {
    const batch =
      findings.length > this.settings.maxFindingsPerAlert ? [summarizeFindings(address, findings)] : findings;

    try {
      await this.notifier.notify(address, batch, elevated);
      this.stats.alertsSent++;
      return true;
    } catch (error) {
      this.log.error("Failed to deliver findings", { address, count: batch.length, error: errorMessage(error) });
      return false;
    }
  }

  // --------------------------------------------------------------------------
  // Cluster detection
  // --------------------------------------------------------------------------

  private async detectClusters(): Promise<{ clusters: Cluster[]; promoted: string[] }> {
    if (!this.detector || !this.settings.clusterDetectionEnabled) {
      return { clusters: [], promoted: [] };
    }

    const accepted: Cluster[] = [];
    const promoted: string[] = [];

    try {
      const clusters = await this.detector.detect(this.now());
      this.stats.clusterScansCompleted++;

      for (const cluster of clusters) {
        if (this.store.isSeen(cluster.clusterId)) {
          continue;
        }
        this.store.markSeen(cluster.clusterId, this.now());
        this.store.saveCluster(cluster);
        accepted.push(cluster);
        this.stats.clustersDetected++;

        try {
          await this.notifier.notifyCluster(cluster);
          this.stats.alertsSent++;
        } catch (error) {
          this.log.error("Failed to deliver cluster alert", {
            clusterId: cluster.clusterId,
            error: errorMessage(error),
          });
        }

        const added = this.watchlist.promote(cluster.wallets, promotionReason(cluster));
        // Newly elevated wallets are re-read from the elevated lookback
        for (const wallet of added) {
          this.store.resetCursor(addressCursorKey(wallet));
        }
        this.stats.walletsPromoted += added.length;
        promoted.push(...added);
        this.emit("cluster", { cluster, promoted: added });
      }
    } catch (error) {
      this.log.error("Cluster detection failed", { error: errorMessage(error) });
    }

    return { clusters: accepted, promoted };
  }

  // --------------------------------------------------------------------------
  // Status messages
  // --------------------------------------------------------------------------

  private async flushStatus(): Promise<void> {
    const queued = this.pendingStatus;
    this.pendingStatus = [];
    for (const message of queued) {
      await this.sendStatus(message);
    }
  }

  private async maybeSendStatusReport(): Promise<void> {
    const now = this.now();
    if (this.nextStatusReportAt === null || now < this.nextStatusReportAt) {
      return;
    }
    this.nextStatusReportAt = now + this.settings.statusReportIntervalMs;

    const stats = this.getStats();
    await this.sendStatus({
      kind: "status_report",
      uptimeMs: stats.startedAt === null ? 0 : now - stats.startedAt,
      cyclesCompleted: stats.cyclesCompleted,
      addressScans: stats.addressScans,
      clusterScansCompleted: stats.clusterScansCompleted,
      apiCallsSucceeded: stats.apiCallsSucceeded,
      apiCallsFailed: stats.apiCallsFailed,
      alertsSent: stats.alertsSent,
      clustersDetected: stats.clustersDetected,
      walletsPromoted: stats.walletsPromoted,
      upstreamStatus: stats.upstreamStatus,
      clusterDetectionEnabled: this.settings.clusterDetectionEnabled && this.detector !== undefined,
    });
  }

  private async sendStatus(message: StatusMessage): Promise<void> {
    try {
      await this.notifier.notifyStatus(message);
      this.stats.alertsSent++;
    } catch (error) {
      this.log.warn("Failed to deliver status message", { kind: message.kind, error: errorMessage(error) });
    }
  }

  // --------------------------------------------------------------------------
  // Sleep
  // --------------------------------------------------------------------------

  private sleepWithTimeout(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeUp = null;
        resolve();
      }, ms);
    });
  }

  private cancelSleep(): void {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    const wake = this.wakeUp;
    this.wakeUp = null;
    wake?.();
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScanOrchestrator(config: ScanOrchestratorConfig): ScanOrchestrator {
  return new ScanOrchestrator(config);
}
