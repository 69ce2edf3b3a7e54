/**
 * Upstream Fetch Health Tracker
 *
 * Keeps a rolling record of info API call outcomes and flags when the upstream
 * looks degraded.
 *
 * Features:
 * - Rolling window of the most recent calls (default: 50)
 * - Degraded once enough calls are recorded and the failure ratio passes a threshold
 * - Emits `degraded` once per degraded period and `recovered` when it ends
 * - Lifetime success/failure counters for the status snapshot
 */

import { EventEmitter } from "events";
import { serviceLoggers } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

export interface FetchHealthConfig {
  /** Number of recent calls considered (default: 50) */
  windowSize?: number;
  /** Calls required before the tracker can report degradation (default: 10) */
  minCalls?: number;
  /** Failure ratio above which the upstream is degraded (default: 0.3) */
  failureRatioThreshold?: number;
}

export type UpstreamStatus = "unknown" | "healthy" | "degraded";

export interface FetchHealthSnapshot {
  status: UpstreamStatus;
  windowCalls: number;
  windowFailures: number;
  /** Success ratio in the window, 0..1; 1 when empty */
  successRate: number;
  totalSucceeded: number;
  totalFailed: number;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  lastError: string | null;
}

/** Payload of the `degraded` event */
export interface DegradedEvent {
  error: string;
  successRate: number;
  windowCalls: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_HEALTH_WINDOW = 50;
export const DEFAULT_HEALTH_MIN_CALLS = 10;
export const DEFAULT_FAILURE_RATIO = 0.3;

// ============================================================================
// Main Class
// ============================================================================

export class FetchHealthTracker extends EventEmitter {
  private readonly config: Required<FetchHealthConfig>;
  private window: boolean[] = [];
  private degraded = false;
  private totalSucceeded = 0;
  private totalFailed = 0;
  private lastSuccessAt: number | null = null;
  private lastFailureAt: number | null = null;
  private lastError: string | null = null;

  constructor(config: FetchHealthConfig = {}) {
    super();
    this.config = {
      windowSize: Math.max(1, config.windowSize ?? DEFAULT_HEALTH_WINDOW),
      minCalls: config.minCalls ?? DEFAULT_HEALTH_MIN_CALLS,
      failureRatioThreshold: config.failureRatioThreshold ?? DEFAULT_FAILURE_RATIO,
    };
  }

  recordSuccess(nowMs: number = Date.now()): void {
    this.totalSucceeded++;
    this.lastSuccessAt = nowMs;
    this.push(true);
    this.evaluate();
  }

  recordFailure(error: unknown, nowMs: number = Date.now()): void {
    this.totalFailed++;
    this.lastFailureAt = nowMs;
    this.lastError = error instanceof Error ? error.message : String(error);
    this.push(false);
    this.evaluate();
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  getSnapshot(): FetchHealthSnapshot {
    const failures = this.window.filter((ok) => !ok).length;
    const calls = this.window.length;
    return {
      status: this.degraded ? "degraded" : calls === 0 ? "unknown" : "healthy",
      windowCalls: calls,
      windowFailures: failures,
      successRate: calls === 0 ? 1 : (calls - failures) / calls,
      totalSucceeded: this.totalSucceeded,
      totalFailed: this.totalFailed,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError,
    };
  }

  reset(): void {
    this.window = [];
    this.degraded = false;
    this.totalSucceeded = 0;
    this.totalFailed = 0;
    this.lastSuccessAt = null;
    this.lastFailureAt = null;
    this.lastError = null;
  }

  private push(ok: boolean): void {
    this.window.push(ok);
    if (this.window.length > this.config.windowSize) {
      this.window.shift();
    }
  }

  private evaluate(): void {
    const calls = this.window.length;
    const failures = this.window.filter((ok) => !ok).length;
    const ratio = calls === 0 ? 0 : failures / calls;
    const unhealthy = calls >= this.config.minCalls && ratio > this.config.failureRatioThreshold;

    if (unhealthy && !this.degraded) {
      this.degraded = true;
      const event: DegradedEvent = {
        error: this.lastError ?? "unknown error",
        successRate: 1 - ratio,
        windowCalls: calls,
      };
      serviceLoggers.health.warn("Upstream degraded", { ...event });
      this.emit("degraded", event);
    } else if (!unhealthy && this.degraded && ratio <= this.config.failureRatioThreshold) {
      this.degraded = false;
      serviceLoggers.health.info("Upstream recovered", { successRate: 1 - ratio });
      this.emit("recovered", this.getSnapshot());
    }
  }
}

export function createFetchHealthTracker(config: FetchHealthConfig = {}): FetchHealthTracker {
  return new FetchHealthTracker(config);
}
