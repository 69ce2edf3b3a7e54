/**
 * Watchlist Manager
 *
 * Store-backed read-through cache of the Watched and Elevated address sets.
 * Elevated entries live in the event store; the cache is refreshed from it
 * after every write so concurrent scan workers see one consistent view.
 *
 * Elevated is always a subset of Watched. Runtime additions to Watched that
 * are not elevated are kept in memory only.
 */

import { EventEmitter } from "events";
import type { ElevatedEntry, EventStore } from "../db/event-store";
import { serviceLoggers } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

export type WatchlistStore = Pick<EventStore, "addElevated" | "listElevated">;

export interface WatchlistConfig {
  store: WatchlistStore;
  /** Configured watch addresses */
  watchAddresses?: readonly string[];
  /** Configured elevated seed addresses, persisted with reason "seed" */
  elevatedAddresses?: readonly string[];
}

export const SEED_REASON = "seed";

// ============================================================================
// Main Class
// ============================================================================

export class WatchlistManager extends EventEmitter {
  private readonly store: WatchlistStore;
  private readonly seedWatch: readonly string[];
  private readonly seedElevated: readonly string[];
  private readonly runtimeWatched = new Set<string>();
  private elevated = new Map<string, ElevatedEntry>();
  private loaded = false;

  constructor(config: WatchlistConfig) {
    super();
    this.store = config.store;
    this.seedWatch = (config.watchAddresses ?? []).map((a) => a.toLowerCase());
    this.seedElevated = (config.elevatedAddresses ?? []).map((a) => a.toLowerCase());
  }

  /**
   * Persist the elevated seeds and populate the cache from the store
   */
  load(): void {
    for (const address of this.seedElevated) {
      this.store.addElevated(address, SEED_REASON);
    }
    this.refresh();
    this.loaded = true;

    serviceLoggers.watchlist.info("Watchlist loaded", {
      watched: this.getWatched().length,
      elevated: this.elevated.size,
    });
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  isElevated(address: string): boolean {
    return this.elevated.has(address.toLowerCase());
  }

  isWatched(address: string): boolean {
    const key = address.toLowerCase();
    return this.elevated.has(key) || this.runtimeWatched.has(key) || this.seedWatch.includes(key);
  }

  /**
   * Snapshot of every watched address: configured ones first, then the rest
   * in the order they became known
   */
  getWatched(): string[] {
    const ordered = new Set<string>([...this.seedWatch, ...this.elevated.keys(), ...this.runtimeWatched]);
    return [...ordered];
  }

  getElevated(): string[] {
    return [...this.elevated.keys()];
  }

  getElevatedEntries(): ElevatedEntry[] {
    return [...this.elevated.values()];
  }

  /**
   * Elevate the given wallets. Returns the addresses that were not elevated before.
   */
  promote(wallets: readonly string[], reason: string): string[] {
    const added: string[] = [];
    for (const wallet of new Set(wallets.map((w) => w.toLowerCase()))) {
      if (this.elevated.has(wallet)) {
        continue;
      }
      if (this.store.addElevated(wallet, reason)) {
        added.push(wallet);
      }
    }

    this.refresh();

    if (added.length > 0) {
      serviceLoggers.watchlist.info("Wallets promoted to elevated", { count: added.length, reason });
      this.emit("promoted", { wallets: added, reason });
    }
    return added;
  }

  /**
   * Watch an address for the rest of the run without elevating it
   */
  addWatched(address: string): boolean {
    const key = address.toLowerCase();
    if (this.isWatched(key)) {
      return false;
    }
    this.runtimeWatched.add(key);
    return true;
  }

  /**
   * Re-read elevated entries from the store
   */
  refresh(): void {
    const next = new Map<string, ElevatedEntry>();
    for (const entry of this.store.listElevated()) {
      next.set(entry.address.toLowerCase(), entry);
    }
    this.elevated = next;
  }
}

export function createWatchlistManager(config: WatchlistConfig): WatchlistManager {
  return new WatchlistManager(config);
}
