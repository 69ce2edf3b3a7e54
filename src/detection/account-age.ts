/**
 * Account Age Calculator
 *
 * Account age in days, measured from an account's earliest ledger activity.
 *
 * Features:
 * - Lookup through the ledger fetcher (`fetchFirstActivityMs`)
 * - In-memory caching with configurable TTL
 * - Batch averaging for cluster participants
 * - Neutral fallback age whenever a lookup is impossible or fails
 */

import { isAddress } from "viem";
import type { LedgerFetcher } from "../api/hyperliquid/ledger-fetcher";
import { serviceLoggers } from "../utils/logger";
import { NEUTRAL_ACCOUNT_AGE_DAYS } from "./suspicion-scorer";

// ============================================================================
// Types
// ============================================================================

/** Anything able to report when an account first became active */
export type FirstActivitySource = Pick<LedgerFetcher, "fetchFirstActivityMs">;

/** Age lookups used by the cluster detector */
export interface AccountAgeProvider {
  /** Age in days, or null when unknown */
  getAgeDays(address: string, nowMs?: number): Promise<number | null>;
}

export interface AccountAgeCalculatorConfig {
  source: FirstActivitySource;
  /** Cache TTL in milliseconds (default: 6 hours) */
  cacheTtlMs?: number;
  /** Maximum cached addresses (default: 1000) */
  maxCacheSize?: number;
}

interface CacheEntry {
  firstActivityMs: number | null;
  expiresAt: number;
}

// ============================================================================
// Constants
// ============================================================================

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DEFAULT_CACHE_TTL_MS = 6 * 60 * 60 * 1000;
const DEFAULT_MAX_CACHE_SIZE = 1000;

// ============================================================================
// Main Class
// ============================================================================

export class AccountAgeCalculator implements AccountAgeProvider {
  private readonly source: FirstActivitySource;
  private readonly cacheTtlMs: number;
  private readonly maxCacheSize: number;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(config: AccountAgeCalculatorConfig) {
    this.source = config.source;
    this.cacheTtlMs = config.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxCacheSize = config.maxCacheSize ?? DEFAULT_MAX_CACHE_SIZE;
  }

  /**
   * Age in days of an account, null for invalid addresses and accounts with no
   * ledger history. Lookup errors propagate.
   */
  async getAgeDays(address: string, nowMs: number = Date.now()): Promise<number | null> {
    const key = address.toLowerCase();
    if (!isAddress(key, { strict: false })) {
      return null;
    }

    const firstActivityMs = await this.getFirstActivity(key, nowMs);
    if (firstActivityMs === null) {
      return null;
    }
    return Math.max(0, (nowMs - firstActivityMs) / MS_PER_DAY);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  private async getFirstActivity(key: string, nowMs: number): Promise<number | null> {
    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > nowMs) {
      return cached.firstActivityMs;
    }

    const firstActivityMs = await this.source.fetchFirstActivityMs(key);

    if (this.cache.size >= this.maxCacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, { firstActivityMs, expiresAt: nowMs + this.cacheTtlMs });
    return firstActivityMs;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Average age of the given accounts. Any failed or empty lookup counts as the
 * neutral age; an empty list averages to the neutral age.
 */
export async function averageAccountAgeDays(
  provider: AccountAgeProvider | undefined,
  wallets: readonly string[],
  nowMs: number = Date.now()
): Promise<number> {
  if (!provider || wallets.length === 0) {
    return NEUTRAL_ACCOUNT_AGE_DAYS;
  }

  const ages = await Promise.all(
    wallets.map(async (wallet) => {
      try {
        return (await provider.getAgeDays(wallet, nowMs)) ?? NEUTRAL_ACCOUNT_AGE_DAYS;
      } catch (error) {
        serviceLoggers.detector.warn("Account age lookup failed, using neutral age", {
          wallet,
          error: error instanceof Error ? error.message : String(error),
        });
        return NEUTRAL_ACCOUNT_AGE_DAYS;
      }
    })
  );

  return ages.reduce((sum, age) => sum + age, 0) / ages.length;
}

export function createAccountAgeCalculator(config: AccountAgeCalculatorConfig): AccountAgeCalculator {
  return new AccountAgeCalculator(config);
}
