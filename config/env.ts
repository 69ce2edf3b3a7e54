import dotenv from "dotenv";
import { isAddress } from "viem";
import type { WebhookTarget } from "../src/notifications/webhook/types";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

/**
 * Thrown when an environment variable is present but unusable
 */
export class ConfigurationError extends Error {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.key = key;
  }
}

/**
 * Validates that a URL string is properly formatted
 */
function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get an environment variable with an optional default
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(key, `Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable
 */
function getEnvVarOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get a required URL environment variable with validation
 */
function getEnvVarUrl(key: string, defaultValue?: string): string {
  const value = getEnvVar(key, defaultValue);
  if (!isValidUrl(value)) {
    throw new ConfigurationError(key, `Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an optional URL environment variable with validation
 */
function getEnvVarUrlOptional(key: string): string | undefined {
  const value = getEnvVarOptional(key);
  if (value === undefined) {
    return undefined;
  }
  if (!isValidUrl(value)) {
    throw new ConfigurationError(key, `Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an environment variable as a number.
 * Thresholds are written as plain dollar amounts, so decimals are accepted.
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(key, `Missing required environment variable: ${key}`);
  }
  const parsed = Number(value.replace(/_/g, ""));
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(key, `Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(key, `Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Parse a comma-separated list of values
 */
function getEnvVarAsList(key: string, defaultValue?: string[]): string[] {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue ?? [];
  }
  return value.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

/**
 * Parse a comma-separated list of addresses, lower-cased and de-duplicated
 */
function getEnvVarAsAddressList(key: string): string[] {
  return [...new Set(getEnvVarAsList(key).map((address) => address.toLowerCase()))];
}

/**
 * Redact sensitive values for logging
 */
function redactSecret(value: string | undefined): string {
  if (value === undefined || value === "") {
    return "(not set)";
  }
  if (value.length <= 8) {
    return "****";
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

function parseWebhookTarget(value: string): WebhookTarget | null {
  const normalized = value.trim().toLowerCase();
  return normalized === "slack" || normalized === "discord" ? normalized : null;
}

/**
 * Elevated addresses, falling back to VIP_ADDRESSES when ELEVATED_ADDRESSES is unset or empty
 */
function getElevatedAddresses(): string[] {
  return getEnvVarAsAddressList(
    getEnvVarOptional("ELEVATED_ADDRESSES") !== undefined ? "ELEVATED_ADDRESSES" : "VIP_ADDRESSES"
  );
}

/**
 * All environment configuration with validation
 */
export const env = {
  // Application
  NODE_ENV: getEnvVar("NODE_ENV", "development"),
  PORT: getEnvVarAsNumber("PORT", 8080),
  isDevelopment: getEnvVar("NODE_ENV", "development") === "development",
  isProduction: getEnvVar("NODE_ENV", "development") === "production",
  isTest: getEnvVar("NODE_ENV", "development") === "test",

  // Persistence
  DB_PATH: getEnvVar("DB_PATH", "./data/ledger-watch.db"),

  // Hyperliquid info API
  HYPERLIQUID_API_URL: getEnvVarUrl(
    "HYPERLIQUID_API_URL",
    process.env.HYPERLIQUID_API ?? "https://api.hyperliquid.xyz/info"
  ),
  HTTP_TIMEOUT_MS: getEnvVarAsNumber("HTTP_TIMEOUT_MS", 10000),

  // Polling
  POLL_SECONDS: getEnvVarAsNumber("POLL_SECONDS", 30),
  LOOKBACK_MINUTES: getEnvVarAsNumber("LOOKBACK_MINUTES", 10),
  ELEVATED_LOOKBACK_HOURS: getEnvVarAsNumber("ELEVATED_LOOKBACK_HOURS", 48),
  SCAN_CONCURRENCY: getEnvVarAsNumber("SCAN_CONCURRENCY", 1),
  STATUS_REPORT_INTERVAL_MINUTES: getEnvVarAsNumber("STATUS_REPORT_INTERVAL_MINUTES", 120),

  // Addresses
  WATCH_ADDRESSES: getEnvVarAsAddressList("WATCH_ADDRESSES"),
  ELEVATED_ADDRESSES: getElevatedAddresses(),

  // Classification thresholds
  USD_SHORT_THRESHOLD: getEnvVarAsNumber("USD_SHORT_THRESHOLD", 25_000_000),
  USD_DEPOSIT_THRESHOLD: getEnvVarAsNumber("USD_DEPOSIT_THRESHOLD", 20_000_000),
  STABLE_TOKENS: getEnvVarAsList("STABLE_TOKENS", ["USDC", "USDT"]).map((token) => token.toUpperCase()),
  MAX_FINDINGS_PER_ALERT: getEnvVarAsNumber("MAX_FINDINGS_PER_ALERT", 20),

  // Cluster detection
  CLUSTER_DETECTION_ENABLED: getEnvVarAsBoolean("CLUSTER_DETECTION_ENABLED", true),
  CLUSTER_TIME_WINDOW_MINUTES: getEnvVarAsNumber("CLUSTER_TIME_WINDOW_MINUTES", 60),
  CLUSTER_MIN_SCORE: getEnvVarAsNumber("CLUSTER_MIN_SCORE", 70),
  CLUSTER_MIN_NOTIONAL: getEnvVarAsNumber("CLUSTER_MIN_NOTIONAL", 50_000_000),
  MARKET_SCAN_TOKENS: getEnvVarAsList("MARKET_SCAN_TOKENS").map((token) => token.toUpperCase()),
  MARKET_MIN_TRADE_SIZE: getEnvVarAsNumber("MARKET_MIN_TRADE_SIZE", 5_000_000),

  // Notifications
  WEBHOOK_URL: getEnvVarUrlOptional("WEBHOOK_URL"),
  WEBHOOK_TARGET: getEnvVar("WEBHOOK_TARGET", "slack"),
} as const;

export type Env = typeof env;

export type { WebhookTarget };

/**
 * Engine configuration, read once at startup and never mutated afterwards
 */
export interface EngineConfig {
  readonly pollIntervalMs: number;
  readonly lookbackMs: number;
  readonly elevatedLookbackMs: number;
  readonly scanConcurrency: number;
  readonly statusReportIntervalMs: number;
  readonly watchAddresses: readonly string[];
  readonly elevatedAddresses: readonly string[];
  readonly shortThresholdUsd: number;
  readonly depositThresholdUsd: number;
  readonly stableTokens: readonly string[];
  readonly maxFindingsPerAlert: number;
  readonly clusterDetectionEnabled: boolean;
  readonly clusterWindowMinutes: number;
  readonly clusterMinScore: number;
  readonly clusterMinNotionalUsd: number;
  readonly marketScanTokens: readonly string[];
  readonly marketMinTradeSizeUsd: number;
  readonly hyperliquidApiUrl: string;
  readonly httpTimeoutMs: number;
  readonly webhookUrl: string | undefined;
  readonly webhookTarget: WebhookTarget;
  readonly dbPath: string;
  readonly port: number;
}

/**
 * Build the immutable engine configuration from an environment snapshot
 */
export function buildEngineConfig(source: Env = env): EngineConfig {
  const webhookTarget = parseWebhookTarget(source.WEBHOOK_TARGET);
  if (!webhookTarget) {
    throw new ConfigurationError(
      "WEBHOOK_TARGET",
      `WEBHOOK_TARGET must be "slack" or "discord", got: ${source.WEBHOOK_TARGET}`
    );
  }

  const config: EngineConfig = {
    pollIntervalMs: source.POLL_SECONDS * 1000,
    lookbackMs: source.LOOKBACK_MINUTES * 60 * 1000,
    elevatedLookbackMs: source.ELEVATED_LOOKBACK_HOURS * 60 * 60 * 1000,
    scanConcurrency: Math.max(1, Math.floor(source.SCAN_CONCURRENCY)),
    statusReportIntervalMs: source.STATUS_REPORT_INTERVAL_MINUTES * 60 * 1000,
    watchAddresses: Object.freeze([...source.WATCH_ADDRESSES]),
    elevatedAddresses: Object.freeze([...source.ELEVATED_ADDRESSES]),
    shortThresholdUsd: source.USD_SHORT_THRESHOLD,
    depositThresholdUsd: source.USD_DEPOSIT_THRESHOLD,
    stableTokens: Object.freeze([...source.STABLE_TOKENS]),
    maxFindingsPerAlert: Math.max(1, Math.floor(source.MAX_FINDINGS_PER_ALERT)),
    clusterDetectionEnabled: source.CLUSTER_DETECTION_ENABLED,
    clusterWindowMinutes: source.CLUSTER_TIME_WINDOW_MINUTES,
    clusterMinScore: source.CLUSTER_MIN_SCORE,
    clusterMinNotionalUsd: source.CLUSTER_MIN_NOTIONAL,
    marketScanTokens: Object.freeze([...source.MARKET_SCAN_TOKENS]),
    marketMinTradeSizeUsd: source.MARKET_MIN_TRADE_SIZE,
    hyperliquidApiUrl: source.HYPERLIQUID_API_URL,
    httpTimeoutMs: source.HTTP_TIMEOUT_MS,
    webhookUrl: source.WEBHOOK_URL,
    webhookTarget,
    dbPath: source.DB_PATH,
    port: source.PORT,
  };

  return Object.freeze(config);
}

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(source: Env = env): void {
  const config = {
    NODE_ENV: source.NODE_ENV,
    PORT: source.PORT,
    DB_PATH: source.DB_PATH,
    HYPERLIQUID_API_URL: source.HYPERLIQUID_API_URL,
    POLL_SECONDS: source.POLL_SECONDS,
    LOOKBACK_MINUTES: source.LOOKBACK_MINUTES,
    ELEVATED_LOOKBACK_HOURS: source.ELEVATED_LOOKBACK_HOURS,
    WATCH_ADDRESSES: `[${source.WATCH_ADDRESSES.length} address(es)]`,
    ELEVATED_ADDRESSES: `[${source.ELEVATED_ADDRESSES.length} address(es)]`,
    USD_SHORT_THRESHOLD: source.USD_SHORT_THRESHOLD,
    USD_DEPOSIT_THRESHOLD: source.USD_DEPOSIT_THRESHOLD,
    CLUSTER_DETECTION_ENABLED: source.CLUSTER_DETECTION_ENABLED,
    CLUSTER_TIME_WINDOW_MINUTES: source.CLUSTER_TIME_WINDOW_MINUTES,
    CLUSTER_MIN_SCORE: source.CLUSTER_MIN_SCORE,
    CLUSTER_MIN_NOTIONAL: source.CLUSTER_MIN_NOTIONAL,
    MARKET_MIN_TRADE_SIZE: source.MARKET_MIN_TRADE_SIZE,
    WEBHOOK_TARGET: source.WEBHOOK_TARGET,
    WEBHOOK_URL: redactSecret(source.WEBHOOK_URL),
  };

  console.log("=".repeat(60));
  console.log("Environment Configuration (secrets redacted):");
  console.log("=".repeat(60));
  for (const [key, value] of Object.entries(config)) {
    console.log(`  ${key}: ${value}`);
  }
  console.log("=".repeat(60));
}

/**
 * Validate that the environment is properly configured
 * Returns an object with validation results
 */
export function validateEnv(source: Env = env): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!parseWebhookTarget(source.WEBHOOK_TARGET)) {
    errors.push(`WEBHOOK_TARGET must be "slack" or "discord": ${source.WEBHOOK_TARGET}`);
  }

  for (const address of [...source.WATCH_ADDRESSES, ...source.ELEVATED_ADDRESSES]) {
    if (!isAddress(address, { strict: false })) {
      errors.push(`Not a valid account address: ${address}`);
    }
  }

  if (source.POLL_SECONDS <= 0) {
    errors.push(`POLL_SECONDS must be positive: ${source.POLL_SECONDS}`);
  }

  if (source.WATCH_ADDRESSES.length === 0 && source.ELEVATED_ADDRESSES.length === 0) {
    warnings.push("No WATCH_ADDRESSES or ELEVATED_ADDRESSES configured - only persisted elevated addresses will be scanned");
  }

  if (!source.WEBHOOK_URL) {
    warnings.push("WEBHOOK_URL not set - notifications will be logged instead of delivered");
  }

  if (source.CLUSTER_MIN_SCORE > 100) {
    warnings.push(`CLUSTER_MIN_SCORE above 100 disables cluster alerts: ${source.CLUSTER_MIN_SCORE}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Initialize and validate environment configuration
 * Logs config and throws if critical errors are found
 */
export function initializeEnv(source: Env = env): EngineConfig {
  if (!source.isTest) {
    logConfig(source);
  }

  const validation = validateEnv(source);

  if (validation.warnings.length > 0 && !source.isTest) {
    console.log("\nConfiguration Warnings:");
    for (const warning of validation.warnings) {
      console.log(`  ⚠️  ${warning}`);
    }
  }

  if (validation.errors.length > 0) {
    console.error("\nConfiguration Errors:");
    for (const error of validation.errors) {
      console.error(`  ❌  ${error}`);
    }
    throw new Error(`Environment validation failed with ${validation.errors.length} error(s)`);
  }

  return buildEngineConfig(source);
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  redactSecret,
  parseWebhookTarget,
  getEnvVarAsNumber,
  getEnvVarAsList,
  getEnvVarAsAddressList,
  getElevatedAddresses,
};
