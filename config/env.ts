import dotenv from "dotenv";

import {
  type ScreeningConfig,
  createScreeningConfig,
} from "../src/detection/screening-config";
import { ConfigurationError } from "../src/utils/errors";
import { type Logger, logger as rootLogger } from "../src/utils/logger";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation.
 *
 * Values are read from an explicit source (default: process.env) so that the
 * screening core never touches the environment itself.
 */

export type EnvSource = Record<string, string | undefined>;

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

function readRaw(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Get an environment variable with a default
 */
function getEnvVar(source: EnvSource, key: string, defaultValue: string): string {
  return readRaw(source, key) ?? defaultValue;
}

/**
 * Get an optional environment variable
 */
function getEnvVarOptional(source: EnvSource, key: string): string | undefined {
  return readRaw(source, key);
}

/**
 * Get a URL environment variable with validation
 */
function getEnvVarUrl(source: EnvSource, key: string, defaultValue: string): string {
  const value = getEnvVar(source, key, defaultValue);
  if (!isValidUrl(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an optional URL environment variable with validation
 */
function getEnvVarUrlOptional(source: EnvSource, key: string): string | undefined {
  const value = readRaw(source, key);
  if (value === undefined) {
    return undefined;
  }
  if (!isValidUrl(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an environment variable as a number (decimals allowed)
 */
function getEnvVarAsNumber(source: EnvSource, key: string): number | undefined {
  const value = readRaw(source, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a whole number
 */
function getEnvVarAsInteger(source: EnvSource, key: string): number | undefined {
  const parsed = getEnvVarAsNumber(source, key);
  if (parsed !== undefined && !Number.isInteger(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer, got: ${parsed}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(source: EnvSource, key: string): boolean | undefined {
  const value = readRaw(source, key);
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Parse a comma-separated list of values
 */
function getEnvVarAsList(source: EnvSource, key: string): string[] | undefined {
  const value = readRaw(source, key);
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
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

/**
 * Endpoints, credentials and fetch limits
 */
export interface Env {
  NODE_ENV: string;
  isProduction: boolean;
  isTest: boolean;

  // Polygon network (required)
  POLYGON_RPC_URL: string | undefined;
  /** Extra RPC URLs tried on failover */
  POLYGON_RPC_FALLBACK_URLS: string[];
  POLYGONSCAN_API_KEY: string | undefined;
  POLYGONSCAN_API_URL: string;

  // Polymarket APIs
  DATA_API_URL: string;
  GAMMA_API_URL: string;
  POLYMARKET_SESSION_TOKEN: string | undefined;

  // Trade window fetch
  MAX_TRADES: number;
  TRADE_PAGE_SIZE: number;
}

/**
 * Read the environment
 *
 * @throws ConfigurationError on malformed values (missing required values are
 * reported by validateEnv instead)
 */
export function loadEnv(source: EnvSource = process.env): Env {
  const nodeEnv = getEnvVar(source, "NODE_ENV", "development");
  const fallbackUrls = getEnvVarAsList(source, "POLYGON_RPC_FALLBACK_URLS") ?? [];
  for (const url of fallbackUrls) {
    if (!isValidUrl(url)) {
      throw new ConfigurationError(
        `Environment variable POLYGON_RPC_FALLBACK_URLS must list valid URLs, got: ${url}`
      );
    }
  }

  return {
    NODE_ENV: nodeEnv,
    isProduction: nodeEnv === "production",
    isTest: nodeEnv === "test",

    POLYGON_RPC_URL: getEnvVarUrlOptional(source, "POLYGON_RPC_URL"),
    POLYGON_RPC_FALLBACK_URLS: fallbackUrls,
    POLYGONSCAN_API_KEY: getEnvVarOptional(source, "POLYGONSCAN_API_KEY"),
    POLYGONSCAN_API_URL: getEnvVarUrl(source, "POLYGONSCAN_API_URL", "https://api.etherscan.io/v2/api"),

    DATA_API_URL: getEnvVarUrl(source, "DATA_API_URL", "https://data-api.polymarket.com"),
    GAMMA_API_URL: getEnvVarUrl(source, "GAMMA_API_URL", "https://gamma-api.polymarket.com"),
    POLYMARKET_SESSION_TOKEN: getEnvVarOptional(source, "POLYMARKET_SESSION_TOKEN"),

    MAX_TRADES: getEnvVarAsInteger(source, "MAX_TRADES") ?? 5000,
    TRADE_PAGE_SIZE: getEnvVarAsInteger(source, "TRADE_PAGE_SIZE") ?? 500,
  };
}

/**
 * Screening thresholds from the environment; unset variables keep defaults
 *
 * @throws ConfigurationError on malformed or out-of-range values
 */
export function screeningConfigFromEnv(
  source: EnvSource = process.env,
  overrides: Partial<ScreeningConfig> = {}
): ScreeningConfig {
  const fromEnv: { -readonly [K in keyof ScreeningConfig]?: ScreeningConfig[K] } = {};

  const lookbackDays = getEnvVarAsNumber(source, "LOOKBACK_DAYS");
  if (lookbackDays !== undefined) fromEnv.lookbackDays = lookbackDays;

  const minBetAmount = getEnvVarAsNumber(source, "MIN_BET_AMOUNT");
  if (minBetAmount !== undefined) fromEnv.minBetAmount = minBetAmount;

  const secondaryBetAmount = getEnvVarAsNumber(source, "SECONDARY_BET_AMOUNT");
  if (secondaryBetAmount !== undefined) fromEnv.secondaryBetAmount = secondaryBetAmount;

  const minBetMargin = getEnvVarAsNumber(source, "MIN_BET_MARGIN");
  if (minBetMargin !== undefined) fromEnv.minBetMargin = minBetMargin;

  const minWalletBalance = getEnvVarAsNumber(source, "MIN_WALLET_BALANCE");
  if (minWalletBalance !== undefined) fromEnv.minWalletBalance = minWalletBalance;

  const convictionThreshold = getEnvVarAsNumber(source, "MIN_CONVICTION_RATIO");
  if (convictionThreshold !== undefined) fromEnv.convictionThreshold = convictionThreshold;

  const minBalanceForConviction = getEnvVarAsNumber(source, "MIN_BALANCE_FOR_CONVICTION");
  if (minBalanceForConviction !== undefined) fromEnv.minBalanceForConviction = minBalanceForConviction;

  const minClusterSize = getEnvVarAsInteger(source, "MIN_CLUSTER_SIZE");
  if (minClusterSize !== undefined) fromEnv.minClusterSize = minClusterSize;

  const clusterWindowDays = getEnvVarAsNumber(source, "CLUSTER_WINDOW_DAYS");
  if (clusterWindowDays !== undefined) fromEnv.clusterWindowDays = clusterWindowDays;

  const freshMaxPriorTx = getEnvVarAsInteger(source, "FRESH_MAX_PRIOR_TX");
  if (freshMaxPriorTx !== undefined) fromEnv.freshMaxPriorTx = freshMaxPriorTx;

  const requireFreshWallet = getEnvVarAsBoolean(source, "REQUIRE_FRESH_WALLET");
  if (requireFreshWallet !== undefined) fromEnv.requireFreshWallet = requireFreshWallet;

  const checkPriorTrades = getEnvVarAsBoolean(source, "CHECK_PRIOR_TRADES");
  if (checkPriorTrades !== undefined) fromEnv.checkPriorTrades = checkPriorTrades;

  const keywords = getEnvVarAsList(source, "INSIDER_RISK_KEYWORDS");
  if (keywords !== undefined) fromEnv.insiderRiskKeywords = keywords;

  return createScreeningConfig({ ...fromEnv, ...overrides });
}

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(env: Env, log: Logger = rootLogger): void {
  log.info("Environment configuration", {
    NODE_ENV: env.NODE_ENV,
    POLYGON_RPC_URL: env.POLYGON_RPC_URL ? redactSecret(env.POLYGON_RPC_URL) : "(not set)",
    POLYGON_RPC_FALLBACK_URLS: `[${env.POLYGON_RPC_FALLBACK_URLS.length} url(s)]`,
    POLYGONSCAN_API_KEY: redactSecret(env.POLYGONSCAN_API_KEY),
    POLYGONSCAN_API_URL: env.POLYGONSCAN_API_URL,
    DATA_API_URL: env.DATA_API_URL,
    GAMMA_API_URL: env.GAMMA_API_URL,
    POLYMARKET_SESSION_TOKEN: redactSecret(env.POLYMARKET_SESSION_TOKEN),
    MAX_TRADES: env.MAX_TRADES,
    TRADE_PAGE_SIZE: env.TRADE_PAGE_SIZE,
  });
}

/**
 * Validate that the environment is properly configured
 * Returns an object with validation results
 */
export function validateEnv(env: Env): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!env.POLYGON_RPC_URL) {
    errors.push("POLYGON_RPC_URL is required for historical balance lookups");
  }

  if (!env.POLYGONSCAN_API_KEY) {
    errors.push("POLYGONSCAN_API_KEY is required to resolve trade timestamps to blocks");
  }

  if (!env.POLYMARKET_SESSION_TOKEN) {
    warnings.push(
      "POLYMARKET_SESSION_TOKEN not set - the trade feed may withhold data without a session"
    );
  }

  if (env.MAX_TRADES <= 0) {
    errors.push(`MAX_TRADES must be positive, got: ${env.MAX_TRADES}`);
  }

  if (env.TRADE_PAGE_SIZE <= 0) {
    errors.push(`TRADE_PAGE_SIZE must be positive, got: ${env.TRADE_PAGE_SIZE}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Load and validate the environment
 *
 * @throws ConfigurationError listing every problem
 */
export function initializeEnv(source: EnvSource = process.env, log: Logger = rootLogger): Env {
  const env = loadEnv(source);

  if (!env.isTest) {
    logConfig(env, log);
  }

  const validation = validateEnv(env);

  for (const warning of validation.warnings) {
    log.warn(warning);
  }

  if (!validation.valid) {
    throw new ConfigurationError(
      `Environment validation failed with ${validation.errors.length} error(s): ${validation.errors.join("; ")}`,
      validation.errors
    );
  }

  return env;
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  redactSecret,
  getEnvVarAsNumber,
  getEnvVarAsInteger,
  getEnvVarAsBoolean,
  getEnvVarAsList,
};
