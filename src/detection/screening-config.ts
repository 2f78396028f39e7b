/**
 * Screening Configuration
 *
 * Every threshold the screening core consumes, as one immutable value passed
 * into the pipeline's entry point. Nothing in src/detection reads the
 * environment; config/env.ts maps variables onto this shape at the edge.
 */

import { ConfigurationError } from "../utils/errors";

// ============================================================================
// Types
// ============================================================================

export interface ScreeningConfig {
  /** Days of trading history fetched per run */
  readonly lookbackDays: number;

  /** Absolute floor for the first action's amount (USD); cheap prefilter */
  readonly minBetAmount: number;

  /**
   * Secondary floor (USD). Below it, a wallet must also clear
   * `minEstimatedConviction` against a placeholder balance.
   */
  readonly secondaryBetAmount: number;

  /** Placeholder balance = amount × this multiplier, for the prefilter only */
  readonly prefilterBalanceMultiplier: number;

  /** Minimum estimated conviction for bets under `secondaryBetAmount` */
  readonly minEstimatedConviction: number;

  /** First-action amount needed for the WEAK tier (USD) */
  readonly minBetMargin: number;

  /** Absolute balance threshold (USD) */
  readonly minWalletBalance: number;

  /** Conviction ratio needed for STRONG/MEDIUM */
  readonly convictionThreshold: number;

  /** Below this balance the conviction ratio is defined as 0 */
  readonly minBalanceForConviction: number;

  /** Insider score needed for MEDIUM without conviction */
  readonly mediumScoreThreshold: number;

  readonly minClusterSize: number;
  readonly clusterWindowDays: number;

  /** Prior on-chain actions allowed for a wallet to count as fresh */
  readonly freshMaxPriorTx: number;

  /** Reject wallets with more than `freshMaxPriorTx` prior actions */
  readonly requireFreshWallet: boolean;

  /**
   * Ask the trade history whether the wallet traded before its first action
   * in the window, and reject it if so
   */
  readonly checkPriorTrades: boolean;

  /** Lower-case keywords that mark insider-risk-prone markets */
  readonly insiderRiskKeywords: readonly string[];
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_INSIDER_RISK_KEYWORDS: readonly string[] = Object.freeze([
  "airdrop",
  "token launch",
  "tge",
  "mainnet",
  "government",
  "appointment",
  "cabinet",
  "secretary",
  "award",
  "nobel",
  "oscar",
  "grammy",
  "merger",
  "acquisition",
  "m&a",
  "ipo",
  "announcement",
  "release date",
  "launch date",
]);

export const DEFAULT_SCREENING_CONFIG: ScreeningConfig = Object.freeze({
  lookbackDays: 7,
  minBetAmount: 1000,
  secondaryBetAmount: 5000,
  prefilterBalanceMultiplier: 10,
  minEstimatedConviction: 0.1,
  minBetMargin: 5000,
  minWalletBalance: 50000,
  convictionThreshold: 0.1,
  minBalanceForConviction: 1000,
  mediumScoreThreshold: 0.6,
  minClusterSize: 3,
  clusterWindowDays: 7,
  freshMaxPriorTx: 3,
  requireFreshWallet: false,
  checkPriorTrades: false,
  insiderRiskKeywords: DEFAULT_INSIDER_RISK_KEYWORDS,
});

// ============================================================================
// Construction & validation
// ============================================================================

/**
 * List every problem with a configuration (empty when valid)
 */
export function validateScreeningConfig(config: ScreeningConfig): string[] {
  const problems: string[] = [];

  const nonNegative: Array<keyof ScreeningConfig> = [
    "minBetAmount",
    "secondaryBetAmount",
    "minEstimatedConviction",
    "minBetMargin",
    "minWalletBalance",
    "minBalanceForConviction",
    "freshMaxPriorTx",
  ];
  for (const field of nonNegative) {
    const value = config[field];
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      problems.push(`${field} must be a non-negative number, got: ${String(value)}`);
    }
  }

  if (!(config.lookbackDays > 0)) {
    problems.push(`lookbackDays must be positive, got: ${config.lookbackDays}`);
  }
  if (!(config.prefilterBalanceMultiplier > 0)) {
    problems.push(
      `prefilterBalanceMultiplier must be positive, got: ${config.prefilterBalanceMultiplier}`
    );
  }
  if (!(config.convictionThreshold > 0 && config.convictionThreshold <= 1)) {
    problems.push(`convictionThreshold must be in (0, 1], got: ${config.convictionThreshold}`);
  }
  if (!(config.mediumScoreThreshold >= 0 && config.mediumScoreThreshold <= 1)) {
    problems.push(`mediumScoreThreshold must be in [0, 1], got: ${config.mediumScoreThreshold}`);
  }
  if (!Number.isInteger(config.minClusterSize) || config.minClusterSize < 2) {
    problems.push(`minClusterSize must be an integer >= 2, got: ${config.minClusterSize}`);
  }
  if (!(config.clusterWindowDays >= 0)) {
    problems.push(`clusterWindowDays must be non-negative, got: ${config.clusterWindowDays}`);
  }

  return problems;
}

/**
 * Build a frozen configuration from the defaults plus overrides.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function createScreeningConfig(overrides: Partial<ScreeningConfig> = {}): ScreeningConfig {
  const config: ScreeningConfig = {
    ...DEFAULT_SCREENING_CONFIG,
    ...overrides,
    insiderRiskKeywords: Object.freeze(
      (overrides.insiderRiskKeywords ?? DEFAULT_SCREENING_CONFIG.insiderRiskKeywords)
        .map((keyword) => keyword.trim().toLowerCase())
        .filter((keyword) => keyword !== "")
    ),
  };

  const problems = validateScreeningConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(
      `Invalid screening configuration: ${problems.join("; ")}`,
      problems
    );
  }

  return Object.freeze(config);
}
