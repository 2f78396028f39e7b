/**
 * Wallet Screening Engine
 *
 * Per-wallet state machine:
 *
 *   Ungrouped → HasFirstAction → CheapPrefilterPassed → BalanceFetched
 *             → Scored → Qualified(tier) | Rejected
 *
 * The oracle is consulted only for wallets that survive the in-memory
 * prefilter. Wallets are evaluated one at a time; a failed lookup (oracle or
 * trade history) skips that wallet and never aborts the run.
 */

import { ConfigurationError, OracleError, TransportError, describeError } from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import { daysBetween } from "../utils/time";
import type { BalanceOracle } from "./balance-oracle";
import { type EntryCluster, detectEntryClusters } from "./entry-cluster-detector";
import { HintMarketDirectory, type MarketDirectory, hintForEvent } from "./market-directory";
import { MarketRiskClassifier } from "./market-risk-classifier";
import type { ScreeningConfig } from "./screening-config";
import { rankScoredWallets } from "./signal-ranker";
import type { TradeHistory } from "./trade-history";
import {
  type InsiderRiskTier,
  type ScoreBreakdown,
  type ScoredWallet,
  type ScreeningStats,
  type SignalTier,
  type TierReason,
  type TradeEvent,
  referenceForEvent,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

export const FRESHNESS_RECENT_DAYS = 7;
export const FRESHNESS_MONTH_DAYS = 30;
export const HIGH_CONVICTION_RATIO = 0.25;
export const MODERATE_CONVICTION_RATIO = 0.1;

/** Prior trades are looked up strictly before the first action */
export const PRIOR_TRADE_OFFSET_MS = 1000;

export const SCORE_BONUS = {
  freshRecent: 0.3,
  freshMonth: 0.15,
  convictionHigh: 0.3,
  convictionModerate: 0.15,
  riskHigh: 0.3,
  riskMedium: 0.15,
  cluster: 0.1,
} as const;

// ============================================================================
// Grouping
// ============================================================================

/**
 * Group events by wallet. Map order is first-appearance order; each history
 * is sorted ascending by time, ties keeping input order.
 */
export function groupByWallet(events: readonly TradeEvent[]): Map<string, TradeEvent[]> {
  const histories = new Map<string, TradeEvent[]>();
  for (const event of events) {
    const history = histories.get(event.wallet);
    if (history) {
      history.push(event);
    } else {
      histories.set(event.wallet, [event]);
    }
  }
  for (const history of histories.values()) {
    history.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
  return histories;
}

// ============================================================================
// Rules
// ============================================================================

export type PrefilterRejection = "BELOW_MIN_BET" | "LOW_ESTIMATED_CONVICTION";

/**
 * Cheap prefilter on the first action's amount, no external calls.
 *
 * The estimated conviction divides the amount by a placeholder balance of
 * `amount × prefilterBalanceMultiplier`.
 */
export function cheapPrefilter(amount: number, config: ScreeningConfig): PrefilterRejection | null {
  if (amount < config.minBetAmount) {
    return "BELOW_MIN_BET";
  }
  if (amount < config.secondaryBetAmount) {
    const placeholderBalance = amount * config.prefilterBalanceMultiplier;
    const estimated = placeholderBalance > 0 ? amount / placeholderBalance : 0;
    if (estimated < config.minEstimatedConviction) {
      return "LOW_ESTIMATED_CONVICTION";
    }
  }
  return null;
}

/**
 * amount ÷ balance, or 0 when the balance is below the conviction minimum
 */
export function computeConvictionRatio(
  amount: number,
  balance: number,
  minBalanceForConviction: number
): number {
  if (balance < minBalanceForConviction || balance <= 0) {
    return 0;
  }
  return amount / balance;
}

export interface InsiderScoreInput {
  firstActionAt: Date;
  now: Date;
  convictionRatio: number;
  insiderRisk: InsiderRiskTier;
  inCluster: boolean;
}

/**
 * Sum of four bonuses, clamped to [0, 1] and rounded to 4 decimals
 */
export function computeInsiderScore(input: InsiderScoreInput): {
  score: number;
  breakdown: ScoreBreakdown;
} {
  const ageDays = daysBetween(input.firstActionAt, input.now);
  const breakdown: ScoreBreakdown = {
    freshness:
      ageDays <= FRESHNESS_RECENT_DAYS
        ? SCORE_BONUS.freshRecent
        : ageDays <= FRESHNESS_MONTH_DAYS
          ? SCORE_BONUS.freshMonth
          : 0,
    conviction:
      input.convictionRatio >= HIGH_CONVICTION_RATIO
        ? SCORE_BONUS.convictionHigh
        : input.convictionRatio >= MODERATE_CONVICTION_RATIO
          ? SCORE_BONUS.convictionModerate
          : 0,
    marketRisk:
      input.insiderRisk === "HIGH"
        ? SCORE_BONUS.riskHigh
        : input.insiderRisk === "MEDIUM"
          ? SCORE_BONUS.riskMedium
          : 0,
    cluster: input.inCluster ? SCORE_BONUS.cluster : 0,
  };

  const total =
    breakdown.freshness + breakdown.conviction + breakdown.marketRisk + breakdown.cluster;
  const score = Math.min(Math.max(Math.round(total * 10000) / 10000, 0), 1);

  return { score, breakdown };
}

export interface TierInput {
  convictionRatio: number;
  insiderRisk: InsiderRiskTier;
  insiderScore: number;
  balance: number;
  amount: number;
}

/**
 * Tier in strict priority order; null means rejected
 */
export function assignTier(
  input: TierInput,
  config: ScreeningConfig
): { tier: SignalTier; reason: TierReason } | null {
  const convicted = input.convictionRatio >= config.convictionThreshold;

  if (convicted && input.insiderRisk === "HIGH") {
    return { tier: "STRONG", reason: "CONVICTION_HIGH_RISK" };
  }
  if (convicted) {
    return { tier: "MEDIUM", reason: "CONVICTION" };
  }
  if (input.insiderScore >= config.mediumScoreThreshold) {
    return { tier: "MEDIUM", reason: "INSIDER_SCORE" };
  }
  if (input.balance >= config.minWalletBalance && input.amount >= config.minBetMargin) {
    return { tier: "WEAK", reason: "BALANCE_AND_MARGIN" };
  }
  return null;
}

// ============================================================================
// Engine
// ============================================================================

export interface WalletScreenerOptions {
  config: ScreeningConfig;
  oracle: BalanceOracle;
  /** Market metadata source (default: the trade's own fields) */
  markets?: MarketDirectory;
  /** Required when `config.checkPriorTrades` is set */
  tradeHistory?: TradeHistory;
  classifier?: MarketRiskClassifier;
  logger?: Logger;
}

export interface ScreeningOutcome {
  /** Qualified wallets, ranked */
  wallets: ScoredWallet[];
  stats: ScreeningStats;
  clusters: EntryCluster[];
}

export class WalletScreener {
  private readonly config: ScreeningConfig;
  private readonly oracle: BalanceOracle;
  private readonly markets: MarketDirectory;
  private readonly tradeHistory: TradeHistory | null;
  private readonly classifier: MarketRiskClassifier;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when prior-trade checks are on without a trade history
   */
  constructor(options: WalletScreenerOptions) {
    if (options.config.checkPriorTrades && !options.tradeHistory) {
      throw new ConfigurationError("checkPriorTrades requires a trade history source");
    }
    this.config = options.config;
    this.oracle = options.oracle;
    this.markets = options.markets ?? new HintMarketDirectory();
    this.tradeHistory = options.tradeHistory ?? null;
    this.classifier = options.classifier ?? new MarketRiskClassifier(options.config.insiderRiskKeywords);
    this.logger = options.logger ?? serviceLoggers.screener;
  }

  /**
   * Screen one window of normalized events
   *
   * @param now - Evaluation instant for freshness scoring
   */
  async screen(events: readonly TradeEvent[], now: Date): Promise<ScreeningOutcome> {
    const stats: ScreeningStats = {
      walletsGrouped: 0,
      prefilterRejected: 0,
      walletsEvaluated: 0,
      oracleFailures: 0,
      rejected: 0,
      qualified: { STRONG: 0, MEDIUM: 0, WEAK: 0 },
      clustersFound: 0,
    };

    const histories = groupByWallet(events);
    stats.walletsGrouped = histories.size;

    const candidates = new Map<string, TradeEvent>();
    for (const [wallet, history] of histories) {
      const firstAction = history[0];
      if (!firstAction) {
        continue;
      }
      if (cheapPrefilter(firstAction.amount, this.config) !== null) {
        stats.prefilterRejected++;
        continue;
      }
      candidates.set(wallet, firstAction);
    }

    const { assignments, clusters } = detectEntryClusters(candidates, this.config);
    stats.clustersFound = clusters.length;

    const scored: ScoredWallet[] = [];
    for (const [wallet, firstAction] of candidates) {
      const result = await this.evaluate(wallet, firstAction, {
        tradeCount: histories.get(wallet)?.length ?? 1,
        clusterId: assignments.get(wallet) ?? null,
        now,
        stats,
      });
      if (result) {
        scored.push(result);
        stats.qualified[result.tier]++;
      }
    }

    this.logger.info("Screening complete", {
      events: events.length,
      walletsGrouped: stats.walletsGrouped,
      prefilterRejected: stats.prefilterRejected,
      walletsEvaluated: stats.walletsEvaluated,
      oracleFailures: stats.oracleFailures,
      qualified: scored.length,
      clusters: stats.clustersFound,
    });

    return { wallets: rankScoredWallets(scored), stats, clusters };
  }

  private async evaluate(
    wallet: string,
    firstAction: TradeEvent,
    context: { tradeCount: number; clusterId: string | null; now: Date; stats: ScreeningStats }
  ): Promise<ScoredWallet | null> {
    const { stats } = context;
    const reference = referenceForEvent(firstAction);
    stats.walletsEvaluated++;

    let balance: number;
    try {
      balance = await this.oracle.balance(wallet, reference);
    } catch (error) {
      this.handleLookupFailure(error, wallet, "balance", stats);
      return null;
    }

    const convictionRatio = computeConvictionRatio(
      firstAction.amount,
      balance,
      this.config.minBalanceForConviction
    );

    if (
      convictionRatio < this.config.convictionThreshold &&
      balance < this.config.minWalletBalance
    ) {
      stats.rejected++;
      return null;
    }

    let priorActivityCount: number;
    try {
      priorActivityCount = await this.oracle.priorActivityCount(wallet, reference);
    } catch (error) {
      this.handleLookupFailure(error, wallet, "priorActivityCount", stats);
      return null;
    }

    if (this.config.requireFreshWallet && priorActivityCount > this.config.freshMaxPriorTx) {
      stats.rejected++;
      return null;
    }

    if (this.config.checkPriorTrades && this.tradeHistory) {
      const before = new Date(firstAction.timestamp.getTime() - PRIOR_TRADE_OFFSET_MS);
      let tradedBefore: boolean;
      try {
        tradedBefore = await this.tradeHistory.hasPriorTrade(wallet, before);
      } catch (error) {
        this.handleLookupFailure(error, wallet, "priorTrade", stats);
        return null;
      }
      if (tradedBefore) {
        stats.rejected++;
        return null;
      }
    }

    const market = await this.markets.describe(firstAction.marketId, hintForEvent(firstAction));
    const risk = this.classifier.classify(firstAction.marketId, market.text, market.category);

    const { score, breakdown } = computeInsiderScore({
      firstActionAt: firstAction.timestamp,
      now: context.now,
      convictionRatio,
      insiderRisk: risk.tier,
      inCluster: context.clusterId !== null,
    });

    const tier = assignTier(
      {
        convictionRatio,
        insiderRisk: risk.tier,
        insiderScore: score,
        balance,
        amount: firstAction.amount,
      },
      this.config
    );
    if (!tier) {
      stats.rejected++;
      return null;
    }

    return Object.freeze({
      wallet,
      balance,
      firstAction,
      market,
      tradeCount: context.tradeCount,
      convictionRatio,
      insiderScore: score,
      scoreBreakdown: breakdown,
      insiderRisk: risk.tier,
      riskKeywords: risk.matchedKeywords,
      clusterId: context.clusterId,
      priorActivityCount,
      tier: tier.tier,
      tierReason: tier.reason,
    });
  }

  private handleLookupFailure(
    error: unknown,
    wallet: string,
    operation: OracleError["operation"],
    stats: ScreeningStats
  ): void {
    const failure =
      error instanceof TransportError
        ? error
        : new OracleError(`${operation} lookup failed for ${wallet}: ${describeError(error)}`, "UNREACHABLE", {
            wallet,
            operation,
            source: "unknown",
            cause: error,
          });
    stats.oracleFailures++;
    this.logger.warn("Skipping wallet after lookup failure", {
      wallet,
      operation,
      code: failure.code,
      source: failure.source,
      error: describeError(failure),
    });
  }
}
