/**
 * Wallet screening core
 */

export * from "./types";

export {
  type ScreeningConfig,
  DEFAULT_SCREENING_CONFIG,
  DEFAULT_INSIDER_RISK_KEYWORDS,
  createScreeningConfig,
  validateScreeningConfig,
} from "./screening-config";

export {
  type RawTradeRecord,
  type RawTradeSource,
  type NormalizedBatch,
  UNKNOWN_MARKET,
  canonicalWallet,
  classifyRawRecord,
  normalizeTradeRecord,
  normalizeTradeBatch,
} from "./trade-normalizer";

export {
  type BalanceOracle,
  type BalanceOracleStats,
  type ChainBalanceOracleOptions,
  type OracleKey,
  ChainBalanceOracle,
  oracleKeyId,
} from "./balance-oracle";

export {
  type MarketDirectory,
  type MarketHint,
  HintMarketDirectory,
  UNKNOWN_MARKET_TEXT,
  describeFromHint,
  hintForEvent,
} from "./market-directory";

export {
  HIGH_RISK_MATCH_COUNT,
  MarketRiskClassifier,
  classifyMarketRisk,
} from "./market-risk-classifier";

export {
  type ClusterDetectionResult,
  type ClusterDetectorOptions,
  type EntryCluster,
  detectEntryClusters,
} from "./entry-cluster-detector";

export {
  type InsiderScoreInput,
  type PrefilterRejection,
  type ScreeningOutcome,
  type TierInput,
  type WalletScreenerOptions,
  PRIOR_TRADE_OFFSET_MS,
  SCORE_BONUS,
  WalletScreener,
  assignTier,
  cheapPrefilter,
  computeConvictionRatio,
  computeInsiderScore,
  groupByWallet,
} from "./wallet-screener";

export { compareScoredWallets, rankScoredWallets } from "./signal-ranker";

export {
  type DataApiTradeHistoryOptions,
  type TradeHistory,
  DataApiTradeHistory,
} from "./trade-history";
