/**
 * Shared types for the wallet screening core
 */

// ============================================================================
// Trade events
// ============================================================================

/** How the wallet took part in the trade it was attributed to */
export type TradeRole = "taker" | "maker" | "user" | "sender";

export type TradeSide = "BUY" | "SELL";

/**
 * Canonical trade record produced by the normalizer. Immutable.
 *
 * Invariants: `wallet` and `txHash` are non-empty, `amount >= 0`,
 * `price` is in [0, 1] or null when unknown.
 */
export interface TradeEvent {
  /** Lower-cased 0x address */
  readonly wallet: string;
  /** Condition ID, asset ID or market title, whichever the source provides */
  readonly marketId: string;
  /** Amount at risk in USD */
  readonly amount: number;
  readonly price: number | null;
  readonly timestamp: Date;
  /** Unique per event; used for deduplication */
  readonly txHash: string;
  /** Free-form description used for insider-risk classification */
  readonly marketDescription: string;
  readonly marketTitle: string;
  readonly marketSlug: string | null;
  readonly category: string | null;
  readonly outcome: string | null;
  readonly side: TradeSide | null;
  readonly role: TradeRole;
  readonly blockNumber: bigint | null;
}

// ============================================================================
// Historical references (oracle inputs)
// ============================================================================

export type HistoricalReference =
  | { readonly kind: "block"; readonly blockNumber: bigint }
  | { readonly kind: "time"; readonly at: Date };

/**
 * Reference point for a trade: its block when known, its timestamp otherwise
 */
export function referenceForEvent(event: TradeEvent): HistoricalReference {
  if (event.blockNumber !== null) {
    return { kind: "block", blockNumber: event.blockNumber };
  }
  return { kind: "time", at: event.timestamp };
}

export function describeReference(reference: HistoricalReference): string {
  return reference.kind === "block"
    ? `block:${reference.blockNumber.toString()}`
    : `time:${reference.at.toISOString()}`;
}

// ============================================================================
// Market metadata
// ============================================================================

export interface MarketDescription {
  /** Text used for insider-risk classification ("unknown" when nothing is known) */
  text: string;
  category: string | null;
  title: string;
  slug: string | null;
}

// ============================================================================
// Classification
// ============================================================================

export type InsiderRiskTier = "LOW" | "MEDIUM" | "HIGH";

export interface InsiderRiskAssessment {
  tier: InsiderRiskTier;
  matchCount: number;
  /** Keywords that matched, in keyword-list order */
  matchedKeywords: string[];
}

export type SignalTier = "STRONG" | "MEDIUM" | "WEAK";

export const SIGNAL_TIER_RANK: Record<SignalTier, number> = {
  STRONG: 3,
  MEDIUM: 2,
  WEAK: 1,
};

/**
 * Why a tier was assigned, in priority order
 */
export type TierReason =
  | "CONVICTION_HIGH_RISK"
  | "CONVICTION"
  | "INSIDER_SCORE"
  | "BALANCE_AND_MARGIN";

export interface ScoreBreakdown {
  freshness: number;
  conviction: number;
  marketRisk: number;
  cluster: number;
}

/**
 * Terminal output of the screening engine, one per qualified wallet
 */
export interface ScoredWallet {
  readonly wallet: string;
  /** Stable-asset balance at the first action's reference point */
  readonly balance: number;
  readonly firstAction: TradeEvent;
  readonly market: MarketDescription;
  /** Trades by this wallet inside the fetched window */
  readonly tradeCount: number;
  /** amount / balance, 0 when balance is below the conviction minimum */
  readonly convictionRatio: number;
  /** In [0, 1] */
  readonly insiderScore: number;
  readonly scoreBreakdown: ScoreBreakdown;
  readonly insiderRisk: InsiderRiskTier;
  readonly riskKeywords: string[];
  readonly clusterId: string | null;
  readonly priorActivityCount: number;
  readonly tier: SignalTier;
  readonly tierReason: TierReason;
}

// ============================================================================
// Run statistics
// ============================================================================

export type TierCounts = Record<SignalTier, number>;

export interface ScreeningStats {
  /** Wallets that entered the per-wallet state machine */
  walletsGrouped: number;
  /** Wallets rejected before any external call */
  prefilterRejected: number;
  /** Wallets that reached the balance lookup */
  walletsEvaluated: number;
  /** Wallets skipped because an oracle call failed */
  oracleFailures: number;
  /** Wallets rejected by the balance gate, the freshness gate or tiering */
  rejected: number;
  qualified: TierCounts;
  clustersFound: number;
}
