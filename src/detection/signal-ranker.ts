/**
 * Signal Ranker
 *
 * Orders qualified wallets by tier (STRONG > MEDIUM > WEAK), then insider
 * score, then conviction ratio, all descending. The sort is stable, so full
 * ties keep wallet iteration order.
 */

import { SIGNAL_TIER_RANK, type ScoredWallet } from "./types";

export function compareScoredWallets(a: ScoredWallet, b: ScoredWallet): number {
  return (
    SIGNAL_TIER_RANK[b.tier] - SIGNAL_TIER_RANK[a.tier] ||
    b.insiderScore - a.insiderScore ||
    b.convictionRatio - a.convictionRatio
  );
}

/**
 * Ranked copy; the input is left untouched
 */
export function rankScoredWallets(wallets: readonly ScoredWallet[]): ScoredWallet[] {
  return [...wallets].sort(compareScoredWallets);
}
