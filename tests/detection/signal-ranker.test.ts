/**
 * Tests for signal ordering
 */
import { describe, it, expect } from "vitest";

import { compareScoredWallets, rankScoredWallets } from "../../src/detection/signal-ranker";
import type { ScoredWallet, SignalTier } from "../../src/detection/types";
import { WALLET_A, WALLET_B, WALLET_C, WALLET_D, makeEvent } from "../helpers/fixtures";

function scored(wallet: string, tier: SignalTier, insiderScore: number, convictionRatio: number): ScoredWallet {
  return {
    wallet,
    balance: 100000,
    firstAction: makeEvent({ wallet }),
    market: { text: "unknown", category: null, title: "unknown", slug: null },
    tradeCount: 1,
    convictionRatio,
    insiderScore,
    scoreBreakdown: { freshness: 0, conviction: 0, marketRisk: 0, cluster: 0 },
    insiderRisk: "LOW",
    riskKeywords: [],
    clusterId: null,
    priorActivityCount: 0,
    tier,
    tierReason: "BALANCE_AND_MARGIN",
  };
}

describe("rankScoredWallets", () => {
  it("orders by tier, then score, then conviction", () => {
    const wallets = [
      scored(WALLET_A, "WEAK", 0.9, 0.9),
      scored(WALLET_B, "MEDIUM", 0.3, 0.1),
      scored(WALLET_C, "MEDIUM", 0.3, 0.4),
      scored(WALLET_D, "STRONG", 0.1, 0.1),
    ];

    expect(rankScoredWallets(wallets).map((w) => w.wallet)).toEqual([
      WALLET_D,
      WALLET_C,
      WALLET_B,
      WALLET_A,
    ]);
  });

  it("keeps input order on full ties and leaves the input untouched", () => {
    const wallets = [scored(WALLET_B, "WEAK", 0.2, 0.1), scored(WALLET_A, "WEAK", 0.2, 0.1)];

    const ranked = rankScoredWallets(wallets);

    expect(ranked.map((w) => w.wallet)).toEqual([WALLET_B, WALLET_A]);
    expect(ranked).not.toBe(wallets);
  });

  it("compares equal wallets as zero", () => {
    const wallet = scored(WALLET_A, "STRONG", 0.5, 0.5);

    expect(compareScoredWallets(wallet, wallet)).toBe(0);
  });
});
