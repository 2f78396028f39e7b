/**
 * Market Risk Classifier
 *
 * Maps a market's text and category to a coarse insider-risk tier by counting
 * insider-risk keywords (token launches, appointments, awards, M&A,
 * announcements). Matching is plain substring matching on lower-cased text.
 */

import { RunCache } from "../utils/run-cache";
import { DEFAULT_INSIDER_RISK_KEYWORDS } from "./screening-config";
import { UNKNOWN_MARKET } from "./trade-normalizer";
import type { InsiderRiskAssessment, InsiderRiskTier } from "./types";

/** Matches needed for HIGH; a single match is MEDIUM */
export const HIGH_RISK_MATCH_COUNT = 2;

function tierForMatchCount(matchCount: number): InsiderRiskTier {
  if (matchCount >= HIGH_RISK_MATCH_COUNT) {
    return "HIGH";
  }
  return matchCount === 1 ? "MEDIUM" : "LOW";
}

/**
 * Classify market text. Pure and total: any strings in, an assessment out.
 *
 * Each keyword counts once, however often it appears.
 */
export function classifyMarketRisk(
  marketText: string,
  category: string | null,
  keywords: readonly string[] = DEFAULT_INSIDER_RISK_KEYWORDS
): InsiderRiskAssessment {
  const haystack = `${marketText} ${category ?? ""}`.toLowerCase();
  const matchedKeywords = keywords.filter((keyword) => keyword !== "" && haystack.includes(keyword));

  return {
    tier: tierForMatchCount(matchedKeywords.length),
    matchCount: matchedKeywords.length,
    matchedKeywords,
  };
}

/**
 * Run-scoped classifier, memoized by market identifier.
 *
 * The first text seen for a market decides its tier for the rest of the run.
 * Events without a known market are classified on their own text, uncached.
 */
export class MarketRiskClassifier {
  private readonly cache = new RunCache<string, InsiderRiskAssessment>((marketId) => marketId);

  constructor(private readonly keywords: readonly string[] = DEFAULT_INSIDER_RISK_KEYWORDS) {}

  classify(marketId: string, marketText: string, category: string | null): InsiderRiskAssessment {
    if (marketId === UNKNOWN_MARKET) {
      return classifyMarketRisk(marketText, category, this.keywords);
    }
    return this.cache.getOrCompute(marketId, () =>
      classifyMarketRisk(marketText, category, this.keywords)
    );
  }

  getCacheStats() {
    return this.cache.getStats();
  }
}
