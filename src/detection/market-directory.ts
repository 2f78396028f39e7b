/**
 * Market metadata lookup used for insider-risk classification.
 *
 * Implementations are best-effort and never throw: when a lookup is
 * inconclusive they fall back to what the trade itself carried, then to the
 * placeholder "unknown".
 */

import type { MarketDescription, TradeEvent } from "./types";

export const UNKNOWN_MARKET_TEXT = "unknown";

/** What the trade already says about its market */
export interface MarketHint {
  title: string;
  description: string;
  category: string | null;
  slug: string | null;
}

export interface MarketDirectory {
  describe(marketId: string, hint?: MarketHint): Promise<MarketDescription>;
}

export function hintForEvent(event: TradeEvent): MarketHint {
  return {
    title: event.marketTitle,
    description: event.marketDescription,
    category: event.category,
    slug: event.marketSlug,
  };
}

/**
 * Description built from the trade's own fields
 */
export function describeFromHint(hint: MarketHint | undefined): MarketDescription {
  const title = hint?.title.trim() ?? "";
  const description = hint?.description.trim() ?? "";
  const parts = description && description !== title ? [title, description] : [title];
  const text = parts.filter((part) => part !== "").join(" ");

  return {
    text: text || UNKNOWN_MARKET_TEXT,
    category: hint?.category ?? null,
    title: title || UNKNOWN_MARKET_TEXT,
    slug: hint?.slug ?? null,
  };
}

/**
 * Offline directory: describes a market from the trade hint alone
 */
export class HintMarketDirectory implements MarketDirectory {
  async describe(_marketId: string, hint?: MarketHint): Promise<MarketDescription> {
    return describeFromHint(hint);
  }
}
