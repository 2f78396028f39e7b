/**
 * Polymarket Gamma API - Markets Module
 *
 * Market metadata lookup by condition ID, and the MarketDirectory the
 * screening engine uses to classify a wallet's first market.
 */

import {
  type MarketDirectory,
  type MarketHint,
  UNKNOWN_MARKET_TEXT,
  describeFromHint,
} from "../../detection/market-directory";
import type { MarketDescription } from "../../detection/types";
import { type Logger, serviceLoggers } from "../../utils/logger";
import { RunCache } from "../../utils/run-cache";
import { GammaClient } from "./client";
import type { GammaMarketSummary } from "./types";

const CONDITION_ID_PATTERN = /^0x[0-9a-fA-F]{64}$/;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: UnknownRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

export function isConditionId(value: string): boolean {
  return CONDITION_ID_PATTERN.test(value);
}

/**
 * Parse one Gamma market object; null when it has no ID
 */
export function parseGammaMarket(raw: unknown): GammaMarketSummary | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = stringField(raw, "id");
  if (!id) {
    return null;
  }

  const events = Array.isArray(raw.events) ? raw.events : [];
  const firstEvent = events.find(isRecord);

  return {
    id,
    conditionId: stringField(raw, "conditionId"),
    question: stringField(raw, "question") ?? "",
    description: stringField(raw, "description") ?? "",
    category:
      stringField(raw, "category") ?? (firstEvent ? stringField(firstEvent, "category") : null),
    slug: stringField(raw, "slug"),
    eventSlug: firstEvent ? stringField(firstEvent, "slug") : null,
  };
}

/**
 * Options for fetching a market by condition ID
 */
export interface GetMarketByConditionIdOptions {
  /**
   * Custom Gamma client to use instead of a default one.
   */
  client?: GammaClient;
}

/**
 * Fetch a market by its condition ID
 *
 * @returns The market, or null when Gamma knows no such market
 * @throws GammaApiException on transport errors
 *
 * @example
 * ```typescript
 * const market = await getMarketByConditionId("0x5f65...");
 * if (market) {
 *   console.log(market.question);
 * }
 * ```
 */
export async function getMarketByConditionId(
  conditionId: string,
  options: GetMarketByConditionIdOptions = {}
): Promise<GammaMarketSummary | null> {
  const client = options.client ?? new GammaClient();
  const payload = await client.get(`/markets?condition_ids=${encodeURIComponent(conditionId)}`);

  const list: unknown[] = Array.isArray(payload)
    ? payload
    : isRecord(payload) && Array.isArray(payload.data)
      ? payload.data
      : [];

  const wanted = conditionId.toLowerCase();
  for (const item of list) {
    const market = parseGammaMarket(item);
    if (market && market.conditionId !== null && market.conditionId.toLowerCase() === wanted) {
      return market;
    }
  }
  return null;
}

/**
 * Description used for classification: question plus description text
 */
export function describeGammaMarket(market: GammaMarketSummary, hint?: MarketHint): MarketDescription {
  const text = [market.question, market.description].filter((part) => part !== "").join(" ");
  const fallback = describeFromHint(hint);

  return {
    text: text || fallback.text,
    category: market.category ?? fallback.category,
    title: market.question || fallback.title || UNKNOWN_MARKET_TEXT,
    slug: market.eventSlug ?? market.slug ?? fallback.slug,
  };
}

export interface GammaMarketDirectoryOptions {
  client?: GammaClient;
  logger?: Logger;
}

/**
 * MarketDirectory backed by Gamma, memoized per market for the run.
 *
 * Non-condition-ID markets and failed lookups fall back to the trade hint.
 */
export class GammaMarketDirectory implements MarketDirectory {
  private readonly client: GammaClient;
  private readonly logger: Logger;
  private readonly cache = new RunCache<string, MarketDescription>((marketId) => marketId.toLowerCase());

  constructor(options: GammaMarketDirectoryOptions = {}) {
    this.client = options.client ?? new GammaClient();
    this.logger = options.logger ?? serviceLoggers.markets;
  }

  async describe(marketId: string, hint?: MarketHint): Promise<MarketDescription> {
    if (!isConditionId(marketId)) {
      return describeFromHint(hint);
    }

    return this.cache.getOrComputeAsync(marketId, async () => {
      try {
        const market = await getMarketByConditionId(marketId, { client: this.client });
        if (market) {
          return describeGammaMarket(market, hint);
        }
        this.logger.debug("Market not found in Gamma", { marketId });
      } catch (error) {
        this.logger.warn("Market lookup failed; using trade metadata", {
          marketId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return describeFromHint(hint);
    });
  }

  getCacheStats() {
    return this.cache.getStats();
  }
}
