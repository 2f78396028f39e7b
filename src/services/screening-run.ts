/**
 * Screening Run Service
 *
 * One batch invocation of the pipeline:
 * 1. Fetch the trade window (Data API)
 * 2. Normalize and deduplicate records, drop events outside the window
 * 3. Screen wallets (prefilter → oracle → risk → clusters → tiers)
 * 4. Hand back a ScreeningReport for rendering/export
 */

import type { Env } from "../../config/env";
import { PolygonClient, PolygonscanClient, type RpcEndpointConfig } from "../api/chain";
import { DataApiClient, DataApiException, fetchTradeWindow } from "../api/data";
import type { TradeWindowOptions, TradeWindowResult } from "../api/data";
import { GammaMarketDirectory, GammaClient } from "../api/gamma";
import { type BalanceOracle, ChainBalanceOracle } from "../detection/balance-oracle";
import type { EntryCluster } from "../detection/entry-cluster-detector";
import type { MarketDirectory } from "../detection/market-directory";
import type { ScreeningConfig } from "../detection/screening-config";
import { DataApiTradeHistory, type TradeHistory } from "../detection/trade-history";
import { normalizeTradeBatch } from "../detection/trade-normalizer";
import type { ScoredWallet, ScreeningStats } from "../detection/types";
import { WalletScreener } from "../detection/wallet-screener";
import { ConfigurationError } from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import { DAY_MS } from "../utils/time";

// ============================================================================
// Types
// ============================================================================

/** Source of raw trade records for one window */
export type TradeSource = (options: TradeWindowOptions) => Promise<TradeWindowResult>;

export interface ScreeningRunDependencies {
  trades: TradeSource;
  oracle: BalanceOracle;
  markets?: MarketDirectory;
  /** Needed when `config.checkPriorTrades` is set */
  tradeHistory?: TradeHistory;
}

export interface ScreeningRunOptions {
  config: ScreeningConfig;
  /** Evaluation instant; also the end of the trade window (default: now) */
  now?: Date;
  maxTrades?: number;
  pageSize?: number;
  logger?: Logger;
}

export interface RunStats extends ScreeningStats {
  /** Raw records read from the trade source */
  tradesFetched: number;
  pagesFetched: number;
  failedPages: number;
  /** Events that survived normalization and deduplication */
  eventsNormalized: number;
  dropped: number;
  duplicates: number;
  /** Events older than the lookback window */
  outsideWindow: number;
}

export interface ScreeningReport {
  /** Qualified wallets, ranked */
  wallets: ScoredWallet[];
  stats: RunStats;
  clusters: EntryCluster[];
  evaluatedAt: Date;
  config: ScreeningConfig;
}

// ============================================================================
// Run
// ============================================================================

/**
 * Run the pipeline once
 *
 * @throws ConfigurationError when prior-trade checks are on without a trade
 * history, or when the trade feed withholds data for lack of a session; every
 * other upstream failure is absorbed and counted
 */
export async function runScreening(
  deps: ScreeningRunDependencies,
  options: ScreeningRunOptions
): Promise<ScreeningReport> {
  const log = options.logger ?? serviceLoggers.screener;
  const now = options.now ?? new Date();
  const { config } = options;

  const screener = new WalletScreener({
    config,
    oracle: deps.oracle,
    markets: deps.markets,
    tradeHistory: deps.tradeHistory,
    logger: log,
  });

  let window: TradeWindowResult;
  try {
    window = await deps.trades({
      lookbackDays: config.lookbackDays,
      now,
      maxTrades: options.maxTrades,
      pageSize: options.pageSize,
    });
  } catch (error) {
    if (error instanceof DataApiException && error.code === "EMPTY_PAYLOAD") {
      throw new ConfigurationError(error.message);
    }
    throw error;
  }

  const batch = normalizeTradeBatch(window.records);

  const since = now.getTime() - config.lookbackDays * DAY_MS;
  const inWindow = batch.events.filter((event) => event.timestamp.getTime() >= since);
  const outsideWindow = batch.events.length - inWindow.length;

  log.info("Trade window ready", {
    fetched: window.records.length,
    normalized: batch.events.length,
    dropped: batch.dropped,
    duplicates: batch.duplicates,
    outsideWindow,
    failedPages: window.failedPages,
  });

  const outcome = await screener.screen(inWindow, now);

  return {
    wallets: outcome.wallets,
    clusters: outcome.clusters,
    stats: {
      ...outcome.stats,
      tradesFetched: window.records.length,
      pagesFetched: window.pagesFetched,
      failedPages: window.failedPages,
      eventsNormalized: batch.events.length,
      dropped: batch.dropped,
      duplicates: batch.duplicates,
      outsideWindow,
    },
    evaluatedAt: now,
    config,
  };
}

// ============================================================================
// Live wiring
// ============================================================================

/**
 * Build the network-backed collaborators from a validated environment
 *
 * @throws ConfigurationError when a required endpoint or credential is missing
 */
export function createLiveDependencies(env: Env): ScreeningRunDependencies {
  if (!env.POLYGON_RPC_URL) {
    throw new ConfigurationError("POLYGON_RPC_URL is required");
  }
  if (!env.POLYGONSCAN_API_KEY) {
    throw new ConfigurationError("POLYGONSCAN_API_KEY is required");
  }

  const rpcEndpoints: RpcEndpointConfig[] = [
    { url: env.POLYGON_RPC_URL, name: "primary", priority: 1 },
    ...env.POLYGON_RPC_FALLBACK_URLS.map((url, index) => ({
      url,
      name: `fallback-${index + 1}`,
      priority: index + 2,
    })),
  ];

  const dataClient = new DataApiClient({
    baseUrl: env.DATA_API_URL,
    sessionToken: env.POLYMARKET_SESSION_TOKEN,
  });

  return {
    trades: (options) => fetchTradeWindow({ ...options, client: dataClient }),
    oracle: new ChainBalanceOracle({
      rpc: new PolygonClient({ rpcEndpoints }),
      explorer: new PolygonscanClient({
        apiKey: env.POLYGONSCAN_API_KEY,
        baseUrl: env.POLYGONSCAN_API_URL,
      }),
    }),
    markets: new GammaMarketDirectory({
      client: new GammaClient({ baseUrl: env.GAMMA_API_URL }),
    }),
    tradeHistory: new DataApiTradeHistory({ client: dataClient }),
  };
}
