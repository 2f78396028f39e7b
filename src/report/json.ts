/**
 * JSON export
 *
 * The document carries every field the console and CSV views show plus the
 * run statistics, clusters and the configuration in effect. `parseJsonReport`
 * reads a document back into a ScreeningReport with the same tiers, scores
 * and order. Timestamps are ISO strings and block numbers decimal strings.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { EntryCluster } from "../detection/entry-cluster-detector";
import { type ScreeningConfig, createScreeningConfig } from "../detection/screening-config";
import { normalizeTradeRecord } from "../detection/trade-normalizer";
import type {
  InsiderRiskTier,
  MarketDescription,
  ScoreBreakdown,
  ScoredWallet,
  SignalTier,
  TierReason,
  TradeEvent,
} from "../detection/types";
import type { RunStats, ScreeningReport } from "../services/screening-run";
import { DataShapeError } from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import { marketUrl, transactionUrl } from "./links";

export const JSON_REPORT_VERSION = 1;

const SIGNAL_TIERS: readonly SignalTier[] = ["STRONG", "MEDIUM", "WEAK"];
const RISK_TIERS: readonly InsiderRiskTier[] = ["LOW", "MEDIUM", "HIGH"];
const TIER_REASONS: readonly TierReason[] = [
  "CONVICTION_HIGH_RISK",
  "CONVICTION",
  "INSIDER_SCORE",
  "BALANCE_AND_MARGIN",
];

export class ReportFormatError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid report at ${path}: ${message}`);
    this.name = "ReportFormatError";
    this.path = path;
  }
}

// ============================================================================
// Serialization
// ============================================================================

function serializeTradeEvent(event: TradeEvent): Record<string, unknown> {
  return {
    wallet: event.wallet,
    marketId: event.marketId,
    amount: event.amount,
    price: event.price,
    timestamp: event.timestamp.toISOString(),
    txHash: event.txHash,
    marketTitle: event.marketTitle,
    marketDescription: event.marketDescription,
    marketSlug: event.marketSlug,
    category: event.category,
    outcome: event.outcome,
    side: event.side,
    role: event.role,
    blockNumber: event.blockNumber === null ? null : event.blockNumber.toString(),
    explorerUrl: transactionUrl(event.txHash),
  };
}

function serializeWallet(wallet: ScoredWallet, index: number): Record<string, unknown> {
  return {
    rank: index + 1,
    wallet: wallet.wallet,
    tier: wallet.tier,
    tierReason: wallet.tierReason,
    insiderScore: wallet.insiderScore,
    scoreBreakdown: { ...wallet.scoreBreakdown },
    convictionRatio: wallet.convictionRatio,
    balance: wallet.balance,
    tradeCount: wallet.tradeCount,
    priorActivityCount: wallet.priorActivityCount,
    clusterId: wallet.clusterId,
    insiderRisk: wallet.insiderRisk,
    riskKeywords: [...wallet.riskKeywords],
    market: { ...wallet.market, url: marketUrl(wallet.market.slug) },
    firstAction: serializeTradeEvent(wallet.firstAction),
  };
}

function serializeCluster(cluster: EntryCluster): Record<string, unknown> {
  return {
    id: cluster.id,
    marketId: cluster.marketId,
    wallets: [...cluster.wallets],
    startedAt: cluster.startedAt.toISOString(),
    endedAt: cluster.endedAt.toISOString(),
  };
}

/**
 * Plain-JSON view of a report
 */
export function toJsonReport(report: ScreeningReport): Record<string, unknown> {
  return {
    version: JSON_REPORT_VERSION,
    evaluatedAt: report.evaluatedAt.toISOString(),
    config: { ...report.config, insiderRiskKeywords: [...report.config.insiderRiskKeywords] },
    stats: { ...report.stats, qualified: { ...report.stats.qualified } },
    clusters: report.clusters.map(serializeCluster),
    wallets: report.wallets.map(serializeWallet),
  };
}

export function serializeReport(report: ScreeningReport): string {
  return `${JSON.stringify(toJsonReport(report), null, 2)}\n`;
}

export async function writeJsonReport(
  path: string,
  report: ScreeningReport,
  log: Logger = serviceLoggers.report
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeReport(report), "utf8");
  log.info("JSON report written", { path, wallets: report.wallets.length });
}

// ============================================================================
// Parsing
// ============================================================================

type JsonRecord = Record<string, unknown>;

function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): JsonRecord {
  if (!isJsonRecord(value)) {
    throw new ReportFormatError(path, "expected an object");
  }
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ReportFormatError(path, "expected an array");
  }
  return value;
}

function expectNumber(record: JsonRecord, key: string, path: string): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ReportFormatError(`${path}.${key}`, "expected a number");
  }
  return value;
}

function expectBoolean(record: JsonRecord, key: string, path: string): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    throw new ReportFormatError(`${path}.${key}`, "expected a boolean");
  }
  return value;
}

function expectString(record: JsonRecord, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new ReportFormatError(`${path}.${key}`, "expected a string");
  }
  return value;
}

function expectNullableString(record: JsonRecord, key: string, path: string): string | null {
  const value = record[key];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== "string") {
    throw new ReportFormatError(`${path}.${key}`, "expected a string or null");
  }
  return value;
}

function expectStringArray(record: JsonRecord, key: string, path: string): string[] {
  return expectArray(record[key], `${path}.${key}`).map((item, index) => {
    if (typeof item !== "string") {
      throw new ReportFormatError(`${path}.${key}[${index}]`, "expected a string");
    }
    return item;
  });
}

function expectDate(record: JsonRecord, key: string, path: string): Date {
  const date = new Date(expectString(record, key, path));
  if (Number.isNaN(date.getTime())) {
    throw new ReportFormatError(`${path}.${key}`, "expected an ISO timestamp");
  }
  return date;
}

function expectOneOf<T extends string>(
  record: JsonRecord,
  key: string,
  allowed: readonly T[],
  path: string
): T {
  const value = record[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ReportFormatError(`${path}.${key}`, `expected one of ${allowed.join(", ")}`);
  }
  return match;
}

function parseConfig(value: unknown): ScreeningConfig {
  const path = "config";
  const record = expectRecord(value, path);
  return createScreeningConfig({
    lookbackDays: expectNumber(record, "lookbackDays", path),
    minBetAmount: expectNumber(record, "minBetAmount", path),
    secondaryBetAmount: expectNumber(record, "secondaryBetAmount", path),
    prefilterBalanceMultiplier: expectNumber(record, "prefilterBalanceMultiplier", path),
    minEstimatedConviction: expectNumber(record, "minEstimatedConviction", path),
    minBetMargin: expectNumber(record, "minBetMargin", path),
    minWalletBalance: expectNumber(record, "minWalletBalance", path),
    convictionThreshold: expectNumber(record, "convictionThreshold", path),
    minBalanceForConviction: expectNumber(record, "minBalanceForConviction", path),
    mediumScoreThreshold: expectNumber(record, "mediumScoreThreshold", path),
    minClusterSize: expectNumber(record, "minClusterSize", path),
    clusterWindowDays: expectNumber(record, "clusterWindowDays", path),
    freshMaxPriorTx: expectNumber(record, "freshMaxPriorTx", path),
    requireFreshWallet: expectBoolean(record, "requireFreshWallet", path),
    checkPriorTrades: expectBoolean(record, "checkPriorTrades", path),
    insiderRiskKeywords: expectStringArray(record, "insiderRiskKeywords", path),
  });
}

function parseStats(value: unknown): RunStats {
  const path = "stats";
  const record = expectRecord(value, path);
  const qualified = expectRecord(record.qualified, `${path}.qualified`);
  return {
    walletsGrouped: expectNumber(record, "walletsGrouped", path),
    prefilterRejected: expectNumber(record, "prefilterRejected", path),
    walletsEvaluated: expectNumber(record, "walletsEvaluated", path),
    oracleFailures: expectNumber(record, "oracleFailures", path),
    rejected: expectNumber(record, "rejected", path),
    qualified: {
      STRONG: expectNumber(qualified, "STRONG", `${path}.qualified`),
      MEDIUM: expectNumber(qualified, "MEDIUM", `${path}.qualified`),
      WEAK: expectNumber(qualified, "WEAK", `${path}.qualified`),
    },
    clustersFound: expectNumber(record, "clustersFound", path),
    tradesFetched: expectNumber(record, "tradesFetched", path),
    pagesFetched: expectNumber(record, "pagesFetched", path),
    failedPages: expectNumber(record, "failedPages", path),
    eventsNormalized: expectNumber(record, "eventsNormalized", path),
    dropped: expectNumber(record, "dropped", path),
    duplicates: expectNumber(record, "duplicates", path),
    outsideWindow: expectNumber(record, "outsideWindow", path),
  };
}

function parseCluster(value: unknown, index: number): EntryCluster {
  const path = `clusters[${index}]`;
  const record = expectRecord(value, path);
  return {
    id: expectString(record, "id", path),
    marketId: expectString(record, "marketId", path),
    wallets: expectStringArray(record, "wallets", path),
    startedAt: expectDate(record, "startedAt", path),
    endedAt: expectDate(record, "endedAt", path),
  };
}

function parseMarket(value: unknown, path: string): MarketDescription {
  const record = expectRecord(value, path);
  return {
    text: expectString(record, "text", path),
    category: expectNullableString(record, "category", path),
    title: expectString(record, "title", path),
    slug: expectNullableString(record, "slug", path),
  };
}

function parseBreakdown(value: unknown, path: string): ScoreBreakdown {
  const record = expectRecord(value, path);
  return {
    freshness: expectNumber(record, "freshness", path),
    conviction: expectNumber(record, "conviction", path),
    marketRisk: expectNumber(record, "marketRisk", path),
    cluster: expectNumber(record, "cluster", path),
  };
}

function parseFirstAction(value: unknown, path: string): TradeEvent {
  const event = normalizeTradeRecord(expectRecord(value, path));
  if (event instanceof DataShapeError) {
    throw new ReportFormatError(path, event.message);
  }
  return event;
}

function parseWallet(value: unknown, index: number): ScoredWallet {
  const path = `wallets[${index}]`;
  const record = expectRecord(value, path);
  return Object.freeze({
    wallet: expectString(record, "wallet", path),
    balance: expectNumber(record, "balance", path),
    firstAction: parseFirstAction(record.firstAction, `${path}.firstAction`),
    market: parseMarket(record.market, `${path}.market`),
    tradeCount: expectNumber(record, "tradeCount", path),
    convictionRatio: expectNumber(record, "convictionRatio", path),
    insiderScore: expectNumber(record, "insiderScore", path),
    scoreBreakdown: parseBreakdown(record.scoreBreakdown, `${path}.scoreBreakdown`),
    insiderRisk: expectOneOf(record, "insiderRisk", RISK_TIERS, path),
    riskKeywords: expectStringArray(record, "riskKeywords", path),
    clusterId: expectNullableString(record, "clusterId", path),
    priorActivityCount: expectNumber(record, "priorActivityCount", path),
    tier: expectOneOf(record, "tier", SIGNAL_TIERS, path),
    tierReason: expectOneOf(record, "tierReason", TIER_REASONS, path),
  });
}

/**
 * Read a JSON export back into a report. Wallet order is the document order.
 *
 * @throws ReportFormatError on malformed documents
 */
export function parseJsonReport(text: string): ScreeningReport {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ReportFormatError("$", error instanceof Error ? error.message : String(error));
  }

  const root = expectRecord(document, "$");
  const version = expectNumber(root, "version", "$");
  if (version !== JSON_REPORT_VERSION) {
    throw new ReportFormatError("$.version", `unsupported version ${version}`);
  }

  return {
    evaluatedAt: expectDate(root, "evaluatedAt", "$"),
    config: parseConfig(root.config),
    stats: parseStats(root.stats),
    clusters: expectArray(root.clusters, "clusters").map(parseCluster),
    wallets: expectArray(root.wallets, "wallets").map(parseWallet),
  };
}
