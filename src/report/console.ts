/**
 * Console rendering of a screening report
 *
 * STRONG signals get the full detail block, MEDIUM a compact two-line entry
 * and WEAK only a count (the exports hold the rest).
 */

import type { ScoredWallet, SignalTier } from "../detection/types";
import type { ScreeningReport } from "../services/screening-run";
import { marketUrl, transactionUrl } from "./links";

const RULE = "=".repeat(70);
const MARKET_NAME_WIDTH = 60;

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatUsd(value: number): string {
  return usd.format(value);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function shortAddress(address: string): string {
  return `${address.slice(0, 10)}...`;
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width)}...` : text;
}

function byTier(wallets: readonly ScoredWallet[], tier: SignalTier): ScoredWallet[] {
  return wallets.filter((wallet) => wallet.tier === tier);
}

function renderStrong(wallet: ScoredWallet, position: number): string[] {
  const { firstAction, market } = wallet;
  const lines = [
    `${position}. ${wallet.wallet}`,
    `   Balance: ${formatUsd(wallet.balance)} | Conviction: ${formatPercent(wallet.convictionRatio)} | Insider Score: ${wallet.insiderScore.toFixed(2)}`,
    `   Bet ${formatUsd(firstAction.amount)} on ${firstAction.timestamp.toISOString().slice(0, 10)}`,
    `   Market: ${market.title}`,
    `   Category: ${market.category ?? "unknown"} | Risk: ${wallet.insiderRisk}`,
  ];
  if (wallet.riskKeywords.length > 0) {
    lines.push(`   Risk keywords: ${wallet.riskKeywords.join(", ")}`);
  }
  if (wallet.clusterId) {
    lines.push(`   WARNING: part of coordinated entry ${wallet.clusterId}`);
  }
  const url = marketUrl(market.slug);
  if (url) {
    lines.push(`   Market: ${url}`);
  }
  lines.push(`   Tx: ${transactionUrl(firstAction.txHash)}`);
  return lines;
}

function renderMedium(wallet: ScoredWallet, position: number): string[] {
  const cluster = wallet.clusterId ? ` | ${wallet.clusterId}` : "";
  return [
    `${position}. ${shortAddress(wallet.wallet)} ${formatUsd(wallet.balance)} | Conviction: ${formatPercent(wallet.convictionRatio)}${cluster}`,
    `   ${formatUsd(wallet.firstAction.amount)} on ${truncate(wallet.market.title, MARKET_NAME_WIDTH)}`,
  ];
}

/**
 * Render the report as console lines (no trailing newline)
 */
export function renderConsoleReport(report: ScreeningReport): string {
  const { stats, wallets } = report;
  const lines: string[] = [
    RULE,
    "FRESH WALLET SCREENING REPORT",
    `Evaluated at ${report.evaluatedAt.toISOString()} | Lookback: ${report.config.lookbackDays} days`,
    RULE,
    `Trades fetched: ${stats.tradesFetched} (${stats.pagesFetched} pages, ${stats.failedPages} failed)`,
    `Events: ${stats.eventsNormalized} normalized, ${stats.dropped} dropped, ${stats.duplicates} duplicates, ${stats.outsideWindow} outside window`,
    `Wallets: ${stats.walletsGrouped} grouped, ${stats.prefilterRejected} prefiltered, ${stats.walletsEvaluated} evaluated, ${stats.oracleFailures} lookup failures`,
    `Clusters: ${stats.clustersFound}`,
    `Signals: ${stats.qualified.STRONG} strong, ${stats.qualified.MEDIUM} medium, ${stats.qualified.WEAK} weak`,
  ];

  if (wallets.length === 0) {
    lines.push("", "No qualifying signals found in the lookback period.");
    return lines.join("\n");
  }

  const strong = byTier(wallets, "STRONG");
  if (strong.length > 0) {
    lines.push("", `STRONG SIGNALS (${strong.length})`, "-".repeat(70));
    strong.forEach((wallet, index) => lines.push(...renderStrong(wallet, index + 1), ""));
  }

  const medium = byTier(wallets, "MEDIUM");
  if (medium.length > 0) {
    lines.push("", `MEDIUM SIGNALS (${medium.length})`, "-".repeat(70));
    medium.forEach((wallet, index) => lines.push(...renderMedium(wallet, index + 1)));
  }

  const weak = byTier(wallets, "WEAK");
  if (weak.length > 0) {
    lines.push("", `WEAK SIGNALS (${weak.length})`, "   See CSV for details");
  }

  return lines.join("\n");
}
