/**
 * CSV export: one row per qualified wallet, in rank order (RFC 4180 quoting)
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { ScoredWallet } from "../detection/types";
import { type Logger, serviceLoggers } from "../utils/logger";
import { marketUrl } from "./links";

export const CSV_HEADER = [
  "Signal Quality",
  "Address",
  "Balance (USD)",
  "Conviction %",
  "Insider Score",
  "Cluster ID",
  "First Bet Amount",
  "Market Name",
  "Market Category",
  "Insider Risk",
  "Market URL",
  "Timestamp",
  "Transaction Hash",
] as const;

const LINE_BREAK = "\r\n";

/**
 * Quote a field when it holds a comma, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function csvRow(wallet: ScoredWallet): string[] {
  return [
    wallet.tier,
    wallet.wallet,
    wallet.balance.toFixed(2),
    `${(wallet.convictionRatio * 100).toFixed(1)}%`,
    wallet.insiderScore.toFixed(2),
    wallet.clusterId ?? "",
    wallet.firstAction.amount.toFixed(2),
    wallet.market.title,
    wallet.market.category ?? "",
    wallet.insiderRisk,
    marketUrl(wallet.market.slug) ?? "",
    wallet.firstAction.timestamp.toISOString(),
    wallet.firstAction.txHash,
  ];
}

export function toCsv(wallets: readonly ScoredWallet[]): string {
  const lines = [CSV_HEADER.join(","), ...wallets.map((wallet) => csvRow(wallet).map(escapeCsvField).join(","))];
  return lines.join(LINE_BREAK) + LINE_BREAK;
}

export async function writeCsvReport(
  path: string,
  wallets: readonly ScoredWallet[],
  log: Logger = serviceLoggers.report
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, toCsv(wallets), "utf8");
  log.info("CSV report written", { path, rows: wallets.length });
}
