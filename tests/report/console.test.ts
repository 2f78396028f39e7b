/**
 * Tests for the console report
 */
import { describe, it, expect } from "vitest";

import { formatPercent, formatUsd, renderConsoleReport } from "../../src/report";
import { MEDIUM_WALLET, STRONG_WALLET, makeReport } from "../helpers/report";

const RULE = "=".repeat(70);
const DIVIDER = "-".repeat(70);

describe("formatters", () => {
  it("formats whole dollars with grouping", () => {
    expect(formatUsd(60000)).toBe("$60,000");
    expect(formatUsd(1234.6)).toBe("$1,235");
  });

  it("formats ratios as one-decimal percentages", () => {
    expect(formatPercent(0.25)).toBe("25.0%");
    expect(formatPercent(0.1234)).toBe("12.3%");
  });
});

describe("renderConsoleReport", () => {
  it("renders every tier", () => {
    const lines = renderConsoleReport(makeReport()).split("\n");

    expect(lines).toEqual([
      RULE,
      "FRESH WALLET SCREENING REPORT",
      "Evaluated at 2024-07-16T00:00:00.000Z | Lookback: 7 days",
      RULE,
      "Trades fetched: 40 (1 pages, 0 failed)",
      "Events: 38 normalized, 1 dropped, 1 duplicates, 0 outside window",
      "Wallets: 10 grouped, 4 prefiltered, 6 evaluated, 1 lookup failures",
      "Clusters: 1",
      "Signals: 1 strong, 1 medium, 1 weak",
      "",
      "STRONG SIGNALS (1)",
      DIVIDER,
      "1. 0x1111111111111111111111111111111111111111",
      "   Balance: $60,000 | Conviction: 25.0% | Insider Score: 0.60",
      "   Bet $15,000 on 2024-06-01",
      '   Market: Token launch, "airdrop" in June?',
      "   Category: Crypto | Risk: HIGH",
      "   Risk keywords: airdrop, token launch",
      "   Market: https://polymarket.com/event/token-launch",
      `   Tx: https://polygonscan.com/tx/${STRONG_WALLET.firstAction.txHash}`,
      "",
      "",
      "MEDIUM SIGNALS (1)",
      DIVIDER,
      "1. 0x22222222... $80,000 | Conviction: 15.0% | cluster-1",
      "   $12,000 on Will the ceasefire hold?",
      "",
      "WEAK SIGNALS (1)",
      "   See CSV for details",
    ]);
  });

  it("warns about cluster membership in the strong block", () => {
    const clustered = { ...STRONG_WALLET, clusterId: "cluster-2" };

    const lines = renderConsoleReport(makeReport([clustered])).split("\n");

    expect(lines).toContain("   WARNING: part of coordinated entry cluster-2");
  });

  it("truncates long market names for medium signals", () => {
    const title = "x".repeat(65);
    const wallet = { ...MEDIUM_WALLET, market: { ...MEDIUM_WALLET.market, title } };

    const lines = renderConsoleReport(makeReport([wallet])).split("\n");

    expect(lines[lines.length - 1]).toBe(`   $12,000 on ${"x".repeat(60)}...`);
  });

  it("says so when nothing qualified", () => {
    const lines = renderConsoleReport(makeReport([])).split("\n");

    expect(lines.slice(-2)).toEqual(["", "No qualifying signals found in the lookback period."]);
  });
});
