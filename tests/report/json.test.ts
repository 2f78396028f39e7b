/**
 * Tests for the JSON export and its reader
 */
import { describe, it, expect } from "vitest";

import { ReportFormatError, parseJsonReport, serializeReport, toJsonReport } from "../../src/report";
import { STRONG_WALLET, makeReport } from "../helpers/report";

describe("toJsonReport", () => {
  it("writes links, ISO timestamps and decimal block numbers", () => {
    const document = toJsonReport(makeReport([STRONG_WALLET]));
    const wallets = document.wallets;

    expect(document.version).toBe(1);
    expect(document.evaluatedAt).toBe("2024-07-16T00:00:00.000Z");
    expect(Array.isArray(wallets) ? wallets[0] : undefined).toMatchObject({
      rank: 1,
      tier: "STRONG",
      insiderScore: 0.6,
      market: { url: "https://polymarket.com/event/token-launch" },
      firstAction: {
        timestamp: "2024-06-01T00:00:00.000Z",
        blockNumber: "57000000",
        explorerUrl: `https://polygonscan.com/tx/${STRONG_WALLET.firstAction.txHash}`,
      },
    });
  });

  it("serializes to parseable JSON", () => {
    expect(() => JSON.parse(serializeReport(makeReport()))).not.toThrow();
  });
});

describe("parseJsonReport", () => {
  it("reads back the same report", () => {
    const report = makeReport();

    const parsed = parseJsonReport(serializeReport(report));

    expect(parsed).toEqual(report);
    expect(parsed.wallets.map((w) => [w.wallet, w.tier, w.insiderScore])).toEqual(
      report.wallets.map((w) => [w.wallet, w.tier, w.insiderScore])
    );
  });

  it("rejects invalid JSON", () => {
    expect(() => parseJsonReport("{")).toThrow(ReportFormatError);
  });

  it("rejects unsupported versions", () => {
    expect(() => parseJsonReport(JSON.stringify({ version: 2 }))).toThrow(
      "Invalid report at $.version: unsupported version 2"
    );
  });

  it("rejects unknown tiers", () => {
    const text = serializeReport(makeReport([STRONG_WALLET])).replace('"tier": "STRONG"', '"tier": "HUGE"');

    expect(() => parseJsonReport(text)).toThrow(
      "Invalid report at wallets[0].tier: expected one of STRONG, MEDIUM, WEAK"
    );
  });
});
