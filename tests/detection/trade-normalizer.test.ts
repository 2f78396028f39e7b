/**
 * Tests for trade record normalization
 */
import { describe, it, expect } from "vitest";

import {
  canonicalWallet,
  classifyRawRecord,
  normalizeTradeBatch,
  normalizeTradeRecord,
} from "../../src/detection/trade-normalizer";
import type { TradeEvent } from "../../src/detection/types";
import { DataShapeError } from "../../src/utils/errors";
import { WALLET_A, WALLET_B, silentLogger, txHash } from "../helpers/fixtures";

const CHECKSUMMED = "0xAbCdEf0123456789aBcDeF0123456789AbCdEf01";

function expectEvent(value: unknown): TradeEvent {
  const result = normalizeTradeRecord(value);
  if (result instanceof DataShapeError) {
    throw new Error(`expected an event, got ${result.reason}`);
  }
  return result;
}

function dataApiTrade(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    proxyWallet: CHECKSUMMED,
    side: "BUY",
    asset: "1234",
    conditionId: "0xcondition",
    size: 2000,
    price: 0.4,
    timestamp: 1717200000,
    title: "Will the merger close?",
    slug: "merger-close",
    eventSlug: "merger-2024",
    outcome: "Yes",
    transactionHash: txHash(1),
    ...overrides,
  };
}

describe("classifyRawRecord", () => {
  it("recognises each supported shape", () => {
    const shapes = [
      [dataApiTrade(), "data-api"],
      [{ taker_address: WALLET_A, match_time: "1717200000" }, "clob"],
      [{ taker: WALLET_A, cash: 10 }, "activity"],
      [{ from: WALLET_A, hash: txHash(2), timeStamp: "1717200000" }, "transfer"],
      [{ wallet: WALLET_A, txHash: txHash(3) }, "canonical"],
    ] as const;

    for (const [record, source] of shapes) {
      const raw = classifyRawRecord(record);
      expect(raw instanceof DataShapeError ? raw.reason : raw.source).toBe(source);
    }
  });

  it("rejects non-objects and unknown shapes", () => {
    const notObject = classifyRawRecord("trade");
    const unknown = classifyRawRecord({ id: 1 });

    expect(notObject instanceof DataShapeError && notObject.reason).toBe("NOT_AN_OBJECT");
    expect(unknown instanceof DataShapeError && unknown.reason).toBe("UNKNOWN_SHAPE");
  });
});

describe("canonicalWallet", () => {
  it("lower-cases valid addresses", () => {
    expect(canonicalWallet(CHECKSUMMED)).toBe(CHECKSUMMED.toLowerCase());
  });

  it("returns null for invalid input", () => {
    expect(canonicalWallet(undefined)).toBeNull();
    expect(canonicalWallet("0x1234")).toBeNull();
    expect(canonicalWallet("not-an-address")).toBeNull();
  });
});

describe("normalizeTradeRecord", () => {
  it("normalizes a Data API trade", () => {
    const event = expectEvent(dataApiTrade());

    expect(event).toEqual({
      wallet: CHECKSUMMED.toLowerCase(),
      marketId: "0xcondition",
      amount: 800,
      price: 0.4,
      timestamp: new Date("2024-06-01T00:00:00Z"),
      txHash: txHash(1),
      marketDescription: "Will the merger close?",
      marketTitle: "Will the merger close?",
      marketSlug: "merger-2024",
      category: null,
      outcome: "Yes",
      side: "BUY",
      role: "user",
      blockNumber: null,
    });
  });

  it("prefers the USDC size over size times price", () => {
    expect(expectEvent(dataApiTrade({ usdcSize: 750 })).amount).toBe(750);
  });

  it("drops out-of-range prices", () => {
    expect(expectEvent(dataApiTrade({ price: 1.5, usdcSize: 100 })).price).toBeNull();
  });

  it("normalizes a CLOB trade from the maker side", () => {
    const event = expectEvent({
      maker_address: WALLET_B,
      transaction_hash: txHash(4),
      match_time: "2024-06-01T00:00:00",
      size: "100",
      price: "0.25",
      asset_id: "token-9",
      side: "sell",
    });

    expect(event.wallet).toBe(WALLET_B);
    expect(event.role).toBe("maker");
    expect(event.amount).toBe(25);
    expect(event.marketId).toBe("token-9");
    expect(event.side).toBe("SELL");
    expect(event.timestamp.toISOString()).toBe("2024-06-01T00:00:00.000Z");
  });

  it("reads nested market metadata from activity records", () => {
    const event = expectEvent({
      user: WALLET_A,
      transactionHash: txHash(5),
      blockNumber: "55000000",
      timestamp: 1717200000000,
      cash: "1500.5",
      market: {
        conditionId: "0xmarket",
        question: "Who wins the Oscar?",
        description: "Resolves to the Best Picture winner",
        category: "Culture",
        slug: "oscar-best-picture",
      },
    });

    expect(event.marketId).toBe("0xmarket");
    expect(event.marketTitle).toBe("Who wins the Oscar?");
    expect(event.marketDescription).toBe("Resolves to the Best Picture winner");
    expect(event.category).toBe("Culture");
    expect(event.amount).toBe(1500.5);
    expect(event.blockNumber).toBe(55000000n);
    expect(event.timestamp.toISOString()).toBe("2024-06-01T00:00:00.000Z");
  });

  it("converts transfer values with the token decimals", () => {
    const event = expectEvent({
      from: CHECKSUMMED,
      to: "0x4BFB41D5B3570DEFD03C39A9A4D8DE6BD8B8982E",
      hash: txHash(6),
      blockNumber: "100",
      timeStamp: "1717200000",
      value: "2500000000",
      tokenDecimal: "6",
    });

    expect(event.amount).toBe(2500);
    expect(event.role).toBe("sender");
    expect(event.marketId).toBe("0x4bfb41d5b3570defd03c39a9a4d8de6bd8b8982e");
    expect(event.marketTitle).toBe("");
    expect(event.price).toBeNull();
  });

  it("reports the missing field", () => {
    const cases = [
      [dataApiTrade({ proxyWallet: "" }), "MISSING_WALLET"],
      [dataApiTrade({ proxyWallet: "0x12" }), "INVALID_WALLET"],
      [dataApiTrade({ transactionHash: undefined }), "MISSING_TX_ID"],
      [dataApiTrade({ timestamp: "soon" }), "MISSING_TIMESTAMP"],
      [dataApiTrade({ size: undefined }), "MISSING_AMOUNT"],
      [dataApiTrade({ usdcSize: -5 }), "NEGATIVE_AMOUNT"],
    ] as const;

    for (const [record, reason] of cases) {
      const result = normalizeTradeRecord(record);
      expect(result instanceof DataShapeError ? result.reason : "event").toBe(reason);
    }
  });

  it("defaults the market to unknown", () => {
    const event = expectEvent({ taker: WALLET_A, hash: txHash(7), timestamp: 1717200000, cash: 10 });

    expect(event.marketId).toBe("unknown");
  });

  it("is idempotent on its own output", () => {
    const once = expectEvent(dataApiTrade());
    const twice = expectEvent(once);

    expect(twice).toEqual(once);
  });

  it("returns frozen events", () => {
    expect(Object.isFrozen(expectEvent(dataApiTrade()))).toBe(true);
  });
});

describe("normalizeTradeBatch", () => {
  it("keeps the first occurrence of each transaction", () => {
    const batch = normalizeTradeBatch(
      [
        dataApiTrade({ usdcSize: 100 }),
        dataApiTrade({ usdcSize: 200 }),
        dataApiTrade({ transactionHash: txHash(2) }),
      ],
      { logger: silentLogger }
    );

    expect(batch.events.map((e) => e.amount)).toEqual([100, 800]);
    expect(batch.duplicates).toBe(1);
    expect(batch.dropped).toBe(0);
  });

  it("counts dropped records by reason", () => {
    const batch = normalizeTradeBatch(
      [null, { id: 1 }, dataApiTrade({ timestamp: null }), dataApiTrade()],
      { logger: silentLogger }
    );

    expect(batch.events).toHaveLength(1);
    expect(batch.dropped).toBe(3);
    expect(batch.dropReasons).toEqual({
      NOT_AN_OBJECT: 1,
      UNKNOWN_SHAPE: 1,
      MISSING_TIMESTAMP: 1,
    });
  });
});
