/**
 * Tests for coordinated entry detection
 */
import { describe, it, expect } from "vitest";

import { detectEntryClusters } from "../../src/detection/entry-cluster-detector";
import { UNKNOWN_MARKET, normalizeTradeRecord } from "../../src/detection/trade-normalizer";
import type { TradeEvent } from "../../src/detection/types";
import { DataShapeError } from "../../src/utils/errors";
import { WALLET_A, WALLET_B, WALLET_C, WALLET_D, makeEvent, txHash } from "../helpers/fixtures";

const START = new Date("2024-06-01T00:00:00Z").getTime();
const DAY = 24 * 60 * 60 * 1000;
const options = { minClusterSize: 3, clusterWindowDays: 7 };

function firstActions(entries: Array<[string, number, string?]>): Map<string, TradeEvent> {
  return new Map(
    entries.map(([wallet, day, marketId]) => [
      wallet,
      makeEvent({ wallet, marketId: marketId ?? "market-1", timestamp: new Date(START + day * DAY) }),
    ])
  );
}

describe("detectEntryClusters", () => {
  it("clusters the wallets that entered within the window and leaves later ones out", () => {
    const result = detectEntryClusters(
      firstActions([
        [WALLET_A, 0],
        [WALLET_B, 2],
        [WALLET_C, 6],
        [WALLET_D, 10],
      ]),
      options
    );

    expect(result.clusters).toHaveLength(1);
    expect(result.clusters[0]?.wallets).toEqual([WALLET_A, WALLET_B, WALLET_C]);
    expect(result.clusters[0]?.startedAt).toEqual(new Date(START));
    expect(result.clusters[0]?.endedAt).toEqual(new Date(START + 6 * DAY));
    expect(result.assignments.get(WALLET_A)).toBe("cluster-1");
    expect(result.assignments.has(WALLET_D)).toBe(false);
  });

  it("includes an entry exactly one window after the first", () => {
    const result = detectEntryClusters(
      firstActions([
        [WALLET_A, 0],
        [WALLET_B, 3],
        [WALLET_C, 7],
      ]),
      options
    );

    expect(result.clusters[0]?.wallets).toEqual([WALLET_A, WALLET_B, WALLET_C]);
  });

  it("finds nothing with one wallet fewer than the minimum inside the window", () => {
    const result = detectEntryClusters(
      firstActions([
        [WALLET_A, 0],
        [WALLET_B, 2],
        [WALLET_C, 9],
      ]),
      options
    );

    expect(result.clusters).toEqual([]);
    expect(result.assignments.size).toBe(0);
  });

  it("slides the window start forward", () => {
    const result = detectEntryClusters(
      firstActions([
        [WALLET_A, 0],
        [WALLET_B, 10],
        [WALLET_C, 12],
        [WALLET_D, 15],
      ]),
      options
    );

    expect(result.clusters[0]?.wallets).toEqual([WALLET_B, WALLET_C, WALLET_D]);
  });

  it("looks at each market separately and numbers clusters in market order", () => {
    const result = detectEntryClusters(
      firstActions([
        [WALLET_A, 0, "alpha"],
        [WALLET_B, 0, "beta"],
        [WALLET_C, 1, "alpha"],
        [WALLET_D, 1, "beta"],
      ]),
      { minClusterSize: 2, clusterWindowDays: 7 }
    );

    expect(result.clusters.map((c) => [c.id, c.marketId, c.wallets])).toEqual([
      ["cluster-1", "alpha", [WALLET_A, WALLET_C]],
      ["cluster-2", "beta", [WALLET_B, WALLET_D]],
    ]);
  });

  it("keeps input order for simultaneous entries", () => {
    const result = detectEntryClusters(
      firstActions([
        [WALLET_C, 0],
        [WALLET_A, 0],
        [WALLET_B, 0],
      ]),
      options
    );

    expect(result.clusters[0]?.wallets).toEqual([WALLET_C, WALLET_A, WALLET_B]);
  });

  it("never clusters wallets whose market is unknown", () => {
    const actions = new Map<string, TradeEvent>();
    [WALLET_A, WALLET_B, WALLET_C].forEach((wallet, index) => {
      const event = normalizeTradeRecord({
        user: wallet,
        transactionHash: txHash(900 + index),
        timestamp: `2024-06-01T00:0${index}:00Z`,
        cash: 20000,
      });
      if (event instanceof DataShapeError) {
        throw event;
      }
      actions.set(wallet, event);
    });

    const result = detectEntryClusters(actions, options);

    expect([...actions.values()].map((event) => event.marketId)).toEqual([
      UNKNOWN_MARKET,
      UNKNOWN_MARKET,
      UNKNOWN_MARKET,
    ]);
    expect(result.clusters).toEqual([]);
    expect(result.assignments.size).toBe(0);
  });
});
