/**
 * Entry Cluster Detector
 *
 * Finds groups of wallets whose first action on the same market falls inside
 * one time window, flagging coordinated entry.
 *
 * Per market, events are sorted by time (stable) and each start index opens a
 * window of `clusterWindowDays`. The first window holding `minClusterSize`
 * distinct wallets becomes the market's cluster and scanning that market
 * stops. This is first-match, not a maximal or optimal clustering.
 * Events without a known market never cluster.
 */

import { DAY_MS } from "../utils/time";
import { UNKNOWN_MARKET } from "./trade-normalizer";
import type { TradeEvent } from "./types";

export interface ClusterDetectorOptions {
  minClusterSize: number;
  clusterWindowDays: number;
}

export interface EntryCluster {
  id: string;
  marketId: string;
  /** Wallets in time order */
  wallets: string[];
  startedAt: Date;
  endedAt: Date;
}

export interface ClusterDetectionResult {
  /** Wallet → cluster ID; wallets outside any cluster are absent */
  assignments: Map<string, string>;
  clusters: EntryCluster[];
}

/**
 * Detect coordinated-entry clusters.
 *
 * @param firstActions - Each wallet's first action, in wallet iteration order
 */
export function detectEntryClusters(
  firstActions: ReadonlyMap<string, TradeEvent>,
  options: ClusterDetectorOptions
): ClusterDetectionResult {
  const assignments = new Map<string, string>();
  const clusters: EntryCluster[] = [];
  const windowMs = options.clusterWindowDays * DAY_MS;

  const byMarket = new Map<string, Array<{ wallet: string; event: TradeEvent }>>();
  for (const [wallet, event] of firstActions) {
    if (event.marketId === UNKNOWN_MARKET) {
      continue;
    }
    const entries = byMarket.get(event.marketId) ?? [];
    entries.push({ wallet, event });
    byMarket.set(event.marketId, entries);
  }

  for (const [marketId, entries] of byMarket) {
    if (entries.length < options.minClusterSize) {
      continue;
    }

    // Array.prototype.sort is stable: identical timestamps keep input order
    const sorted = [...entries].sort(
      (a, b) => a.event.timestamp.getTime() - b.event.timestamp.getTime()
    );

    for (let start = 0; start < sorted.length; start++) {
      const first = sorted[start];
      if (!first) {
        continue;
      }
      const startMs = first.event.timestamp.getTime();

      const members: Array<{ wallet: string; event: TradeEvent }> = [];
      for (let j = start; j < sorted.length; j++) {
        const candidate = sorted[j];
        if (!candidate || candidate.event.timestamp.getTime() - startMs > windowMs) {
          break;
        }
        members.push(candidate);
      }

      if (members.length >= options.minClusterSize) {
        const id = `cluster-${clusters.length + 1}`;
        for (const member of members) {
          assignments.set(member.wallet, id);
        }
        const last = members[members.length - 1];
        clusters.push({
          id,
          marketId,
          wallets: members.map((member) => member.wallet),
          startedAt: first.event.timestamp,
          endedAt: last ? last.event.timestamp : first.event.timestamp,
        });
        break;
      }
    }
  }

  return { assignments, clusters };
}
