/**
 * Shared builders for screening tests
 */
import type { BalanceOracle } from "../../src/detection/balance-oracle";
import type { TradeHistory } from "../../src/detection/trade-history";
import type { HistoricalReference, TradeEvent } from "../../src/detection/types";
import { OracleError } from "../../src/utils/errors";
import { type Logger, createLogger } from "../../src/utils/logger";

export const WALLET_A = "0x1111111111111111111111111111111111111111";
export const WALLET_B = "0x2222222222222222222222222222222222222222";
export const WALLET_C = "0x3333333333333333333333333333333333333333";
export const WALLET_D = "0x4444444444444444444444444444444444444444";

let txCounter = 0;

export function txHash(n: number): string {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export function makeEvent(overrides: Partial<TradeEvent> = {}): TradeEvent {
  txCounter++;
  return {
    wallet: WALLET_A,
    marketId: "market-1",
    amount: 10000,
    price: 0.5,
    timestamp: new Date("2024-06-01T00:00:00Z"),
    txHash: txHash(txCounter),
    marketDescription: "Will the ceasefire hold?",
    marketTitle: "Will the ceasefire hold?",
    marketSlug: "ceasefire-hold",
    category: null,
    outcome: "Yes",
    side: "BUY",
    role: "user",
    blockNumber: null,
    ...overrides,
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

interface FakeOracleOptions {
  balances?: Record<string, number>;
  priorActivity?: Record<string, number>;
  failing?: string[];
}

/**
 * In-memory oracle recording every call
 */
export class FakeOracle implements BalanceOracle {
  readonly balanceCalls: Array<{ wallet: string; reference: HistoricalReference }> = [];
  readonly priorActivityCalls: Array<{ wallet: string; reference: HistoricalReference }> = [];

  constructor(private readonly options: FakeOracleOptions = {}) {}

  async balance(wallet: string, reference: HistoricalReference): Promise<number> {
    this.balanceCalls.push({ wallet, reference });
    if (this.options.failing?.includes(wallet)) {
      throw new OracleError(`balance lookup failed for ${wallet}`, "UNREACHABLE", {
        wallet,
        operation: "balance",
        source: "fake",
      });
    }
    return this.options.balances?.[wallet] ?? 0;
  }

  async priorActivityCount(wallet: string, reference: HistoricalReference): Promise<number> {
    this.priorActivityCalls.push({ wallet, reference });
    return this.options.priorActivity?.[wallet] ?? 0;
  }
}

/**
 * In-memory trade history recording every lookup
 */
export class FakeTradeHistory implements TradeHistory {
  readonly calls: Array<{ wallet: string; before: Date }> = [];

  constructor(private readonly options: { traded?: string[]; failing?: string[] } = {}) {}

  async hasPriorTrade(wallet: string, before: Date): Promise<boolean> {
    this.calls.push({ wallet, before });
    if (this.options.failing?.includes(wallet)) {
      throw new OracleError(`priorTrade lookup failed for ${wallet}`, "RATE_LIMITED", {
        wallet,
        operation: "priorTrade",
        source: "fake",
      });
    }
    return this.options.traded?.includes(wallet) ?? false;
  }
}
