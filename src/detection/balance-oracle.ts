/**
 * Balance/History Oracle
 *
 * Answers two point-in-time questions about a wallet:
 * - its stable-asset (USDC) balance at a historical reference
 * - how many on-chain actions it sent strictly before that reference
 *
 * Both are read-only facts for a fixed reference, so results are memoized for
 * the run. Upstream failures surface as OracleError; the engine skips the
 * wallet and carries on.
 */

import { formatUnits } from "viem";

import {
  POLYGON_USDC_ADDRESS,
  POLYGON_USDC_DECIMALS,
  PolygonClientError,
  PolygonscanError,
  type PolygonClient,
  type PolygonscanClient,
} from "../api/chain";
import { OracleError, type TransportErrorCode, describeError } from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import { RunCache, type RunCacheStats } from "../utils/run-cache";
import { type HistoricalReference, describeReference } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface BalanceOracle {
  /** Stable-asset balance in USD at the reference */
  balance(wallet: string, reference: HistoricalReference): Promise<number>;

  /** Actions sent by the wallet strictly before the reference */
  priorActivityCount(wallet: string, reference: HistoricalReference): Promise<number>;
}

/** Composite cache key: one wallet at one reference point */
export interface OracleKey {
  wallet: string;
  reference: HistoricalReference;
}

export function oracleKeyId(key: OracleKey): string {
  return `${key.wallet.toLowerCase()}@${describeReference(key.reference)}`;
}

export interface ChainBalanceOracleOptions {
  rpc: Pick<PolygonClient, "getTokenBalance" | "getTransactionCount">;
  explorer: Pick<PolygonscanClient, "getBlockNumberByTime">;
  /** ERC-20 token treated as the stable asset (default: USDC on Polygon) */
  tokenAddress?: string;
  tokenDecimals?: number;
  logger?: Logger;
}

export interface BalanceOracleStats {
  balances: RunCacheStats;
  priorActivity: RunCacheStats;
  blocks: RunCacheStats;
}

// ============================================================================
// Error mapping
// ============================================================================

function transportCodeFor(error: unknown): TransportErrorCode {
  if (error instanceof PolygonClientError) {
    switch (error.code) {
      case "RATE_LIMITED":
        return "RATE_LIMITED";
      case "INVALID_RESPONSE":
      case "INVALID_ADDRESS":
      case "INVALID_BLOCK":
      case "CONTRACT_ERROR":
        return "MALFORMED";
      default:
        return "UNREACHABLE";
    }
  }
  if (error instanceof PolygonscanError) {
    switch (error.code) {
      case "RATE_LIMIT":
        return "RATE_LIMITED";
      case "INVALID_RESPONSE":
      case "API_ERROR":
        return "MALFORMED";
      default:
        return "UNREACHABLE";
    }
  }
  return "UNREACHABLE";
}

// ============================================================================
// ChainBalanceOracle
// ============================================================================

/**
 * Oracle backed by a Polygon RPC node (balances, nonces) and the block
 * explorer (timestamp → block)
 */
export class ChainBalanceOracle implements BalanceOracle {
  private readonly rpc: ChainBalanceOracleOptions["rpc"];
  private readonly explorer: ChainBalanceOracleOptions["explorer"];
  private readonly tokenAddress: string;
  private readonly tokenDecimals: number;
  private readonly logger: Logger;

  private readonly balances = new RunCache<OracleKey, number>(oracleKeyId);
  private readonly priorActivity = new RunCache<OracleKey, number>(oracleKeyId);
  private readonly blocks = new RunCache<Date, bigint>((at) => at.toISOString());

  constructor(options: ChainBalanceOracleOptions) {
    this.rpc = options.rpc;
    this.explorer = options.explorer;
    this.tokenAddress = options.tokenAddress ?? POLYGON_USDC_ADDRESS;
    this.tokenDecimals = options.tokenDecimals ?? POLYGON_USDC_DECIMALS;
    this.logger = options.logger ?? serviceLoggers.oracle;
  }

  async balance(wallet: string, reference: HistoricalReference): Promise<number> {
    return this.balances.getOrComputeAsync({ wallet, reference }, async () => {
      const blockNumber = await this.resolveBlock(wallet, reference);
      try {
        const raw = await this.rpc.getTokenBalance(this.tokenAddress, wallet, blockNumber);
        return Number(formatUnits(raw, this.tokenDecimals));
      } catch (error) {
        throw this.wrap(error, wallet, "balance", "rpc");
      }
    });
  }

  async priorActivityCount(wallet: string, reference: HistoricalReference): Promise<number> {
    return this.priorActivity.getOrComputeAsync({ wallet, reference }, async () => {
      const blockNumber = await this.resolveBlock(wallet, reference);
      if (blockNumber === 0n) {
        return 0;
      }
      try {
        // Nonce at the previous block counts sends strictly before the reference
        return await this.rpc.getTransactionCount(wallet, blockNumber - 1n);
      } catch (error) {
        throw this.wrap(error, wallet, "priorActivityCount", "rpc");
      }
    });
  }

  getStats(): BalanceOracleStats {
    return {
      balances: this.balances.getStats(),
      priorActivity: this.priorActivity.getStats(),
      blocks: this.blocks.getStats(),
    };
  }

  private async resolveBlock(wallet: string, reference: HistoricalReference): Promise<bigint> {
    if (reference.kind === "block") {
      return reference.blockNumber;
    }

    try {
      return await this.blocks.getOrComputeAsync(reference.at, async () => {
        const blockNumber = await this.explorer.getBlockNumberByTime(reference.at, "before");
        this.logger.debug("Resolved timestamp to block", {
          at: reference.at.toISOString(),
          blockNumber,
        });
        return blockNumber;
      });
    } catch (error) {
      throw this.wrap(error, wallet, "resolveBlock", "explorer");
    }
  }

  private wrap(
    error: unknown,
    wallet: string,
    operation: OracleError["operation"],
    source: string
  ): OracleError {
    if (error instanceof OracleError) {
      return error;
    }
    return new OracleError(
      `${operation} lookup failed for ${wallet}: ${describeError(error)}`,
      transportCodeFor(error),
      { wallet, operation, source, cause: error }
    );
  }
}
