/**
 * Trade History
 *
 * Answers whether a wallet traded on the market venue before a given
 * instant. The screener uses it to tell a wallet's true first trade from
 * its first trade inside the fetched window. Answers are memoized for the
 * run; failures surface as OracleError so the wallet is skipped.
 */

import { DataApiClient, DataApiException, hasTradeBefore } from "../api/data";
import { OracleError, type TransportErrorCode, describeError } from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import { RunCache } from "../utils/run-cache";

export interface TradeHistory {
  /**
   * @throws OracleError when the lookup fails
   */
  hasPriorTrade(wallet: string, before: Date): Promise<boolean>;
}

function transportCodeFor(error: unknown): TransportErrorCode {
  if (!(error instanceof DataApiException)) {
    return "UNREACHABLE";
  }
  if (error.code === "INVALID_JSON" || error.code === "EMPTY_PAYLOAD") {
    return "MALFORMED";
  }
  return error.statusCode === 429 ? "RATE_LIMITED" : "UNREACHABLE";
}

export interface DataApiTradeHistoryOptions {
  client?: DataApiClient;
  logger?: Logger;
}

/**
 * Trade history read from the Data API activity feed
 */
export class DataApiTradeHistory implements TradeHistory {
  private readonly client: DataApiClient;
  private readonly logger: Logger;
  private readonly answers = new RunCache<{ wallet: string; before: Date }, boolean>(
    ({ wallet, before }) => `${wallet.toLowerCase()}|${before.toISOString()}`
  );

  constructor(options: DataApiTradeHistoryOptions = {}) {
    this.client = options.client ?? new DataApiClient();
    this.logger = options.logger ?? serviceLoggers.trades;
  }

  async hasPriorTrade(wallet: string, before: Date): Promise<boolean> {
    try {
      return await this.answers.getOrComputeAsync({ wallet, before }, async () => {
        const found = await hasTradeBefore(wallet, before, { client: this.client });
        this.logger.debug("Checked trade history", {
          wallet,
          before: before.toISOString(),
          found,
        });
        return found;
      });
    } catch (error) {
      throw new OracleError(
        `priorTrade lookup failed for ${wallet}: ${describeError(error)}`,
        transportCodeFor(error),
        { wallet, operation: "priorTrade", source: "data-api", cause: error }
      );
    }
  }
}
