/**
 * Block Explorer API
 *
 * Polygonscan queries through the Etherscan V2 multichain endpoint.
 * Used to resolve a timestamp to the last block mined at or before it, so
 * that historical state can be read for trades that carry no block number.
 *
 * Features:
 * - Retry logic with exponential backoff
 * - Rate limiting awareness
 */

import { type Logger, serviceLoggers } from "../../utils/logger";
import { type PolygonscanConfig, PolygonscanError } from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Etherscan V2 multichain API */
export const DEFAULT_POLYGONSCAN_BASE_URL = "https://api.etherscan.io/v2/api";

export const POLYGON_CHAIN_ID = 137;

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY = 1000;

// ============================================================================
// Types for Raw API Responses
// ============================================================================

interface PolygonscanApiResponse {
  status: string;
  message: string;
  result: unknown;
}

function isApiResponse(value: unknown): value is PolygonscanApiResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "string" &&
    "result" in value
  );
}

export type BlockClosest = "before" | "after";

// ============================================================================
// Polygonscan Client Class
// ============================================================================

/**
 * Client for the Polygonscan (Etherscan V2) API
 */
export class PolygonscanClient {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly chainId: number;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly logger: Logger;

  constructor(config: PolygonscanConfig = {}) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULT_POLYGONSCAN_BASE_URL;
    this.chainId = config.chainId ?? POLYGON_CHAIN_ID;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelay = config.retryDelay ?? DEFAULT_RETRY_DELAY;
    this.logger = config.logger ?? serviceLoggers.chain;
  }

  /**
   * Block number closest to a point in time
   *
   * @param closest - "before": last block at or before `at` (default)
   */
  async getBlockNumberByTime(at: Date, closest: BlockClosest = "before"): Promise<bigint> {
    const params = new URLSearchParams({
      module: "block",
      action: "getblocknobytime",
      timestamp: String(Math.floor(at.getTime() / 1000)),
      closest,
    });

    const result = await this.executeWithRetry(params);

    if (typeof result === "string" && /^\d+$/.test(result)) {
      return BigInt(result);
    }
    if (typeof result === "object" && result !== null && "blockNumber" in result) {
      const blockNumber = result.blockNumber;
      if (typeof blockNumber === "string" && /^\d+$/.test(blockNumber)) {
        return BigInt(blockNumber);
      }
    }

    throw new PolygonscanError(
      `Unexpected getblocknobytime result: ${JSON.stringify(result)}`,
      "INVALID_RESPONSE"
    );
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private buildUrl(params: URLSearchParams): string {
    const query = new URLSearchParams({ chainid: String(this.chainId) });
    for (const [key, value] of params) {
      query.set(key, value);
    }
    if (this.apiKey) {
      query.set("apikey", this.apiKey);
    }
    return `${this.baseUrl}?${query.toString()}`;
  }

  /**
   * Execute API request with retry logic, returning the `result` field
   */
  private async executeWithRetry(params: URLSearchParams): Promise<unknown> {
    let lastError: Error | undefined;
    let retriesRemaining = this.maxRetries;

    while (retriesRemaining >= 0) {
      try {
        const response = await this.fetchWithTimeout(this.buildUrl(params));

        if (!response.ok) {
          throw new PolygonscanError(
            `HTTP error: ${response.status} ${response.statusText}`,
            "HTTP_ERROR",
            { statusCode: response.status }
          );
        }

        const data: unknown = await response.json();
        if (!isApiResponse(data)) {
          throw new PolygonscanError("Response is not an explorer API envelope", "INVALID_RESPONSE");
        }

        if (data.status === "0") {
          const detail = typeof data.result === "string" ? data.result : data.message;
          if (detail.toLowerCase().includes("rate limit")) {
            throw new PolygonscanError("Rate limit exceeded", "RATE_LIMIT");
          }
          throw new PolygonscanError(detail, "API_ERROR");
        }

        return data.result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        // Client errors other than rate limiting will not improve on retry
        if (
          error instanceof PolygonscanError &&
          (error.code === "API_ERROR" ||
            error.code === "INVALID_RESPONSE" ||
            (error.statusCode !== undefined &&
              error.statusCode >= 400 &&
              error.statusCode < 500 &&
              error.statusCode !== 429))
        ) {
          throw error;
        }

        retriesRemaining--;

        if (retriesRemaining >= 0) {
          const delay = this.retryDelay * Math.pow(2, this.maxRetries - retriesRemaining - 1);
          this.logger.debug("Retrying explorer request", {
            action: params.get("action"),
            delayMs: delay,
            error: lastError.message,
          });
          await this.sleep(delay);
        }
      }
    }

    const rateLimited = lastError instanceof PolygonscanError && lastError.code === "RATE_LIMIT";
    throw new PolygonscanError(
      `Request failed after ${this.maxRetries} retries: ${lastError?.message}`,
      rateLimited ? "RATE_LIMIT" : "MAX_RETRIES_EXCEEDED",
      { cause: lastError }
    );
  }

  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        signal: controller.signal,
        headers: {
          Accept: "application/json",
        },
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
