/**
 * Polygon RPC Client
 *
 * Read-only historical state queries against a Polygon node:
 * - ERC-20 balance at a block (USDC by default)
 * - Account nonce at a block (prior-activity count)
 * - Multiple RPC endpoints for failover
 * - Retry with exponential backoff
 */

import {
  createPublicClient,
  erc20Abi,
  getAddress,
  http,
  isAddress,
  type Address,
  type Chain,
  type HttpTransport,
  type PublicClient,
} from "viem";
import { polygon } from "viem/chains";

import { type Logger, serviceLoggers } from "../../utils/logger";
import {
  type ClientStats,
  type EndpointHealth,
  type PolygonClientConfig,
  type RpcEndpointConfig,
  PolygonClientError,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

/** USDC (PoS, 6 decimals) on Polygon */
export const POLYGON_USDC_ADDRESS: Address = "0x2791Bca1f2de4661ED88A30C99A7a9449Aa84174";
export const POLYGON_USDC_DECIMALS = 6;

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY = 1000;

/** Consecutive failures before an endpoint is marked unhealthy */
const UNHEALTHY_AFTER_FAILURES = 3;

// ============================================================================
// PolygonClient Class
// ============================================================================

/**
 * Polygon RPC client with multi-endpoint failover
 */
export class PolygonClient {
  private readonly chain: Chain;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly logger: Logger;
  private readonly endpoints: RpcEndpointConfig[];
  private readonly endpointHealth: Map<string, EndpointHealth> = new Map();
  private activeEndpointIndex = 0;
  private client: PublicClient<HttpTransport, Chain> | null = null;

  private stats = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    retries: 0,
    endpointSwitches: 0,
  };

  constructor(config: PolygonClientConfig = {}) {
    this.chain = config.chain ?? polygon;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelay = config.retryDelay ?? DEFAULT_RETRY_DELAY;
    this.logger = config.logger ?? serviceLoggers.chain;

    this.endpoints = (config.rpcEndpoints ?? [])
      .filter((e) => e.enabled !== false)
      .sort((a, b) => (a.priority ?? 100) - (b.priority ?? 100));

    if (this.endpoints.length === 0) {
      throw new PolygonClientError("No RPC endpoints configured", "CONNECTION_FAILED");
    }

    for (const endpoint of this.endpoints) {
      this.endpointHealth.set(endpoint.url, {
        url: endpoint.url,
        name: endpoint.name,
        isHealthy: true,
        consecutiveFailures: 0,
        totalRequests: 0,
        successfulRequests: 0,
      });
    }
  }

  // ==========================================================================
  // Public API - Blockchain Queries
  // ==========================================================================

  async getBlockNumber(): Promise<bigint> {
    return this.executeWithRetry(() => this.getClient().getBlockNumber());
  }

  /**
   * Transaction count (nonce) of an address as of a block
   */
  async getTransactionCount(address: string, blockNumber?: bigint): Promise<number> {
    const account = this.checkedAddress(address);
    if (blockNumber !== undefined && blockNumber < 0n) {
      throw new PolygonClientError(`Invalid block: ${blockNumber}`, "INVALID_BLOCK");
    }

    return this.executeWithRetry(() =>
      this.getClient().getTransactionCount({ address: account, blockNumber })
    );
  }

  /**
   * ERC-20 balance (raw units) of `holder` as of a block
   */
  async getTokenBalance(token: string, holder: string, blockNumber?: bigint): Promise<bigint> {
    const tokenAddress = this.checkedAddress(token);
    const holderAddress = this.checkedAddress(holder);

    return this.executeWithRetry(() =>
      this.getClient().readContract({
        address: tokenAddress,
        abi: erc20Abi,
        functionName: "balanceOf",
        args: [holderAddress],
        blockNumber,
      })
    );
  }

  // ==========================================================================
  // Public API - Health and Statistics
  // ==========================================================================

  getStats(): ClientStats {
    return {
      ...this.stats,
      activeEndpoint: this.getActiveEndpoint()?.url,
      endpointHealth: Array.from(this.endpointHealth.values()),
    };
  }

  getActiveEndpoint(): RpcEndpointConfig | undefined {
    return this.endpoints[this.activeEndpointIndex];
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private checkedAddress(address: string): Address {
    if (!isAddress(address, { strict: false })) {
      throw new PolygonClientError(`Invalid address: ${address}`, "INVALID_ADDRESS");
    }
    return getAddress(address);
  }

  /**
   * The viem client for the active endpoint, created on first use
   */
  private getClient(): PublicClient<HttpTransport, Chain> {
    if (this.client) {
      return this.client;
    }

    const endpoint = this.getActiveEndpoint();
    if (!endpoint) {
      throw new PolygonClientError("No RPC endpoints available", "ALL_ENDPOINTS_FAILED");
    }

    this.logger.debug("Creating RPC client", { endpoint: endpoint.name ?? endpoint.url });
    this.client = createPublicClient({
      chain: this.chain,
      transport: http(endpoint.url, { timeout: endpoint.timeout ?? this.timeout }),
    });
    return this.client;
  }

  /**
   * Execute a request with retry logic and endpoint failover
   */
  private async executeWithRetry<T>(fn: () => Promise<T>): Promise<T> {
    let lastError: Error | undefined;
    let retriesRemaining = this.maxRetries;

    this.stats.totalRequests++;

    while (retriesRemaining >= 0) {
      const health = this.activeHealth();
      try {
        const result = await fn();

        this.stats.successfulRequests++;
        if (health) {
          health.totalRequests++;
          health.successfulRequests++;
          health.isHealthy = true;
          health.consecutiveFailures = 0;
        }
        return result;
      } catch (error) {
        if (error instanceof PolygonClientError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));

        if (health) {
          health.totalRequests++;
          health.consecutiveFailures++;
          health.lastError = lastError;
          if (health.consecutiveFailures >= UNHEALTHY_AFTER_FAILURES) {
            health.isHealthy = false;
          }
        }

        if (this.shouldSwitchEndpoint(lastError) && this.switchEndpoint()) {
          this.stats.endpointSwitches++;
        }

        retriesRemaining--;
        if (retriesRemaining >= 0) {
          this.stats.retries++;
          const delay = this.retryDelay * Math.pow(2, this.maxRetries - retriesRemaining - 1);
          this.logger.debug("Retrying RPC request", {
            delayMs: delay,
            retriesRemaining,
            error: lastError.message,
          });
          await this.sleep(delay);
        }
      }
    }

    this.stats.failedRequests++;

    throw new PolygonClientError(
      `Request failed after ${this.maxRetries} retries: ${lastError?.message}`,
      "ALL_ENDPOINTS_FAILED",
      { cause: lastError, endpoint: this.getActiveEndpoint()?.url }
    );
  }

  private activeHealth(): EndpointHealth | undefined {
    const endpoint = this.getActiveEndpoint();
    return endpoint ? this.endpointHealth.get(endpoint.url) : undefined;
  }

  private shouldSwitchEndpoint(error: Error): boolean {
    const errorMessage = error.message.toLowerCase();
    return (
      errorMessage.includes("timeout") ||
      errorMessage.includes("rate limit") ||
      errorMessage.includes("429") ||
      errorMessage.includes("503") ||
      errorMessage.includes("502") ||
      errorMessage.includes("connection refused") ||
      errorMessage.includes("network error")
    );
  }

  /**
   * Move to the next healthy endpoint; false when there is none
   */
  private switchEndpoint(): boolean {
    for (let i = 1; i < this.endpoints.length; i++) {
      const nextIndex = (this.activeEndpointIndex + i) % this.endpoints.length;
      const next = this.endpoints[nextIndex];
      const health = next ? this.endpointHealth.get(next.url) : undefined;

      if (next && health?.isHealthy) {
        this.activeEndpointIndex = nextIndex;
        this.client = null;
        this.logger.info("Switching RPC endpoint", { endpoint: next.name ?? next.url });
        return true;
      }
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createPolygonClient(config?: PolygonClientConfig): PolygonClient {
  return new PolygonClient(config);
}
