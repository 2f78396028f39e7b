/**
 * Types for the Polygon chain layer
 *
 * RPC client (historical balance and nonce reads) and block-explorer client
 * (block-by-time resolution).
 */

import type { Chain } from "viem";

import type { Logger } from "../../utils/logger";

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * RPC endpoint configuration
 */
export interface RpcEndpointConfig {
  url: string;

  /** Optional name for logging */
  name?: string;

  /** Priority for fallback ordering (lower = higher priority) */
  priority?: number;

  enabled?: boolean;

  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Polygon client configuration
 */
export interface PolygonClientConfig {
  /** RPC endpoints, tried in priority order on failover */
  rpcEndpoints?: RpcEndpointConfig[];

  /** Chain configuration (defaults to Polygon mainnet) */
  chain?: Chain;

  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;

  /** Maximum number of retries (default: 3) */
  maxRetries?: number;

  /** Base retry delay in milliseconds, doubled per attempt (default: 1000) */
  retryDelay?: number;

  logger?: Logger;
}

/**
 * Block-explorer (Etherscan V2 / Polygonscan) client configuration
 */
export interface PolygonscanConfig {
  apiKey?: string;

  /** Default: Etherscan V2 multichain endpoint */
  baseUrl?: string;

  /** Chain ID sent with every V2 request (default: 137) */
  chainId?: number;

  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  logger?: Logger;
}

// ============================================================================
// Statistics Types
// ============================================================================

export interface EndpointHealth {
  url: string;
  name?: string;
  isHealthy: boolean;
  consecutiveFailures: number;
  totalRequests: number;
  successfulRequests: number;
  lastError?: Error;
}

export interface ClientStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  retries: number;
  endpointSwitches: number;
  activeEndpoint?: string;
  endpointHealth: EndpointHealth[];
}

// ============================================================================
// Error Types
// ============================================================================

export type PolygonClientErrorCode =
  | "CONNECTION_FAILED"
  | "REQUEST_TIMEOUT"
  | "RATE_LIMITED"
  | "INVALID_RESPONSE"
  | "ALL_ENDPOINTS_FAILED"
  | "INVALID_ADDRESS"
  | "INVALID_BLOCK"
  | "CONTRACT_ERROR";

/**
 * Polygon RPC client error
 */
export class PolygonClientError extends Error {
  readonly code: PolygonClientErrorCode;
  readonly endpoint?: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: PolygonClientErrorCode,
    options?: {
      endpoint?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "PolygonClientError";
    this.code = code;
    this.endpoint = options?.endpoint;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PolygonClientError);
    }
  }
}

export type PolygonscanErrorCode =
  | "HTTP_ERROR"
  | "API_ERROR"
  | "RATE_LIMIT"
  | "INVALID_RESPONSE"
  | "MAX_RETRIES_EXCEEDED";

/**
 * Block-explorer API error
 */
export class PolygonscanError extends Error {
  readonly code: PolygonscanErrorCode;
  readonly statusCode?: number;

  constructor(
    message: string,
    code: PolygonscanErrorCode,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "PolygonscanError";
    this.code = code;
    this.statusCode = options?.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PolygonscanError);
    }
  }
}
