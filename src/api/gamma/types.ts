/**
 * Type definitions for Polymarket Gamma API responses
 */

/**
 * Market metadata as used for risk classification.
 * Gamma omits fields freely, so everything beyond the ID is optional.
 */
export interface GammaMarketSummary {
  id: string;
  conditionId: string | null;
  question: string;
  description: string;
  category: string | null;
  /** Market slug */
  slug: string | null;
  /** Parent event slug; the public market page lives under it */
  eventSlug: string | null;
}

/**
 * API error response
 */
export interface GammaApiError {
  message: string;
  code?: string;
  statusCode: number;
}

/**
 * Client configuration options
 */
export interface GammaClientConfig {
  baseUrl?: string;
  apiKey?: string;
  timeout?: number;
  /** Total attempts per request */
  retries?: number;
  /** Base backoff delay in ms, doubled per attempt */
  retryDelay?: number;
}

/**
 * Request options for API calls
 */
export interface GammaRequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}
