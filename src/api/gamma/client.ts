/**
 * Polymarket Gamma API Client
 *
 * HTTP client for the Polymarket Gamma (market metadata) API.
 * Uses native fetch with a timeout and retries server errors with backoff.
 */

import type { GammaApiError, GammaClientConfig, GammaRequestOptions } from "./types";

/**
 * Default configuration for the Gamma API client
 */
const DEFAULT_CONFIG: Required<GammaClientConfig> = {
  baseUrl: "https://gamma-api.polymarket.com",
  apiKey: "",
  timeout: 30000,
  retries: 3,
  retryDelay: 1000,
};

const MAX_RETRY_DELAY = 10000;

/**
 * Custom error class for Gamma API errors
 */
export class GammaApiException extends Error {
  public readonly statusCode: number;
  public readonly code?: string;

  constructor(error: GammaApiError, options?: { cause?: unknown }) {
    super(error.message, { cause: options?.cause });
    this.name = "GammaApiException";
    this.statusCode = error.statusCode;
    this.code = error.code;
  }
}

function errorMessageFrom(body: string, fallback: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null) {
      if ("message" in parsed && typeof parsed.message === "string") {
        return parsed.message;
      }
      if ("error" in parsed && typeof parsed.error === "string") {
        return parsed.error;
      }
    }
  } catch {
    // Not JSON: the raw body is the message
  }
  return body || fallback;
}

/**
 * Gamma API Client class
 *
 * @example
 * ```typescript
 * const client = new GammaClient();
 * const markets = await client.get("/markets?condition_ids=0xabc");
 * ```
 */
export class GammaClient {
  private readonly config: Required<GammaClientConfig>;

  constructor(config: GammaClientConfig = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };
  }

  public getBaseUrl(): string {
    return this.config.baseUrl;
  }

  private buildHeaders(customHeaders?: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...customHeaders,
    };

    if (this.config.apiKey) {
      headers["Authorization"] = `Bearer ${this.config.apiKey}`;
    }

    return headers;
  }

  /**
   * GET a JSON document
   *
   * @throws GammaApiException on 4xx responses, or after the last failed attempt
   */
  public async get(endpoint: string, options: GammaRequestOptions = {}): Promise<unknown> {
    const timeout = options.timeout ?? this.config.timeout;
    const url = `${this.config.baseUrl.replace(/\/+$/, "")}${endpoint}`;
    const headers = this.buildHeaders(options.headers);

    let lastError: Error | null = null;
    let attempts = 0;

    while (attempts < this.config.retries) {
      attempts++;

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await fetch(url, { method: "GET", headers, signal: controller.signal });
        const text = await response.text();

        if (!response.ok) {
          throw new GammaApiException({
            message: errorMessageFrom(text, `HTTP ${response.status}: ${response.statusText}`),
            statusCode: response.status,
          });
        }

        if (!text) {
          return null;
        }

        try {
          return JSON.parse(text);
        } catch (error) {
          throw new GammaApiException(
            { message: "Response is not valid JSON", code: "INVALID_JSON", statusCode: response.status },
            { cause: error }
          );
        }
      } catch (error) {
        if (error instanceof GammaApiException) {
          // Don't retry on client errors (4xx) or unparseable bodies
          if ((error.statusCode >= 400 && error.statusCode < 500) || error.code === "INVALID_JSON") {
            throw error;
          }
        }

        if (error instanceof Error && error.name === "AbortError") {
          lastError = new GammaApiException(
            { message: `Request timeout after ${timeout}ms`, code: "TIMEOUT", statusCode: 0 },
            { cause: error }
          );
        } else {
          lastError = error instanceof Error ? error : new Error(String(error));
        }

        if (attempts < this.config.retries) {
          const delay = Math.min(this.config.retryDelay * Math.pow(2, attempts - 1), MAX_RETRY_DELAY);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError ?? new Error("Request failed after all retries");
  }
}

/**
 * Create a new Gamma client with custom configuration
 */
export function createGammaClient(config: GammaClientConfig = {}): GammaClient {
  return new GammaClient(config);
}
