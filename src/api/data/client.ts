/**
 * Polymarket Data API Client
 *
 * HTTP client for the public trade feed. Uses native fetch with a timeout,
 * retries 5xx/429/network failures with exponential backoff and never
 * retries other 4xx responses.
 *
 * The feed answers `{"ok": true}` instead of trades when the caller has no
 * session; that is surfaced as an EMPTY_PAYLOAD error.
 */

import type { DataApiError, DataClientConfig, DataRequestOptions, QueryParams } from "./types";

/**
 * Default configuration for the Data API client
 */
const DEFAULT_CONFIG: Required<Omit<DataClientConfig, "sessionToken">> = {
  baseUrl: "https://data-api.polymarket.com",
  timeout: 30000,
  retries: 3,
  retryDelay: 1000,
};

const MAX_RETRY_DELAY = 10000;

/**
 * Custom error class for Data API errors
 */
export class DataApiException extends Error {
  public readonly statusCode: number;
  public readonly code: DataApiError["code"];

  constructor(error: DataApiError, options?: { cause?: unknown }) {
    super(error.message, { cause: options?.cause });
    this.name = "DataApiException";
    this.statusCode = error.statusCode;
    this.code = error.code;
  }

  /** Whether a later attempt could succeed */
  get retryable(): boolean {
    if (this.code === "TIMEOUT" || this.code === "NETWORK_ERROR") {
      return true;
    }
    return this.code === "HTTP_ERROR" && (this.statusCode === 429 || this.statusCode >= 500);
  }
}

function isMissingSessionPayload(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    "ok" in value &&
    value.ok === true
  );
}

function errorMessageFrom(body: string, fallback: string): string {
  if (!body) {
    return fallback;
  }
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
    return body;
  } catch {
    return body;
  }
}

/**
 * Data API Client class
 *
 * @example
 * ```typescript
 * const client = new DataApiClient({ sessionToken: process.env.POLYMARKET_SESSION_TOKEN });
 * const page = await client.get("/trades", { params: { limit: 500, offset: 0 } });
 * ```
 */
export class DataApiClient {
  private readonly config: Required<Omit<DataClientConfig, "sessionToken">> & {
    sessionToken: string;
  };

  constructor(config: DataClientConfig = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      sessionToken: config.sessionToken ?? "",
    };
  }

  public getBaseUrl(): string {
    return this.config.baseUrl;
  }

  public hasSession(): boolean {
    return this.config.sessionToken.length > 0;
  }

  private buildHeaders(customHeaders?: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...customHeaders,
    };

    if (this.config.sessionToken) {
      headers["Cookie"] = `pm-access-token=${this.config.sessionToken}`;
    }

    return headers;
  }

  private buildUrl(endpoint: string, params?: QueryParams): string {
    const base = this.config.baseUrl.replace(/\/+$/, "");
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) {
        query.set(key, String(value));
      }
    }
    const search = query.toString();
    return search ? `${base}${endpoint}?${search}` : `${base}${endpoint}`;
  }

  /**
   * GET a JSON document
   *
   * @throws DataApiException on HTTP, timeout, parse and empty-payload errors
   */
  public async get(endpoint: string, options: DataRequestOptions = {}): Promise<unknown> {
    const timeout = options.timeout ?? this.config.timeout;
    const url = this.buildUrl(endpoint, options.params);
    const headers = this.buildHeaders(options.headers);

    let lastError: DataApiException | null = null;
    let attempts = 0;

    while (attempts < this.config.retries) {
      attempts++;

      try {
        return await this.fetchOnce(url, headers, timeout);
      } catch (error) {
        lastError =
          error instanceof DataApiException
            ? error
            : new DataApiException(
                {
                  message: error instanceof Error ? error.message : String(error),
                  code: "NETWORK_ERROR",
                  statusCode: 0,
                },
                { cause: error }
              );

        if (!lastError.retryable) {
          throw lastError;
        }

        if (attempts < this.config.retries) {
          const delay = Math.min(this.config.retryDelay * Math.pow(2, attempts - 1), MAX_RETRY_DELAY);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw (
      lastError ??
      new DataApiException({
        message: "Request failed after all retries",
        code: "NETWORK_ERROR",
        statusCode: 0,
      })
    );
  }

  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    timeout: number
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    try {
      response = await fetch(url, { method: "GET", headers, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new DataApiException(
          { message: `Request timeout after ${timeout}ms`, code: "TIMEOUT", statusCode: 0 },
          { cause: error }
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new DataApiException({
        message: errorMessageFrom(text, `HTTP ${response.status}: ${response.statusText}`),
        code: "HTTP_ERROR",
        statusCode: response.status,
      });
    }

    if (!text) {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new DataApiException(
        { message: "Response is not valid JSON", code: "INVALID_JSON", statusCode: response.status },
        { cause: error }
      );
    }

    if (isMissingSessionPayload(data)) {
      throw new DataApiException({
        message:
          "Trade feed returned {\"ok\": true} without data; set POLYMARKET_SESSION_TOKEN to the pm-access-token cookie",
        code: "EMPTY_PAYLOAD",
        statusCode: response.status,
      });
    }

    return data;
  }
}

/**
 * Create a new Data API client with custom configuration
 */
export function createDataApiClient(config: DataClientConfig = {}): DataApiClient {
  return new DataApiClient(config);
}
