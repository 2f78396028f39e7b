/**
 * Type definitions for the Polymarket Data API (trade feed)
 */

/**
 * Data API error codes
 */
export type DataApiErrorCode =
  | "HTTP_ERROR"
  | "TIMEOUT"
  | "NETWORK_ERROR"
  | "INVALID_JSON"
  /** `{"ok": true}`: the trade feed withholds payloads without a session */
  | "EMPTY_PAYLOAD";

export interface DataApiError {
  message: string;
  code: DataApiErrorCode;
  /** HTTP status, 0 when no response was received */
  statusCode: number;
}

/**
 * Client configuration options
 */
export interface DataClientConfig {
  baseUrl?: string;
  /** Value of the `pm-access-token` session cookie */
  sessionToken?: string;
  timeout?: number;
  /** Total attempts per request */
  retries?: number;
  /** Base backoff delay in ms, doubled per attempt */
  retryDelay?: number;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface DataRequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * Options for fetching one lookback window of trades
 */
export interface TradeWindowOptions {
  lookbackDays: number;
  /** End of the window (default: current time) */
  now?: Date;
  /** Stop after this many raw records (default: 5000) */
  maxTrades?: number;
  /** Records per page (default: 500) */
  pageSize?: number;
}

export interface TradeWindowResult {
  /** Raw records, newest first, as returned by the API */
  records: unknown[];
  pagesFetched: number;
  /** Pages that failed; a failed page ends pagination */
  failedPages: number;
  /** Start of the window */
  since: Date;
  /** Pagination stopped on `maxTrades` rather than on the window edge */
  truncated: boolean;
}
