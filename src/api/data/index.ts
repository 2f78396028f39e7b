/**
 * Polymarket Data API (trade feed)
 */

export * from "./types";
export { DataApiClient, DataApiException, createDataApiClient } from "./client";
export {
  DEFAULT_MAX_TRADES,
  DEFAULT_PAGE_SIZE,
  fetchTradeWindow,
  hasTradeBefore,
  rawRecordTimestamp,
} from "./trades";
