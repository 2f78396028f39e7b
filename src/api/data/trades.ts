/**
 * Trade window fetcher
 *
 * Pages the Data API trade feed newest-first until the window edge, a short
 * page, or the record cap is reached. Records are returned raw; turning them
 * into TradeEvents is the normalizer's job.
 */

import { type Logger, serviceLoggers } from "../../utils/logger";
import { DAY_MS, parseTimestamp } from "../../utils/time";
import { DataApiClient, DataApiException } from "./client";
import type { TradeWindowOptions, TradeWindowResult } from "./types";

export const DEFAULT_MAX_TRADES = 5000;
export const DEFAULT_PAGE_SIZE = 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Timestamp fields checked, in order, to find where a page ends */
const TIMESTAMP_FIELDS = ["timestamp", "match_time", "createdAt", "created_at", "timeStamp"];

/**
 * Timestamp of a raw record, if it carries one in a known field
 */
export function rawRecordTimestamp(record: unknown): Date | null {
  if (!isRecord(record)) {
    return null;
  }
  for (const field of TIMESTAMP_FIELDS) {
    const parsed = parseTimestamp(record[field]);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

/**
 * Records of one page: a bare array, or an envelope with a `data` array
 */
function pageRecords(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (typeof payload === "object" && payload !== null && "data" in payload) {
    const data = payload.data;
    return Array.isArray(data) ? data : null;
  }
  return null;
}

/**
 * Fetch the raw trades covering the last `lookbackDays`
 *
 * @throws DataApiException with code EMPTY_PAYLOAD when the feed withholds
 * data for lack of a session. Any other page failure ends pagination and is
 * reported through `failedPages`.
 */
export async function fetchTradeWindow(
  options: TradeWindowOptions & { client?: DataApiClient; logger?: Logger }
): Promise<TradeWindowResult> {
  const client = options.client ?? new DataApiClient();
  const log = options.logger ?? serviceLoggers.trades;
  const now = options.now ?? new Date();
  const maxTrades = options.maxTrades ?? DEFAULT_MAX_TRADES;
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const since = new Date(now.getTime() - options.lookbackDays * DAY_MS);

  const records: unknown[] = [];
  let pagesFetched = 0;
  let failedPages = 0;
  let truncated = false;
  let offset = 0;

  for (;;) {
    if (records.length >= maxTrades) {
      truncated = true;
      break;
    }
    const limit = Math.min(pageSize, maxTrades - records.length);

    let payload: unknown;
    try {
      payload = await client.get("/trades", { params: { limit, offset } });
    } catch (error) {
      if (error instanceof DataApiException && error.code === "EMPTY_PAYLOAD") {
        throw error;
      }
      failedPages++;
      log.warn("Trade page fetch failed; stopping pagination", {
        offset,
        limit,
        error: error instanceof Error ? error.message : String(error),
      });
      break;
    }

    const page = pageRecords(payload);
    if (!page) {
      failedPages++;
      log.warn("Trade page was not a list; stopping pagination", { offset });
      break;
    }

    pagesFetched++;
    records.push(...page);

    if (page.length < limit) {
      break;
    }

    const oldest = rawRecordTimestamp(page[page.length - 1]);
    if (oldest && oldest.getTime() < since.getTime()) {
      break;
    }

    offset += page.length;
  }

  log.debug("Fetched trade window", {
    records: records.length,
    pagesFetched,
    failedPages,
    since: since.toISOString(),
    truncated,
  });

  return { records, pagesFetched, failedPages, since, truncated };
}

/**
 * Whether the wallet has a trade at or before `before`
 *
 * Reads at most one row of the wallet's TRADE activity ending at `before`.
 *
 * @throws DataApiException when the request fails or the page is not a list
 */
export async function hasTradeBefore(
  wallet: string,
  before: Date,
  options: { client?: DataApiClient } = {}
): Promise<boolean> {
  const client = options.client ?? new DataApiClient();
  const payload = await client.get("/activity", {
    params: {
      user: wallet,
      type: "TRADE",
      end: Math.floor(before.getTime() / 1000),
      limit: 1,
    },
  });

  const page = pageRecords(payload);
  if (!page) {
    throw new DataApiException({
      message: "Activity page was not a list",
      code: "INVALID_JSON",
      statusCode: 200,
    });
  }
  return page.length > 0;
}
