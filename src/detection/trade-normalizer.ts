/**
 * Trade Event Normalizer
 *
 * Turns raw trade/transfer payloads from the different upstream sources into
 * one canonical {@link TradeEvent}. Raw payloads are first classified into a
 * tagged union of known shapes; nothing ambiguous leaves this module.
 *
 * Supported shapes:
 * - data-api:  Polymarket Data API trades (`proxyWallet`, `size`, `price`, `conditionId`)
 * - clob:      CLOB trades (`taker_address` / `maker_address`, `asset_id`, `match_time`)
 * - activity:  legacy activity feed (`taker` / `maker` / `user`, `cash`, nested `market`)
 * - transfer:  block-explorer ERC-20 transfers (`from`, `hash`, `timeStamp`, `value`)
 * - canonical: an already-normalized TradeEvent, so normalization is idempotent
 */

import { formatUnits, isAddress } from "viem";

import { DataShapeError, type DataShapeReason } from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import { parseTimestamp } from "../utils/time";
import type { TradeEvent, TradeRole, TradeSide } from "./types";

// ============================================================================
// Raw shapes
// ============================================================================

type UnknownRecord = Record<string, unknown>;

interface DataApiTradeRecord {
  source: "data-api";
  proxyWallet?: string;
  transactionHash?: string;
  timestamp: unknown;
  size?: number;
  price?: number;
  usdcSize?: number;
  conditionId?: string;
  asset?: string;
  title?: string;
  slug?: string;
  eventSlug?: string;
  outcome?: string;
  side?: string;
}

interface ClobTradeRecord {
  source: "clob";
  takerAddress?: string;
  makerAddress?: string;
  transactionHash?: string;
  timestamp: unknown;
  size?: number;
  price?: number;
  market?: string;
  outcome?: string;
  side?: string;
}

interface ActivityTradeRecord {
  source: "activity";
  taker?: string;
  maker?: string;
  user?: string;
  transactionHash?: string;
  blockNumber?: bigint;
  timestamp: unknown;
  cash?: number;
  size?: number;
  price?: number;
  marketId?: string;
  marketName?: string;
  description?: string;
  category?: string;
  slug?: string;
  outcome?: string;
  side?: string;
}

interface TransferRecord {
  source: "transfer";
  from?: string;
  to?: string;
  hash?: string;
  blockNumber?: bigint;
  timeStamp: unknown;
  value?: string;
  tokenDecimal?: number;
}

interface CanonicalRecord {
  source: "canonical";
  wallet?: string;
  txHash?: string;
  marketId?: string;
  amount?: number;
  price?: number;
  timestamp: unknown;
  marketDescription?: string;
  marketTitle?: string;
  marketSlug?: string;
  category?: string;
  outcome?: string;
  side?: string;
  role?: string;
  blockNumber?: bigint;
}

/** Every raw payload shape the normalizer understands */
export type RawTradeRecord =
  | DataApiTradeRecord
  | ClobTradeRecord
  | ActivityTradeRecord
  | TransferRecord
  | CanonicalRecord;

export type RawTradeSource = RawTradeRecord["source"];

/** Default decimals for transfer values (USDC) */
const DEFAULT_TOKEN_DECIMALS = 6;

export const UNKNOWN_MARKET = "unknown";

// ============================================================================
// Field readers
// ============================================================================

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First non-empty string among `keys` */
function readString(record: UnknownRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim() !== "") {
      return value.trim();
    }
  }
  return undefined;
}

/** First finite number (or numeric string) among `keys` */
function readNumber(record: UnknownRecord, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
  }
  return undefined;
}

function readBigInt(record: UnknownRecord, ...keys: string[]): bigint | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "bigint") {
      return value;
    }
    if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
      return BigInt(value);
    }
    if (typeof value === "string" && /^\d+$/.test(value.trim())) {
      return BigInt(value.trim());
    }
    if (typeof value === "string" && /^0x[0-9a-fA-F]+$/.test(value.trim())) {
      return BigInt(value.trim());
    }
  }
  return undefined;
}

/** First present value among `keys`, whatever its type */
function readRaw(record: UnknownRecord, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== "") {
      return value;
    }
  }
  return undefined;
}

function hasAny(record: UnknownRecord, ...keys: string[]): boolean {
  return keys.some((key) => key in record);
}

// ============================================================================
// Shape classification
// ============================================================================

/**
 * Classify a raw payload into one of the known shapes
 */
export function classifyRawRecord(value: unknown): RawTradeRecord | DataShapeError {
  if (!isRecord(value)) {
    return new DataShapeError("NOT_AN_OBJECT");
  }

  if (hasAny(value, "wallet") && hasAny(value, "txHash")) {
    return {
      source: "canonical",
      wallet: readString(value, "wallet"),
      txHash: readString(value, "txHash"),
      marketId: readString(value, "marketId"),
      amount: readNumber(value, "amount"),
      price: readNumber(value, "price"),
      timestamp: readRaw(value, "timestamp"),
      marketDescription: readString(value, "marketDescription"),
      marketTitle: readString(value, "marketTitle"),
      marketSlug: readString(value, "marketSlug"),
      category: readString(value, "category"),
      outcome: readString(value, "outcome"),
      side: readString(value, "side"),
      role: readString(value, "role"),
      blockNumber: readBigInt(value, "blockNumber"),
    };
  }

  if (hasAny(value, "proxyWallet")) {
    return {
      source: "data-api",
      proxyWallet: readString(value, "proxyWallet"),
      transactionHash: readString(value, "transactionHash"),
      timestamp: readRaw(value, "timestamp"),
      size: readNumber(value, "size"),
      price: readNumber(value, "price"),
      usdcSize: readNumber(value, "usdcSize"),
      conditionId: readString(value, "conditionId"),
      asset: readString(value, "asset"),
      title: readString(value, "title"),
      slug: readString(value, "slug"),
      eventSlug: readString(value, "eventSlug"),
      outcome: readString(value, "outcome"),
      side: readString(value, "side"),
    };
  }

  if (hasAny(value, "from") && hasAny(value, "hash") && hasAny(value, "timeStamp", "tokenDecimal")) {
    return {
      source: "transfer",
      from: readString(value, "from"),
      to: readString(value, "to"),
      hash: readString(value, "hash"),
      blockNumber: readBigInt(value, "blockNumber"),
      timeStamp: readRaw(value, "timeStamp"),
      value: readString(value, "value"),
      tokenDecimal: readNumber(value, "tokenDecimal"),
    };
  }

  if (hasAny(value, "taker_address", "maker_address", "match_time", "asset_id")) {
    return {
      source: "clob",
      takerAddress: readString(value, "taker_address"),
      makerAddress: readString(value, "maker_address"),
      transactionHash: readString(value, "transaction_hash", "tx_hash"),
      timestamp: readRaw(value, "match_time", "timestamp", "created_at"),
      size: readNumber(value, "size", "amount"),
      price: readNumber(value, "price"),
      market: readString(value, "market", "asset_id", "token_id"),
      outcome: readString(value, "outcome"),
      side: readString(value, "side"),
    };
  }

  if (hasAny(value, "taker", "maker", "userAddress", "user")) {
    const market = isRecord(value.market) ? value.market : isRecord(value.event) ? value.event : null;
    return {
      source: "activity",
      taker: readString(value, "taker"),
      maker: readString(value, "maker"),
      user: readString(value, "userAddress", "user"),
      transactionHash: readString(value, "transactionHash", "txHash", "hash"),
      blockNumber: readBigInt(value, "blockNumber", "block_number"),
      timestamp: readRaw(value, "timestamp", "createdAt", "created_at"),
      cash: readNumber(value, "cash", "quoteAmount", "value", "quantityUsd"),
      size: readNumber(value, "size"),
      price: readNumber(value, "price"),
      marketId: market
        ? readString(market, "conditionId", "condition_id", "id")
        : readString(value, "marketId", "conditionId"),
      marketName: market
        ? readString(market, "question", "title", "name")
        : readString(value, "marketName", "question"),
      description: market ? readString(market, "description") : readString(value, "description"),
      category: market ? readString(market, "category") : readString(value, "category"),
      slug: market ? readString(market, "slug") : readString(value, "slug"),
      outcome:
        (market ? readString(market, "outcome", "outcomeName", "outcome_ticker") : undefined) ??
        readString(value, "outcome"),
      side: readString(value, "side"),
    };
  }

  return new DataShapeError("UNKNOWN_SHAPE");
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Canonical (lower-case) wallet form, or null when not a valid address
 */
export function canonicalWallet(address: string | undefined): string | null {
  if (!address) {
    return null;
  }
  const lower = address.trim().toLowerCase();
  return isAddress(lower) ? lower : null;
}

function parseSide(side: string | undefined): TradeSide | null {
  if (!side) {
    return null;
  }
  const normalized = side.trim().toLowerCase();
  if (normalized === "buy" || normalized === "b" || normalized === "bid") {
    return "BUY";
  }
  if (normalized === "sell" || normalized === "s" || normalized === "ask") {
    return "SELL";
  }
  return null;
}

function parseRole(role: string | undefined): TradeRole {
  switch (role) {
    case "taker":
    case "maker":
    case "sender":
      return role;
    default:
      return "user";
  }
}

function probability(price: number | undefined): number | null {
  if (price === undefined || price < 0 || price > 1) {
    return null;
  }
  return price;
}

/** Amount at risk for share-denominated trades */
function sizeTimesPrice(size: number | undefined, price: number | undefined): number | undefined {
  if (size === undefined || price === undefined) {
    return undefined;
  }
  return size * price;
}

function transferAmount(value: string | undefined, decimals: number | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(formatUnits(BigInt(value), decimals ?? DEFAULT_TOKEN_DECIMALS));
}

/** Fields every shape must resolve before it becomes a TradeEvent */
interface ResolvedFields {
  wallet: string | undefined;
  role: TradeRole;
  txHash: string | undefined;
  timestamp: unknown;
  amount: number | undefined;
  price: number | null;
  marketId: string | undefined;
  marketTitle: string | undefined;
  marketDescription: string | undefined;
  marketSlug: string | undefined;
  category: string | undefined;
  outcome: string | undefined;
  side: TradeSide | null;
  blockNumber: bigint | undefined;
}

function resolveFields(raw: RawTradeRecord): ResolvedFields {
  switch (raw.source) {
    case "data-api":
      return {
        wallet: raw.proxyWallet,
        role: "user",
        txHash: raw.transactionHash,
        timestamp: raw.timestamp,
        amount: raw.usdcSize ?? sizeTimesPrice(raw.size, raw.price),
        price: probability(raw.price),
        marketId: raw.conditionId ?? raw.asset ?? raw.slug,
        marketTitle: raw.title,
        marketDescription: raw.title,
        marketSlug: raw.eventSlug ?? raw.slug,
        category: undefined,
        outcome: raw.outcome,
        side: parseSide(raw.side),
        blockNumber: undefined,
      };

    case "clob":
      return {
        wallet: raw.takerAddress ?? raw.makerAddress,
        role: raw.takerAddress ? "taker" : "maker",
        txHash: raw.transactionHash,
        timestamp: raw.timestamp,
        amount: sizeTimesPrice(raw.size, raw.price),
        price: probability(raw.price),
        marketId: raw.market,
        marketTitle: undefined,
        marketDescription: undefined,
        marketSlug: undefined,
        category: undefined,
        outcome: raw.outcome,
        side: parseSide(raw.side),
        blockNumber: undefined,
      };

    case "activity": {
      const wallet = raw.taker ?? raw.maker ?? raw.user;
      const role: TradeRole = raw.taker ? "taker" : raw.maker ? "maker" : "user";
      return {
        wallet,
        role,
        txHash: raw.transactionHash,
        timestamp: raw.timestamp,
        amount: raw.cash ?? sizeTimesPrice(raw.size, raw.price),
        price: probability(raw.price),
        marketId: raw.marketId ?? raw.marketName,
        marketTitle: raw.marketName,
        marketDescription: raw.description ?? raw.marketName,
        marketSlug: raw.slug,
        category: raw.category,
        outcome: raw.outcome,
        side: parseSide(raw.side),
        blockNumber: raw.blockNumber,
      };
    }

    case "transfer":
      return {
        wallet: raw.from,
        role: "sender",
        txHash: raw.hash,
        timestamp: raw.timeStamp,
        amount: transferAmount(raw.value, raw.tokenDecimal),
        price: null,
        marketId: raw.to?.toLowerCase(),
        marketTitle: undefined,
        marketDescription: undefined,
        marketSlug: undefined,
        category: undefined,
        outcome: undefined,
        side: null,
        blockNumber: raw.blockNumber,
      };

    case "canonical":
      return {
        wallet: raw.wallet,
        role: parseRole(raw.role),
        txHash: raw.txHash,
        timestamp: raw.timestamp,
        amount: raw.amount,
        price: probability(raw.price),
        marketId: raw.marketId,
        marketTitle: raw.marketTitle,
        marketDescription: raw.marketDescription,
        marketSlug: raw.marketSlug,
        category: raw.category,
        outcome: raw.outcome,
        side: parseSide(raw.side),
        blockNumber: raw.blockNumber,
      };
  }
}

/**
 * Normalize one raw payload.
 *
 * Returns a DataShapeError (never throws) when wallet, transaction ID,
 * timestamp or amount cannot be recovered.
 */
export function normalizeTradeRecord(value: unknown): TradeEvent | DataShapeError {
  const raw = classifyRawRecord(value);
  if (raw instanceof DataShapeError) {
    return raw;
  }

  const fields = resolveFields(raw);

  if (!fields.wallet) {
    return new DataShapeError("MISSING_WALLET");
  }
  const wallet = canonicalWallet(fields.wallet);
  if (!wallet) {
    return new DataShapeError("INVALID_WALLET", `Invalid wallet address: ${fields.wallet}`);
  }
  if (!fields.txHash) {
    return new DataShapeError("MISSING_TX_ID");
  }
  const timestamp = parseTimestamp(fields.timestamp);
  if (!timestamp) {
    return new DataShapeError("MISSING_TIMESTAMP");
  }
  if (fields.amount === undefined) {
    return new DataShapeError("MISSING_AMOUNT");
  }
  if (fields.amount < 0) {
    return new DataShapeError("NEGATIVE_AMOUNT");
  }

  const marketTitle = fields.marketTitle ?? "";

  return Object.freeze({
    wallet,
    marketId: fields.marketId ?? UNKNOWN_MARKET,
    amount: fields.amount,
    price: fields.price,
    timestamp,
    txHash: fields.txHash,
    marketDescription: fields.marketDescription ?? marketTitle,
    marketTitle,
    marketSlug: fields.marketSlug ?? null,
    category: fields.category ?? null,
    outcome: fields.outcome ?? null,
    side: fields.side,
    role: fields.role,
    blockNumber: fields.blockNumber ?? null,
  });
}

// ============================================================================
// Batch normalization
// ============================================================================

export interface NormalizedBatch {
  /** Events in input order, first occurrence of each transaction ID only */
  events: TradeEvent[];
  /** Records that could not be normalized */
  dropped: number;
  dropReasons: Partial<Record<DataShapeReason, number>>;
  /** Records discarded because their transaction ID was already seen */
  duplicates: number;
}

/**
 * Normalize one fetch worth of raw records, deduplicating by transaction ID
 * (first occurrence wins). Drops are counted, never logged individually.
 */
export function normalizeTradeBatch(
  records: readonly unknown[],
  options: { logger?: Logger } = {}
): NormalizedBatch {
  const log = options.logger ?? serviceLoggers.trades;
  const events: TradeEvent[] = [];
  const seen = new Set<string>();
  const dropReasons: Partial<Record<DataShapeReason, number>> = {};
  let dropped = 0;
  let duplicates = 0;

  for (const record of records) {
    const result = normalizeTradeRecord(record);
    if (result instanceof DataShapeError) {
      dropped++;
      dropReasons[result.reason] = (dropReasons[result.reason] ?? 0) + 1;
      continue;
    }
    if (seen.has(result.txHash)) {
      duplicates++;
      continue;
    }
    seen.add(result.txHash);
    events.push(result);
  }

  if (dropped > 0 || duplicates > 0) {
    log.debug("Normalized trade batch", {
      received: records.length,
      kept: events.length,
      dropped,
      duplicates,
      dropReasons,
    });
  }

  return { events, dropped, dropReasons, duplicates };
}
