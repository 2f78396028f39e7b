/**
 * Polygon chain layer
 *
 * RPC reads of historical balances and nonces, plus block-explorer
 * block-by-time resolution.
 */

export * from "./types";

export {
  PolygonClient,
  createPolygonClient,
  POLYGON_USDC_ADDRESS,
  POLYGON_USDC_DECIMALS,
} from "./client";

export {
  PolygonscanClient,
  DEFAULT_POLYGONSCAN_BASE_URL,
  POLYGON_CHAIN_ID,
  type BlockClosest,
} from "./history";
