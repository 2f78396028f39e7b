/**
 * Polymarket Gamma API (market metadata)
 */

export * from "./types";
export { GammaClient, GammaApiException, createGammaClient } from "./client";
export {
  type GammaMarketDirectoryOptions,
  type GetMarketByConditionIdOptions,
  GammaMarketDirectory,
  describeGammaMarket,
  getMarketByConditionId,
  isConditionId,
  parseGammaMarket,
} from "./markets";
