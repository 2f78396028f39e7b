/**
 * Services
 */

export {
  type RunStats,
  type ScreeningReport,
  type ScreeningRunDependencies,
  type ScreeningRunOptions,
  type TradeSource,
  createLiveDependencies,
  runScreening,
} from "./screening-run";
