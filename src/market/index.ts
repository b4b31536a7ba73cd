export * from "./types";
export * from "./errors";
export { rankTrends, scoreTrend, type RankOptions } from "./rank";
export { calculatePotential, estimateMarketSize } from "./potential";
export { determineTargetAudience } from "./audience";
export {
  NicheSelector,
  type NicheOutcome,
  type NicheSelectorOptions,
  type NoneReason,
  type SkippedCandidate,
  type TrendsEvent,
} from "./niche-selector";
