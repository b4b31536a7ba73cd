// src/market/potential.ts
import type { CompetitorRecord } from "./types";

// Estimated market size in $M. Keys are matched exactly, casing included.
const MARKET_SIZE_M: Record<string, number> = {
  project_management: 150,
  "workflow Automation": 200,
};
const DEFAULT_MARKET_SIZE_M = 50;

export function estimateMarketSize(niche: string): number {
  return Object.prototype.hasOwnProperty.call(MARKET_SIZE_M, niche)
    ? MARKET_SIZE_M[niche]
    : DEFAULT_MARKET_SIZE_M;
}

/**
 * Heuristic viability of a niche: market size over 100, divided by
 * (competitors + 1). No competitors scores 1. Not clamped, so large
 * markets with few competitors can pass 1.
 */
export function calculatePotential(niche: string, competitors: readonly CompetitorRecord[]): number {
  if (!competitors.length) return 1.0;
  const marketSize = estimateMarketSize(niche);
  return (marketSize / 100) * (1 / (competitors.length + 1));
}
