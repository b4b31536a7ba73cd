// src/market/rank.ts
import { DEFAULT_STRENGTH_GATE } from "../config";
import type { TrendRecord } from "./types";

export interface RankOptions {
  /** strength must be strictly above this for the growth rate to count */
  strengthGate?: number;
}

// Gate, not a weight: a weak trend scores exactly 0 whatever its growth.
export function scoreTrend(trend: TrendRecord, strengthGate = DEFAULT_STRENGTH_GATE): number {
  return trend.growth_rate * (trend.strength > strengthGate ? 1 : 0);
}

// Code point order, not UTF-16 code units: astral characters sort after U+FFFF.
function byName(a: string, b: string): number {
  const ca = Array.from(a);
  const cb = Array.from(b);
  const n = Math.min(ca.length, cb.length);
  for (let i = 0; i < n; i++) {
    const d = (ca[i].codePointAt(0) ?? 0) - (cb[i].codePointAt(0) ?? 0);
    if (d) return d;
  }
  return ca.length - cb.length;
}

/**
 * Orders niche names by gated trend score, highest first; equal scores
 * fall back to ascending name. Duplicate names are kept.
 */
export function rankTrends(trends: readonly TrendRecord[], opts: RankOptions = {}): string[] {
  const gate = opts.strengthGate ?? DEFAULT_STRENGTH_GATE;
  const scored = trends.map((t) => ({ name: t.name, score: scoreTrend(t, gate) }));
  scored.sort((a, b) => (b.score - a.score) || byName(a.name, b.name));
  return scored.map((s) => s.name);
}
