// src/market/types.ts

export interface TrendRecord {
  name: string;
  strength: number;    // nominally 0..1, not checked
  growth_rate: number;
}

/** One competing product in a niche. Only the count is used by scoring. */
export type CompetitorRecord = Record<string, unknown>;

export interface AudienceDescriptor {
  role: string[];
  industry: string[];
  company_size: string[];
}

export interface NicheReport {
  readonly niche: string;
  readonly potential_score: number;
  readonly target_audience: Readonly<AudienceDescriptor>;
  readonly competitors: readonly CompetitorRecord[];
}

// ---- Collaborators (injected)

export interface DataCollector<D = unknown> {
  collectData(): D;
}

export interface TrendAnalyzer<D = unknown> {
  analyze(data: D): TrendRecord[];
}

export interface CompetitorAnalyzer {
  analyze(niche: string): CompetitorRecord[];
}

export interface Collaborators<D = unknown> {
  dataCollector: DataCollector<D>;
  trendAnalyzer: TrendAnalyzer<D>;
  competitorAnalyzer: CompetitorAnalyzer;
}

/** Structured log sink. A pino logger satisfies it. */
export interface SelectorLogger {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}
