// src/market/errors.ts
// Error taxonomy for a selector run. Collection and trend failures end the run;
// competitor failures only drop the affected candidate.

export type NicheErrorCode =
  | "collection_failed"
  | "trend_analysis_failed"
  | "competitor_analysis_failed";

export class NicheError extends Error {
  readonly code: NicheErrorCode;

  constructor(code: NicheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NicheError";
    this.code = code;
  }
}

export class CollectionError extends NicheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("collection_failed", message, options);
    this.name = "CollectionError";
  }
}

export class TrendAnalysisError extends NicheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("trend_analysis_failed", message, options);
    this.name = "TrendAnalysisError";
  }
}

export class CompetitorAnalysisError extends NicheError {
  readonly niche: string;

  constructor(niche: string, message: string, options?: { cause?: unknown }) {
    super("competitor_analysis_failed", message, options);
    this.name = "CompetitorAnalysisError";
    this.niche = niche;
  }
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

export function toCollectionError(err: unknown): CollectionError {
  if (err instanceof CollectionError) return err;
  return new CollectionError(`Failed to collect market data: ${messageOf(err)}`, { cause: err });
}

export function toTrendAnalysisError(err: unknown): TrendAnalysisError {
  if (err instanceof TrendAnalysisError) return err;
  return new TrendAnalysisError(`Failed to analyze trends: ${messageOf(err)}`, { cause: err });
}

export function toCompetitorAnalysisError(niche: string, err: unknown): CompetitorAnalysisError {
  if (err instanceof CompetitorAnalysisError && err.niche === niche) return err;
  return new CompetitorAnalysisError(niche, `Failed to analyze niche ${niche}: ${messageOf(err)}`, { cause: err });
}

export function errorInfo(err: unknown): { code: string; message: string } {
  if (err instanceof NicheError) return { code: err.code, message: err.message };
  return { code: "internal_error", message: messageOf(err) || "Internal Error" };
}
