// src/market/niche-selector.ts
/**
 * NicheSelector: collect -> analyze trends -> rank -> per-candidate competitor pass.
 * Synchronous, single pass, no retries.
 *
 * Emits events (synchronously, in run order):
 *  - 'collect'   ({ data })
 *  - 'trends'    ({ trends, ranked, candidates })
 *  - 'candidate' ({ niche, report })
 *  - 'skip'      ({ niche, error })
 *  - 'done'      ({ outcome })
 */
import { EventEmitter } from "events";
import { log } from "../logger";
import { CFG } from "../config";
import {
  CollectionError,
  CompetitorAnalysisError,
  TrendAnalysisError,
  errorInfo,
  toCollectionError,
  toCompetitorAnalysisError,
  toTrendAnalysisError,
} from "./errors";
import { rankTrends } from "./rank";
import { calculatePotential } from "./potential";
import { determineTargetAudience } from "./audience";
import type { Collaborators, NicheReport, SelectorLogger, TrendRecord } from "./types";

// ---- Types

export type NoneReason = "collection_failed" | "trend_analysis_failed" | "no_viable_niche";

export interface SkippedCandidate {
  niche: string;
  error: CompetitorAnalysisError;
}

export type NicheOutcome =
  | {
      status: "found";
      report: NicheReport;
      /** every candidate that analyzed cleanly, in rank order; report === reports[0] */
      reports: NicheReport[];
      skipped: SkippedCandidate[];
    }
  | {
      status: "none";
      reason: NoneReason;
      error?: CollectionError | TrendAnalysisError;
      skipped: SkippedCandidate[];
    };

export interface NicheSelectorOptions {
  logger?: SelectorLogger;
  maxCandidates?: number;
  strengthGate?: number;
}

export interface TrendsEvent {
  trends: TrendRecord[];
  ranked: string[];
  candidates: string[];
}

// ---- Selector

export class NicheSelector<D = unknown> extends EventEmitter {
  private readonly logger: SelectorLogger;
  private readonly maxCandidates: number;
  private readonly strengthGate: number;

  constructor(private readonly deps: Collaborators<D>, opts: NicheSelectorOptions = {}) {
    super();
    this.logger = opts.logger ?? log.child({ module: "niche-selector" });
    this.maxCandidates = Math.max(1, Math.floor(opts.maxCandidates ?? CFG.maxCandidates));
    this.strengthGate = opts.strengthGate ?? CFG.strengthGate;
  }

  run(): NicheOutcome {
    this.logger.info({}, "[niche] collecting market data");
    let data: D;
    try {
      data = this.deps.dataCollector.collectData();
    } catch (e) {
      const error = toCollectionError(e);
      this.logger.error({ err: errorInfo(error) }, "[niche] failed to collect market data");
      return this.finish({ status: "none", reason: "collection_failed", error, skipped: [] });
    }
    this.emit("collect", { data });

    this.logger.info({}, "[niche] analyzing trends");
    let trends: TrendRecord[];
    try {
      trends = this.deps.trendAnalyzer.analyze(data);
    } catch (e) {
      const error = toTrendAnalysisError(e);
      this.logger.error({ err: errorInfo(error) }, "[niche] failed to analyze trends");
      return this.finish({ status: "none", reason: "trend_analysis_failed", error, skipped: [] });
    }

    const ranked = rankTrends(trends, { strengthGate: this.strengthGate });
    const candidates = ranked.slice(0, this.maxCandidates);
    this.logger.debug({ count: trends.length, candidates }, "[niche] ranked trends");
    const trendsEvent: TrendsEvent = { trends, ranked, candidates };
    this.emit("trends", trendsEvent);

    const reports: NicheReport[] = [];
    const skipped: SkippedCandidate[] = [];
    for (const niche of candidates) {
      let report: NicheReport;
      try {
        report = this.analyzeCandidate(niche);
      } catch (e) {
        const error = toCompetitorAnalysisError(niche, e);
        this.logger.error({ niche, err: errorInfo(error) }, "[niche] failed to analyze niche");
        skipped.push({ niche, error });
        this.emit("skip", { niche, error });
        continue;
      }
      reports.push(report);
      this.emit("candidate", { niche, report });
    }

    if (!reports.length) {
      this.logger.warn({ skipped: skipped.length }, "[niche] no viable niche among candidates");
      return this.finish({ status: "none", reason: "no_viable_niche", skipped });
    }

    const report = reports[0];
    this.logger.info({ niche: report.niche, score: report.potential_score }, "[niche] top niche identified");
    return this.finish({ status: "found", report, reports, skipped });
  }

  /** Report for the best niche, or null when nothing could be analyzed (any reason). */
  identifyNiche(): NicheReport | null {
    const outcome = this.run();
    return outcome.status === "found" ? outcome.report : null;
  }

  private analyzeCandidate(niche: string): NicheReport {
    const competitors = this.deps.competitorAnalyzer.analyze(niche);
    return Object.freeze({
      niche,
      potential_score: calculatePotential(niche, competitors),
      target_audience: Object.freeze(determineTargetAudience(niche)),
      competitors: Object.freeze([...competitors]),
    });
  }

  private finish(outcome: NicheOutcome): NicheOutcome {
    this.emit("done", { outcome });
    return outcome;
  }
}
