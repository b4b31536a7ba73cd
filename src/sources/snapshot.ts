// src/sources/snapshot.ts
//
// File-backed collaborators for the selector. A snapshot is a JSON file:
//   {
//     "trends":      [{ "name": "...", "strength": 0.9, "growth_rate": 12 }, ...],
//     "competitors": { "<niche>": [{ ...competitor... }, ...] }
//   }
// Shapes are checked with zod at this boundary; value ranges are not.

import fs from "fs";
import { z } from "zod";
import { CompetitorAnalysisError, TrendAnalysisError, toCollectionError } from "../market/errors";
import type {
  Collaborators,
  CompetitorAnalyzer,
  CompetitorRecord,
  DataCollector,
  TrendAnalyzer,
  TrendRecord,
} from "../market/types";

export const trendSchema = z.object({
  name: z.string(),
  strength: z.number().finite(),
  growth_rate: z.number().finite(),
});

export const trendsPayloadSchema = z.object({
  trends: z.array(trendSchema),
});

// Entries are checked one niche at a time, so a bad entry only fails its own niche.
export const competitorsPayloadSchema = z.object({
  competitors: z.record(z.unknown()).default({}),
});

export const competitorListSchema = z.array(z.record(z.unknown()));

function describeIssues(err: z.ZodError, prefix: (string | number)[] = []): string {
  return err.issues
    .slice(0, 3)
    .map((i) => `${[...prefix, ...i.path].join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function readSnapshotFile(path: string): unknown {
  const txt = fs.readFileSync(path, "utf8");
  return JSON.parse(txt);
}

// ---- Data collectors

export class InMemoryDataCollector<D> implements DataCollector<D> {
  constructor(private readonly source: () => D) {}

  static of<D>(value: D): InMemoryDataCollector<D> {
    return new InMemoryDataCollector(() => value);
  }

  collectData(): D {
    return this.source();
  }
}

export class SnapshotDataCollector implements DataCollector<unknown> {
  private last: unknown = undefined;

  constructor(
    private readonly path: string,
    private readonly read: (path: string) => unknown = readSnapshotFile,
  ) {}

  collectData(): unknown {
    try {
      this.last = this.read(this.path);
    } catch (e) {
      throw toCollectionError(e);
    }
    return this.last;
  }

  /** Payload from the most recent successful collectData() call. */
  get latest(): unknown {
    return this.last;
  }
}

// ---- Trend analyzers

export class InMemoryTrendAnalyzer<D = unknown> implements TrendAnalyzer<D> {
  constructor(private readonly trends: TrendRecord[] | ((data: D) => TrendRecord[])) {}

  analyze(data: D): TrendRecord[] {
    return typeof this.trends === "function" ? this.trends(data) : [...this.trends];
  }
}

export class SnapshotTrendAnalyzer implements TrendAnalyzer<unknown> {
  analyze(data: unknown): TrendRecord[] {
    const parsed = trendsPayloadSchema.safeParse(data);
    if (!parsed.success) {
      throw new TrendAnalysisError(`Invalid trend payload: ${describeIssues(parsed.error)}`, { cause: parsed.error });
    }
    return parsed.data.trends;
  }
}

// ---- Competitor analyzers

export class InMemoryCompetitorAnalyzer implements CompetitorAnalyzer {
  constructor(private readonly byNiche: Record<string, CompetitorRecord[]>) {}

  analyze(niche: string): CompetitorRecord[] {
    if (!Object.prototype.hasOwnProperty.call(this.byNiche, niche)) {
      throw new CompetitorAnalysisError(niche, `No competitor data for niche ${niche}`);
    }
    return [...this.byNiche[niche]];
  }
}

// Re-reads the competitor section whenever load() hands back a different payload,
// so each run looks up competitors in the snapshot it collected.
export class SnapshotCompetitorAnalyzer implements CompetitorAnalyzer {
  private source: unknown = undefined;
  private section: Record<string, unknown> = {};

  constructor(private readonly load: () => unknown) {}

  analyze(niche: string): CompetitorRecord[] {
    const payload = this.load();
    if (payload !== this.source) {
      const parsed = competitorsPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        throw new CompetitorAnalysisError(niche, `Invalid competitor payload: ${describeIssues(parsed.error)}`, {
          cause: parsed.error,
        });
      }
      this.source = payload;
      this.section = parsed.data.competitors;
    }

    if (!Object.prototype.hasOwnProperty.call(this.section, niche)) {
      throw new CompetitorAnalysisError(niche, `No competitor data for niche ${niche}`);
    }
    const list = competitorListSchema.safeParse(this.section[niche]);
    if (!list.success) {
      throw new CompetitorAnalysisError(
        niche,
        `Invalid competitor payload: ${describeIssues(list.error, ["competitors", niche])}`,
        { cause: list.error },
      );
    }
    return list.data;
  }
}

export function snapshotCollaborators(
  path: string,
  read: (path: string) => unknown = readSnapshotFile,
): Collaborators<unknown> {
  const dataCollector = new SnapshotDataCollector(path, read);
  return {
    dataCollector,
    trendAnalyzer: new SnapshotTrendAnalyzer(),
    competitorAnalyzer: new SnapshotCompetitorAnalyzer(() => dataCollector.latest),
  };
}
