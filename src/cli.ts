// src/cli.ts
//
// Picks a niche from a snapshot file and reports it.
// Usage:
//   niche-finder --in data/sample-snapshot.json
//   niche-finder -i snapshot.json --json
//   niche-finder --help
//
// Exit codes: 0 niche found (or help printed), 1 none.

import { CFG, summarizeConfig, type AppConfig } from "./config";
import { log } from "./logger";
import { NicheSelector, errorInfo, type NicheOutcome, type SelectorLogger } from "./market";
import { readSnapshotFile, snapshotCollaborators } from "./sources/snapshot";

const USAGE = "Usage: niche-finder [--in|-i <snapshot.json>] [--json] [--help|-h]";

function arg(argv: string[], flag: string, dflt?: string) {
  const i = argv.indexOf(flag);
  if (i >= 0 && i + 1 < argv.length) return argv[i + 1];
  return dflt;
}
function has(argv: string[], flag: string) {
  return argv.includes(flag);
}

export interface CliDeps {
  cfg?: AppConfig;
  logger?: SelectorLogger;
  read?: (path: string) => unknown;
  write?: (line: string) => void;
}

export function outcomeToJSON(outcome: NicheOutcome) {
  if (outcome.status === "found") {
    return {
      ok: true,
      niche: outcome.report.niche,
      potential_score: outcome.report.potential_score,
      target_audience: outcome.report.target_audience,
      competitors: outcome.report.competitors.length,
      skipped: outcome.skipped.map((s) => s.niche),
    };
  }
  return {
    ok: false,
    reason: outcome.reason,
    error: outcome.error ? errorInfo(outcome.error) : undefined,
    skipped: outcome.skipped.map((s) => s.niche),
  };
}

export function main(argv: string[], deps: CliDeps = {}): number {
  const cfg = deps.cfg ?? CFG;
  const logger: SelectorLogger = deps.logger ?? log;
  const write = deps.write ?? ((line: string) => process.stdout.write(line + "\n"));

  if (has(argv, "--help") || has(argv, "-h")) {
    write(USAGE);
    return 0;
  }

  const inPath = arg(argv, "--in") || arg(argv, "-i") || cfg.snapshotPath;
  logger.debug({ config: summarizeConfig(cfg), in: inPath }, "[cli] starting");

  const selector = new NicheSelector(snapshotCollaborators(inPath, deps.read ?? readSnapshotFile), {
    logger,
    maxCandidates: cfg.maxCandidates,
    strengthGate: cfg.strengthGate,
  });
  const outcome = selector.run();

  if (has(argv, "--json")) {
    write(JSON.stringify(outcomeToJSON(outcome)));
  } else if (outcome.status === "found") {
    const { report } = outcome;
    logger.info({ niche: report.niche }, `Top niche identified: ${report.niche}`);
    logger.info({ score: report.potential_score }, `POTENTIAL SCORE: ${report.potential_score}`);
    logger.info({ audience: report.target_audience }, "TARGET AUDIENCE");
  } else {
    logger.warn({ reason: outcome.reason }, "No viable niche identified");
  }

  return outcome.status === "found" ? 0 : 1;
}
