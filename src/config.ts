// src/config.ts
//
// Centralized, typed environment config.
// loadConfig() is pure over an env record so tests can feed their own;
// CFG is the process-wide read done once at import.

type NodeEnv = "development" | "production" | "test";

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: string;

  // selector knobs
  maxCandidates: number;   // how many ranked niches get a competitor pass
  strengthGate: number;    // trends at or below this strength score zero

  // cli
  snapshotPath: string;
}

export const DEFAULT_MAX_CANDIDATES = 3;
export const DEFAULT_STRENGTH_GATE = 0.7;
export const DEFAULT_SNAPSHOT_PATH = "data/sample-snapshot.json";

function envStr(env: Env, name: string, fallback = ""): string {
  const v = env[name];
  return (v === undefined || v === "") ? fallback : String(v);
}
function envNum(env: Env, name: string, fallback: number): number {
  const raw = envStr(env, name, "");
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function toNodeEnv(raw: string): NodeEnv {
  return raw === "production" || raw === "test" ? raw : "development";
}

export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = toNodeEnv(envStr(env, "NODE_ENV", "development"));

  const max = envNum(env, "NICHE_MAX_CANDIDATES", DEFAULT_MAX_CANDIDATES);
  const maxCandidates = Number.isInteger(max) && max >= 1 ? max : DEFAULT_MAX_CANDIDATES;

  return {
    nodeEnv,
    logLevel: envStr(env, "LOG_LEVEL", nodeEnv === "production" ? "info" : "debug"),
    maxCandidates,
    strengthGate: envNum(env, "NICHE_STRENGTH_GATE", DEFAULT_STRENGTH_GATE),
    snapshotPath: envStr(env, "NICHE_SNAPSHOT", DEFAULT_SNAPSHOT_PATH),
  };
}

export const CFG: AppConfig = loadConfig();

export function summarizeConfig(cfg: AppConfig = CFG) {
  return {
    nodeEnv: cfg.nodeEnv,
    logLevel: cfg.logLevel,
    maxCandidates: cfg.maxCandidates,
    strengthGate: cfg.strengthGate,
    snapshot: cfg.snapshotPath,
  };
}
