// tests/config.spec.ts
import { describe, it, expect } from "vitest";
import { loadConfig, summarizeConfig } from "../src/config";

describe("loadConfig", () => {
  it("uses defaults for an empty env", () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: "development",
      logLevel: "debug",
      maxCandidates: 3,
      strengthGate: 0.7,
      snapshotPath: "data/sample-snapshot.json",
    });
  });

  it("logs at info in production unless LOG_LEVEL says otherwise", () => {
    expect(loadConfig({ NODE_ENV: "production" }).logLevel).toBe("info");
    expect(loadConfig({ NODE_ENV: "production", LOG_LEVEL: "warn" }).logLevel).toBe("warn");
  });

  it("treats unknown NODE_ENV values as development", () => {
    expect(loadConfig({ NODE_ENV: "staging" }).nodeEnv).toBe("development");
  });

  it("accepts positive integer candidate limits only", () => {
    expect(loadConfig({ NICHE_MAX_CANDIDATES: "5" }).maxCandidates).toBe(5);
    expect(loadConfig({ NICHE_MAX_CANDIDATES: "0" }).maxCandidates).toBe(3);
    expect(loadConfig({ NICHE_MAX_CANDIDATES: "2.5" }).maxCandidates).toBe(3);
    expect(loadConfig({ NICHE_MAX_CANDIDATES: "many" }).maxCandidates).toBe(3);
  });

  it("reads the strength gate and snapshot path", () => {
    const cfg = loadConfig({ NICHE_STRENGTH_GATE: "0.5", NICHE_SNAPSHOT: "/tmp/snap.json" });
    expect(cfg.strengthGate).toBe(0.5);
    expect(cfg.snapshotPath).toBe("/tmp/snap.json");
    expect(loadConfig({ NICHE_STRENGTH_GATE: "abc" }).strengthGate).toBe(0.7);
  });
});

describe("summarizeConfig", () => {
  it("lists the selector knobs", () => {
    expect(summarizeConfig(loadConfig({ NICHE_MAX_CANDIDATES: "4" }))).toEqual({
      nodeEnv: "development",
      logLevel: "debug",
      maxCandidates: 4,
      strengthGate: 0.7,
      snapshot: "data/sample-snapshot.json",
    });
  });
});
