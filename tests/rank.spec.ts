// tests/rank.spec.ts
import { describe, it, expect } from "vitest";
import { rankTrends, scoreTrend } from "../src/market/rank";
import { trend } from "./helpers";

describe("rankTrends", () => {
  it("breaks score ties by ascending name", () => {
    const out = rankTrends([trend("b", 0.9, 5), trend("a", 0.9, 5)]);
    expect(out).toEqual(["a", "b"]);
  });

  it("orders by growth rate when strength clears the gate", () => {
    const out = rankTrends([trend("slow", 0.8, 2), trend("fast", 0.95, 9), trend("mid", 0.75, 4)]);
    expect(out).toEqual(["fast", "mid", "slow"]);
  });

  it("zeroes trends at or below the 0.7 strength gate", () => {
    const out = rankTrends([trend("weak", 0.7, 100), trend("hot", 0.71, 1)]);
    expect(out).toEqual(["hot", "weak"]);
  });

  it("keeps gated trends tied with each other and sorted by name", () => {
    const out = rankTrends([trend("zeta", 0.2, 50), trend("alpha", 0.5, 10), trend("mu", 0.9, 0)]);
    expect(out).toEqual(["alpha", "mu", "zeta"]);
  });

  it("ranks negative growth below gated trends", () => {
    const out = rankTrends([trend("shrinking", 0.9, -2), trend("quiet", 0.1, 5)]);
    expect(out).toEqual(["quiet", "shrinking"]);
  });

  it("returns a permutation of the input and keeps duplicates", () => {
    const input = [trend("x", 0.9, 1), trend("x", 0.5, 9), trend("y", 0.8, 3)];
    const out = rankTrends(input);
    expect(out).toEqual(["y", "x", "x"]);
    expect([...out].sort()).toEqual(input.map((t) => t.name).sort());
  });

  it("breaks ties by code point, placing astral characters after U+FFFF", () => {
    const out = rankTrends([trend("\u{1F600}app", 0.9, 5), trend("\uFF01app", 0.9, 5)]);
    expect(out).toEqual(["\uFF01app", "\u{1F600}app"]);
  });

  it("returns an empty list for no trends", () => {
    expect(rankTrends([])).toEqual([]);
  });

  it("accepts a custom strength gate", () => {
    const input = [trend("weak", 0.6, 100), trend("strong", 0.9, 1)];
    expect(rankTrends(input, { strengthGate: 0.5 })).toEqual(["weak", "strong"]);
    expect(rankTrends(input)).toEqual(["strong", "weak"]);
  });

  it("does not reorder the caller's array", () => {
    const input = [trend("b", 0.9, 1), trend("a", 0.9, 2)];
    rankTrends(input);
    expect(input.map((t) => t.name)).toEqual(["b", "a"]);
  });
});

describe("scoreTrend", () => {
  it("passes growth rate through above the gate", () => {
    expect(scoreTrend(trend("a", 0.71, 12))).toBe(12);
  });

  it("is exactly zero at the gate", () => {
    expect(scoreTrend(trend("a", 0.7, 12))).toBe(0);
  });
});
