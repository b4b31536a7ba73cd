// tests/helpers.ts
import { vi } from "vitest";
import type { TrendRecord } from "../src/market/types";

export function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function trend(name: string, strength: number, growth_rate: number): TrendRecord {
  return { name, strength, growth_rate };
}
